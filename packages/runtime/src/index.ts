/**
 * @simdgen/runtime
 *
 * Staging runtime targeted by generated intrinsics units: value types,
 * expression graph, container capability and C emission helpers.
 */

export { CodegenContext, EmitError, type NodeEmitter } from './codegen.ts'
export {
	arrayContainer,
	type Container,
	type ContainerKind,
	type ContainerKinds,
	type Kind,
} from './container.ts'
export {
	type Def,
	type IntrinsicsDef,
	isReflect,
	type PointerIntrinsicsDef,
	PURE_SUMMARY,
	Reflect,
	type Summary,
	type VoidPointerIntrinsicsDef,
} from './defs.ts'
export { Const, type Exp, isConstZero, isSym, type Sym } from './exp.ts'
export {
	IntrinsicsCategory,
	IntrinsicsType,
	MicroArchType,
	type Performance,
	type PerformanceMap,
} from './metadata.ts'
export { ExpressionGraph, type Staging, type Transformer } from './staging.ts'
export {
	type __m64,
	type __m128,
	type __m128d,
	type __m128i,
	type __m256,
	type __m256d,
	type __m256i,
	type __m512,
	type __m512d,
	type __m512i,
	type Any,
	type Byte,
	type Double,
	type DoubleVoidPointer,
	type Float,
	type Int,
	type Integral,
	type Long,
	pointerTyp,
	remap,
	type Short,
	type Typ,
	Typs,
	typ,
	type UByte,
	type UInt,
	type ULong,
	type Unit,
	type UShort,
	type VoidPointer,
} from './types.ts'
