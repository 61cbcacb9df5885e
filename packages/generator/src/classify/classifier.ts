/**
 * Parameter Classifier
 *
 * Pure function from an Intrinsic to the facts the templates branch on:
 * which parameters are arrays, which generics the node needs, and which
 * calling convention its dispatch operation follows.
 */

import { IntrinsicsCategory } from '@simdgen/runtime'

import type { Intrinsic, Parameter } from '../core/intrinsic.ts'
import { type CanonicalType, isVoidPointer, type TypeTable } from '../types/mapping.ts'

/**
 * How a dispatch operation binds its node, in precedence order:
 * - constructing: returns fresh memory, bound as mutable
 * - reading: a Load, delegated to the container's tracked read
 * - writing: takes an array, delegated to the container's tracked write
 * - effectful: returns nothing, bound as a global effect
 * - pure: everything else
 */
export type CallingConvention = 'constructing' | 'reading' | 'writing' | 'effectful' | 'pure'

export const CALLING_CONVENTIONS: readonly CallingConvention[] = [
	'constructing',
	'reading',
	'writing',
	'effectful',
	'pure',
]

/**
 * Type parameters a node takes:
 * - none: no container
 * - pointer: container kind `A` and offset type `U`
 * - voidPointer: additionally the element type `T` behind untyped pointers
 */
export type Generics = 'none' | 'pointer' | 'voidPointer'

export interface TypedParameter extends Parameter {
	readonly type: CanonicalType
}

export interface Classification {
	readonly intrinsic: Intrinsic
	/** Name of the IR node */
	readonly defName: string
	readonly returnType: CanonicalType
	readonly params: readonly TypedParameter[]
	readonly offsetParams: readonly TypedParameter[]
	readonly arrayParams: readonly TypedParameter[]
	readonly hasArrayParams: boolean
	readonly hasVoidPointerParams: boolean
	/** Returns an array, typed or not */
	readonly hasArrayReturn: boolean
	readonly hasVoidPointerReturn: boolean
	readonly generics: Generics
	readonly convention: CallingConvention
}

/**
 * `_mm_add_epi32` → `MM_ADD_EPI32`.
 */
export function irNodeName(name: string): string {
	return name.toUpperCase().replace(/^_+/, '')
}

export function callingConvention(
	intrinsic: Intrinsic,
	returnType: CanonicalType,
	hasArrayParams: boolean
): CallingConvention {
	if (returnType.kind === 'array') return 'constructing'
	if (intrinsic.categories.includes(IntrinsicsCategory.Load)) return 'reading'
	if (hasArrayParams) return 'writing'
	if (returnType.name === 'Unit') return 'effectful'
	return 'pure'
}

export function classify(intrinsic: Intrinsic, table: TypeTable): Classification {
	const typed = (p: Parameter): TypedParameter => ({ ...p, type: table.resolve(p.rawType, intrinsic.name) })

	const params = intrinsic.params.map(typed)
	const offsetParams = intrinsic.offsetParams.map(typed)
	const returnType = table.resolve(intrinsic.returnType, intrinsic.name)
	const arrayParams = params.filter((p) => p.type.kind === 'array')

	const hasArrayParams = arrayParams.length > 0
	const hasVoidPointerParams = arrayParams.some((p) => isVoidPointer(p.type))
	const hasArrayReturn = returnType.kind === 'array'
	const hasVoidPointerReturn = isVoidPointer(returnType)
	const convention = callingConvention(intrinsic, returnType, hasArrayParams)

	const needsContainer =
		hasArrayParams || (hasArrayReturn && !hasVoidPointerReturn) || convention === 'reading'
	let generics: Generics = 'none'
	if (needsContainer) generics = hasVoidPointerParams ? 'voidPointer' : 'pointer'

	return {
		arrayParams,
		convention,
		defName: irNodeName(intrinsic.name),
		generics,
		hasArrayParams,
		hasArrayReturn,
		hasVoidPointerParams,
		hasVoidPointerReturn,
		intrinsic,
		offsetParams,
		params,
		returnType,
	}
}
