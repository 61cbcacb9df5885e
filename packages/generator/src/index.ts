/**
 * simdgen generator public API
 *
 * Turns an intrinsics database into staged IR units and C emission units:
 * - Record parsing and validation against a type table
 * - Classification into calling conventions
 * - Partitioning of instruction sets into bounded units
 */

export {
	CALLING_CONVENTIONS,
	type CallingConvention,
	type Classification,
	callingConvention,
	classify,
	type Generics,
	irNodeName,
	type TypedParameter,
} from './classify/classifier.ts'
export { cArgument, cgenUnitName, emissionStatement, emitterName, renderCGenUnit } from './codegen/cgen-unit.ts'
export {
	DOC_WIDTH,
	dispatchStatement,
	GENERATED_BANNER,
	mirroredArguments,
	renderIrUnit,
	type UnitNames,
	type UnitOptions,
	unitNames,
} from './codegen/ir-unit.ts'
export { renderCGenUmbrella, renderIrUmbrella } from './codegen/umbrella.ts'
export { SourceWriter, wrapText } from './codegen/writer.ts'
export {
	DEFAULT_EXTENSION_UNITS,
	DEFAULT_IMPORT_EXTENSION,
	DEFAULT_ISA_ORDER,
	DEFAULT_RUNTIME_MODULE,
	DEFAULT_UNIT_CAP,
	type GenerateOptions,
	type ResolvedOptions,
	resolveOptions,
} from './config.ts'
export { type Diagnostic, GenerateError, GenerationContext, raise } from './core/context.ts'
export { type DiagnosticCode, DiagnosticSeverity } from './core/diagnostics.ts'
export { allParams, type Intrinsic, NO_LOCATION, type Parameter, type SourceLocation } from './core/intrinsic.ts'
export {
	type GeneratedFile,
	type GenerateResult,
	type GenerateWarning,
	generate,
	generateIsa,
	type InspectResult,
	type IsaOutput,
	inspectIntrinsic,
	readIntrinsics,
} from './generate.ts'
export { DEFAULT_DESCRIPTION, offsetParameters, parseIntrinsics, parseRecord } from './parse/record.ts'
export { normalizeTech, sanitizeParameterName } from './parse/tables.ts'
export {
	chunk,
	type EmittedNames,
	type IsaPlan,
	type IsaSelection,
	NO_EMITTED_NAMES,
	type PlanOptions,
	planIsa,
	planUnits,
	type SkippedIntrinsic,
	selectIsa,
	subUnitName,
	type UnitSlice,
	validateCap,
} from './partition/partition.ts'
export { formatIsaStats, type UnitStats, unitStats, warningLines } from './stats/report.ts'
export {
	type CanonicalType,
	createTypeTable,
	formatCanonicalType,
	loadTypeTable,
	parseCanonicalType,
	SCALAR_NAMES,
	type ScalarName,
	TypeTable,
} from './types/mapping.ts'
export { readDatabase } from './xml/index.ts'
