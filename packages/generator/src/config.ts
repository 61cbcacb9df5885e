/**
 * Generation options and their defaults.
 */

import { loadTypeTable, type TypeTable } from './types/mapping.ts'

/**
 * Instruction sets in generation order. Order matters: an intrinsic listed
 * under several sets is generated only for the first of them.
 */
export const DEFAULT_ISA_ORDER: readonly string[] = [
	'MMX',
	'SSE',
	'SSE2',
	'SSE3',
	'SSSE3',
	'SSE41',
	'SSE42',
	'AVX',
	'AVX2',
	'AVX512_KNC',
	'AVX512',
	'FMA',
	'KNC',
	'SVML',
	'Other',
]

/** Intrinsics per generated unit */
export const DEFAULT_UNIT_CAP = 175

export const DEFAULT_RUNTIME_MODULE = '@simdgen/runtime'

export const DEFAULT_IMPORT_EXTENSION = '.ts'

/**
 * Split instruction sets whose umbrella also composes a shared extension unit.
 */
export const DEFAULT_EXTENSION_UNITS: ReadonlyMap<string, string> = new Map([
	['AVX512', 'AVX512_KNC'],
	['KNC', 'AVX512_KNC'],
])

/**
 * Options for the generate function.
 */
export interface GenerateOptions {
	/** Path to the database (for error messages) */
	filename?: string
	/** Instruction sets to generate, in order */
	isaOrder?: readonly string[]
	/** Maximum intrinsics per unit before a set is split */
	cap?: number
	/** Module specifier generated units import the runtime from */
	runtimeModule?: string
	/** Extension on imports between generated units ('.ts', '.js' or '') */
	importExtension?: string
	extensionUnits?: ReadonlyMap<string, string>
	/** Reports units already present from an earlier run */
	unitExists?: (unit: string) => boolean
	typeTable?: TypeTable
}

export interface ResolvedOptions {
	readonly filename: string
	readonly isaOrder: readonly string[]
	readonly cap: number
	readonly runtimeModule: string
	readonly importExtension: string
	readonly extensionUnits: ReadonlyMap<string, string>
	readonly unitExists: (unit: string) => boolean
	readonly typeTable: TypeTable
}

export function resolveOptions(options: GenerateOptions = {}): ResolvedOptions {
	return {
		cap: options.cap ?? DEFAULT_UNIT_CAP,
		extensionUnits: options.extensionUnits ?? DEFAULT_EXTENSION_UNITS,
		filename: options.filename ?? '<database>',
		importExtension: options.importExtension ?? DEFAULT_IMPORT_EXTENSION,
		isaOrder: options.isaOrder ?? DEFAULT_ISA_ORDER,
		runtimeModule: options.runtimeModule ?? DEFAULT_RUNTIME_MODULE,
		typeTable: options.typeTable ?? loadTypeTable(),
		unitExists: options.unitExists ?? (() => false),
	}
}
