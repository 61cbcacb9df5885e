import type { IntrinsicsCategory, IntrinsicsType, PerformanceMap } from '@simdgen/runtime'

/**
 * Position in the database document (1-indexed). Line 0 means "no position".
 */
export interface SourceLocation {
	readonly line: number
	readonly column: number
}

export const NO_LOCATION: SourceLocation = { column: 0, line: 0 }

export interface Parameter {
	readonly name: string
	readonly rawType: string
}

/**
 * One parsed database record.
 */
export interface Intrinsic {
	readonly name: string
	/** Instruction-set tag with punctuation cleaned up */
	readonly tech: string
	readonly cpuid: readonly string[]
	readonly returnType: string
	readonly intrinsicTypes: readonly IntrinsicsType[]
	readonly categories: readonly IntrinsicsCategory[]
	readonly performance: PerformanceMap
	/** Declared parameters, deduplicated by name */
	readonly params: readonly Parameter[]
	/** One `<name>Offset` per array parameter, in the same order */
	readonly offsetParams: readonly Parameter[]
	readonly description: string
	readonly operation: readonly string[]
	readonly header: string
	readonly location: SourceLocation
}

export function allParams(intrinsic: Intrinsic): readonly Parameter[] {
	return [...intrinsic.params, ...intrinsic.offsetParams]
}
