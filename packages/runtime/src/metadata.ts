/**
 * Metadata enumerations attached to every intrinsic node.
 */

export const IntrinsicsCategory = {
	ApplicationTargeted: 'ApplicationTargeted',
	Arithmetic: 'Arithmetic',
	BitManipulation: 'BitManipulation',
	Cast: 'Cast',
	Compare: 'Compare',
	Convert: 'Convert',
	Cryptography: 'Cryptography',
	ElementaryMath: 'ElementaryMath',
	GeneralSupport: 'GeneralSupport',
	Load: 'Load',
	Logical: 'Logical',
	Mask: 'Mask',
	Miscellaneous: 'Miscellaneous',
	Move: 'Move',
	OSTargeted: 'OSTargeted',
	ProbabilityStatistics: 'ProbabilityStatistics',
	Random: 'Random',
	Set: 'Set',
	Shift: 'Shift',
	SpecialMath: 'SpecialMath',
	Store: 'Store',
	StringCompare: 'StringCompare',
	Swizzle: 'Swizzle',
	Trigonometry: 'Trigonometry',
} as const

export type IntrinsicsCategory = (typeof IntrinsicsCategory)[keyof typeof IntrinsicsCategory]

export const IntrinsicsType = {
	FloatingPoint: 'FloatingPoint',
	Integer: 'Integer',
	Mask: 'Mask',
} as const

export type IntrinsicsType = (typeof IntrinsicsType)[keyof typeof IntrinsicsType]

export const MicroArchType = {
	Broadwell: 'Broadwell',
	Haswell: 'Haswell',
	IvyBridge: 'IvyBridge',
	KnightsLanding: 'KnightsLanding',
	Nehalem: 'Nehalem',
	SandyBridge: 'SandyBridge',
	Skylake: 'Skylake',
	Westmere: 'Westmere',
} as const

export type MicroArchType = (typeof MicroArchType)[keyof typeof MicroArchType]

/**
 * Measured cost on one microarchitecture. A missing figure was not measured
 * or varies with the operands; it is never zero.
 */
export interface Performance {
	readonly latency?: number
	readonly throughput?: number
}

export type PerformanceMap = Readonly<Partial<Record<MicroArchType, Performance>>>
