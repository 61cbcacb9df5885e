/**
 * Vocabulary of the database: the strings records use for categories,
 * type kinds and microarchitectures, and the spellings we rewrite.
 */

import { IntrinsicsCategory, IntrinsicsType, MicroArchType } from '@simdgen/runtime'

export const CATEGORY_NAMES: ReadonlyMap<string, IntrinsicsCategory> = new Map([
	['Application-Targeted', IntrinsicsCategory.ApplicationTargeted],
	['Arithmetic', IntrinsicsCategory.Arithmetic],
	['Bit Manipulation', IntrinsicsCategory.BitManipulation],
	['Cast', IntrinsicsCategory.Cast],
	['Compare', IntrinsicsCategory.Compare],
	['Convert', IntrinsicsCategory.Convert],
	['Cryptography', IntrinsicsCategory.Cryptography],
	['Elementary Math Functions', IntrinsicsCategory.ElementaryMath],
	['General Support', IntrinsicsCategory.GeneralSupport],
	['Load', IntrinsicsCategory.Load],
	['Logical', IntrinsicsCategory.Logical],
	['Mask', IntrinsicsCategory.Mask],
	['Miscellaneous', IntrinsicsCategory.Miscellaneous],
	['Move', IntrinsicsCategory.Move],
	['OS-Targeted', IntrinsicsCategory.OSTargeted],
	['Probability/Statistics', IntrinsicsCategory.ProbabilityStatistics],
	['Random', IntrinsicsCategory.Random],
	['Set', IntrinsicsCategory.Set],
	['Shift', IntrinsicsCategory.Shift],
	['Special Math Functions', IntrinsicsCategory.SpecialMath],
	['Store', IntrinsicsCategory.Store],
	['String Compare', IntrinsicsCategory.StringCompare],
	['Swizzle', IntrinsicsCategory.Swizzle],
	['Trigonometry', IntrinsicsCategory.Trigonometry],
])

export const TYPE_KIND_NAMES: ReadonlyMap<string, IntrinsicsType> = new Map([
	['Floating Point', IntrinsicsType.FloatingPoint],
	['Integer', IntrinsicsType.Integer],
	['Mask', IntrinsicsType.Mask],
])

export const MICROARCH_NAMES: ReadonlyMap<string, MicroArchType> = new Map([
	['Broadwell', MicroArchType.Broadwell],
	['Haswell', MicroArchType.Haswell],
	['Ivy Bridge', MicroArchType.IvyBridge],
	['Knights Landing', MicroArchType.KnightsLanding],
	['Nehalem', MicroArchType.Nehalem],
	['Sandy Bridge', MicroArchType.SandyBridge],
	['Skylake', MicroArchType.Skylake],
	['Westmere', MicroArchType.Westmere],
])

/**
 * Records whose declared return type is unusable.
 */
export const RETURN_TYPE_OVERRIDES: ReadonlyMap<string, string> = new Map([['_MM_TRANSPOSE4_PS', 'void']])

const PARAMETER_RENAMES: ReadonlyMap<string, string> = new Map([
	['RoundKey', 'roundKey'],
	['type', 'tpe'],
	['val', 'value'],
])

/**
 * Identifiers a parameter may not take. Besides reserved words, these are
 * the fields of every generated node and names generated code binds.
 */
const RESERVED_NAMES: ReadonlySet<string> = new Set([
	'arguments',
	'await',
	'break',
	'case',
	'catch',
	'class',
	'const',
	'continue',
	'debugger',
	'default',
	'delete',
	'do',
	'else',
	'enum',
	'eval',
	'export',
	'extends',
	'false',
	'finally',
	'for',
	'function',
	'if',
	'implements',
	'import',
	'in',
	'instanceof',
	'interface',
	'let',
	'new',
	'null',
	'package',
	'private',
	'protected',
	'public',
	'return',
	'static',
	'super',
	'switch',
	'this',
	'throw',
	'true',
	'try',
	'typeof',
	'var',
	'void',
	'while',
	'with',
	'yield',
	// node fields
	'category',
	'cont',
	'header',
	'integralType',
	'intrinsicType',
	'ir',
	'kind',
	'performance',
	'rt',
	'typ',
	'voidType',
])

export function sanitizeParameterName(name: string): string {
	const renamed = PARAMETER_RENAMES.get(name) ?? name
	return RESERVED_NAMES.has(renamed) ? `${renamed}_` : renamed
}

/**
 * `AVX-512/KNC` → `AVX512_KNC`, `SSE4.1` → `SSE41`.
 */
export function normalizeTech(tech: string): string {
	return tech.replace(/[.-]/g, '').replace(/\//g, '_')
}
