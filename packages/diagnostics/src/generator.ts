/**
 * Generator diagnostic definitions.
 *
 * Error code format: SG<PHASE><NUMBER>
 * - SGXML: Database document errors (001-049), warnings (050-099)
 * - SGREC: Record schema errors (001-099)
 * - SGTYPE: Type table errors (001-099)
 * - SGGEN: Generation errors (001-049), warnings and notes (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// DOCUMENT ERRORS (SGXML001-049)
// =============================================================================

export const SGXML001: DiagnosticDef = {
	code: 'SGXML001',
	description: 'The database file is not well-formed XML at this point.',
	message: 'malformed database document: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that every element is closed and every attribute value is quoted.',
}

export const SGXML002: DiagnosticDef = {
	code: 'SGXML002',
	description: 'An element was closed with a different name than it was opened with.',
	message: 'closing tag </{found}> does not match <{expected}>',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close <{expected}> before closing its parent.',
}

// =============================================================================
// DOCUMENT WARNINGS (SGXML050-099)
// =============================================================================

export const SGXML050: DiagnosticDef = {
	code: 'SGXML050',
	description: 'The database was read successfully but holds no intrinsic records.',
	message: 'database contains no <intrinsic> records',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Point the generator at the intrinsics data file, not an empty or unrelated XML file.',
}

// =============================================================================
// RECORD ERRORS (SGREC001-099)
// =============================================================================

export const SGREC001: DiagnosticDef = {
	code: 'SGREC001',
	description: 'Every record must carry this attribute.',
	message: 'missing attribute "{attribute}" on <{element}> in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a {attribute}="..." attribute to the <{element}> element.',
}

export const SGREC002: DiagnosticDef = {
	code: 'SGREC002',
	description: 'The attribute is present but holds only whitespace.',
	message: 'attribute "{attribute}" on <{element}> is empty in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Give {attribute} a value, or fix the record in the database.',
}

export const SGREC003: DiagnosticDef = {
	code: 'SGREC003',
	description: 'Categories come from a fixed list and this one is not on it.',
	message: 'category unknown: "{value}" in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of the known categories, or extend the category table.',
}

export const SGREC004: DiagnosticDef = {
	code: 'SGREC004',
	description: 'Intrinsic types are one of Floating Point, Integer or Mask.',
	message: 'unknown intrinsic type "{value}" in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use "Floating Point", "Integer" or "Mask".',
}

export const SGREC005: DiagnosticDef = {
	code: 'SGREC005',
	description: 'Performance figures are keyed by a fixed list of microarchitectures.',
	message: 'unknown microarchitecture "{value}" in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Extend the microarchitecture table if this is a new processor generation.',
}

export const SGREC006: DiagnosticDef = {
	code: 'SGREC006',
	description: 'Latency and throughput must be numbers, empty, or "Varies".',
	message: 'malformed {attribute} value "{value}" in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write a decimal number, leave it empty, or use "Varies".',
}

export const SGREC007: DiagnosticDef = {
	code: 'SGREC007',
	description: 'Every record needs at least one <{element}> child.',
	message: 'record {record} declares no <{element}>',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a <{element}> element to the record.',
}

export const SGREC008: DiagnosticDef = {
	code: 'SGREC008',
	description: 'The header tells the C emitter which file to include for this intrinsic.',
	message: 'record {record} declares no <header>',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a <header> element such as <header>immintrin.h</header>.',
}

// =============================================================================
// TYPE TABLE ERRORS (SGTYPE001-099)
// =============================================================================

export const SGTYPE001: DiagnosticDef = {
	code: 'SGTYPE001',
	description: 'Every raw type string must be listed in the type table.',
	message: 'unmapped type "{type}" in record {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add "{type}" to type-mappings.json.',
}

export const SGTYPE002: DiagnosticDef = {
	code: 'SGTYPE002',
	description: 'A type table entry must name a canonical type.',
	message: 'invalid type table entry "{type}": {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Map the entry to a canonical scalar such as "Int" or to "Array[Float]".',
}

// =============================================================================
// GENERATION ERRORS (SGGEN001-049)
// =============================================================================

export const SGGEN001: DiagnosticDef = {
	code: 'SGGEN001',
	description: 'The IR node name is derived from the intrinsic name and must differ from it.',
	message: 'IR node name {node} collides with intrinsic {record}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Intrinsic names are expected to start with an underscore prefix.',
}

export const SGGEN002: DiagnosticDef = {
	code: 'SGGEN002',
	description: 'Oversized instruction sets are split into units of this many intrinsics.',
	message: 'unit cap must be a positive integer, got {cap}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a cap of 1 or more.',
}

export const SGGEN003: DiagnosticDef = {
	code: 'SGGEN003',
	description: 'Two intrinsics of one instruction set map to the same IR node name.',
	message: 'IR node name {node} is shared by {record} and {other}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the records, or drop the duplicate from the database.',
}

// =============================================================================
// GENERATION WARNINGS (SGGEN050-099)
// =============================================================================

export const SGGEN050: DiagnosticDef = {
	code: 'SGGEN050',
	description: 'Most intrinsics take at most one pointer argument.',
	message: 'intrinsic {record} has {count} pointer arguments',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Check that the tracked reads and writes cover every pointer.',
}

export const SGGEN051: DiagnosticDef = {
	code: 'SGGEN051',
	description: 'The intrinsic returns an untyped pointer, which the container cannot describe.',
	message: 'intrinsic {record} has untyped pointer return type',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Callers receive a VoidPointer and must cast it themselves.',
}

export const SGGEN052: DiagnosticDef = {
	code: 'SGGEN052',
	description: 'Only instruction sets in the processing order are generated.',
	message: 'instruction set {isa} is never generated ({count} records)',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add {isa} to the processing order if it should be generated.',
}

export const SGGEN053: DiagnosticDef = {
	code: 'SGGEN053',
	description: 'An intrinsic name already generated for an earlier instruction set is skipped.',
	message: 'intrinsic {record} in {isa} skipped: already generated for {previous}',
	severity: DiagnosticSeverity.Note,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all generator diagnostics.
 */
export const GENERATOR_DIAGNOSTICS = {
	// Generation errors
	SGGEN001,
	SGGEN002,
	SGGEN003,
	// Generation warnings
	SGGEN050,
	SGGEN051,
	SGGEN052,
	SGGEN053,
	// Record errors
	SGREC001,
	SGREC002,
	SGREC003,
	SGREC004,
	SGREC005,
	SGREC006,
	SGREC007,
	SGREC008,
	// Type table errors
	SGTYPE001,
	SGTYPE002,
	// Document errors
	SGXML001,
	SGXML002,
	// Document warnings
	SGXML050,
} as const

/**
 * All valid generator diagnostic codes.
 */
export type GeneratorDiagnosticCode = keyof typeof GENERATOR_DIAGNOSTICS
