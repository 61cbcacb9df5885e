/**
 * CLI diagnostic definitions.
 *
 * Error code format: SGCLI<NUMBER>
 * - SGCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (SGCLI001-099)
// =============================================================================

export const SGCLI001: DiagnosticDef = {
	code: 'SGCLI001',
	description: "simdgen couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const SGCLI002: DiagnosticDef = {
	code: 'SGCLI002',
	description: "The file exists but simdgen can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const SGCLI003: DiagnosticDef = {
	code: 'SGCLI003',
	description: "simdgen couldn't save a generated file.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output directory.',
}

export const SGCLI004: DiagnosticDef = {
	code: 'SGCLI004',
	description: 'Something unexpected went wrong during generation.',
	message: 'generation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the database file, or report this if it seems like a bug.',
}

export const SGCLI005: DiagnosticDef = {
	code: 'SGCLI005',
	description: 'No record in the database carries this name.',
	message: 'intrinsic not found: {name}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Names are case-sensitive and usually start with an underscore.',
}

export const SGCLI006: DiagnosticDef = {
	code: 'SGCLI006',
	description: 'The --cap flag takes a whole number of intrinsics per unit.',
	message: 'invalid unit cap "{cap}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a positive whole number such as `--cap 175`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	SGCLI001,
	SGCLI002,
	SGCLI003,
	SGCLI004,
	SGCLI005,
	SGCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
