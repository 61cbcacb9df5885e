/**
 * Re-export diagnostic types and generator definitions from shared package.
 */

import { GENERATOR_DIAGNOSTICS } from '@simdgen/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	GENERATOR_DIAGNOSTICS,
	type GeneratorDiagnosticCode,
	interpolateMessage,
	SEVERITY_LABELS,
} from '@simdgen/diagnostics'

/**
 * All valid diagnostic codes for the generator.
 */
export type DiagnosticCode = keyof typeof GENERATOR_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof GENERATOR_DIAGNOSTICS)[typeof code] {
	return GENERATOR_DIAGNOSTICS[code]
}
