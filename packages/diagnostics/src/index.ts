/**
 * @simdgen/diagnostics
 *
 * Shared diagnostic types and definitions for simdgen packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	SGCLI001,
	SGCLI002,
	SGCLI003,
	SGCLI004,
	SGCLI005,
	SGCLI006,
} from './cli.ts'
export {
	GENERATOR_DIAGNOSTICS,
	type GeneratorDiagnosticCode,
	SGGEN001,
	SGGEN002,
	SGGEN003,
	SGGEN050,
	SGGEN051,
	SGGEN052,
	SGGEN053,
	SGREC001,
	SGREC002,
	SGREC003,
	SGREC004,
	SGREC005,
	SGREC006,
	SGREC007,
	SGREC008,
	SGTYPE001,
	SGTYPE002,
	SGXML001,
	SGXML002,
	SGXML050,
} from './generator.ts'
export { formatCodedMessage, interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	SEVERITY_LABELS,
} from './types.ts'
