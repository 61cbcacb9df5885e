import { join } from 'node:path'
import {
	formatCodedMessage,
	SGCLI001,
	SGCLI002,
	SGCLI003,
	SGCLI004,
	SGCLI005,
	SGCLI006,
} from '@simdgen/diagnostics'
import {
	formatCanonicalType,
	GenerateError,
	type GeneratedFile,
	type InspectResult,
	type IsaOutput,
	type TypedParameter,
} from '@simdgen/generator'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCodedMessage(SGCLI001, { path: filePath })
	}
	return formatCodedMessage(SGCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCodedMessage(SGCLI003, { reason: getErrorMessage(error) })
}

/**
 * GenerateErrors already carry a formatted diagnostic.
 */
export function formatGenerateError(error: unknown): string {
	if (error instanceof GenerateError) {
		return error.message
	}
	return formatCodedMessage(SGCLI004, { reason: getErrorMessage(error) })
}

export function formatNotFoundError(name: string): string {
	return formatCodedMessage(SGCLI005, { name })
}

export function formatInvalidCapError(value: string): string {
	return formatCodedMessage(SGCLI006, { cap: value })
}

/**
 * Unit cap from its flag text. Null unless a positive whole number.
 */
export function parseCap(value: string): number | null {
	if (!/^\d+$/.test(value)) return null
	const cap = Number.parseInt(value, 10)
	return cap > 0 ? cap : null
}

export function resolveUnitPath(outputDir: string, file: GeneratedFile): string {
	return join(outputDir, file.path)
}

export function resolveStatsPath(statsDir: string, isa: string): string {
	return join(statsDir, `${isa}.txt`)
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * `SSE2: 2 intrinsics in SSE2`
 */
export function formatIsaSummary(output: IsaOutput): string {
	return `${output.isa}: ${plural(output.intrinsicCount, 'intrinsic')} in ${output.units.join(', ')}`
}

function formatTypedParameter(param: TypedParameter): string {
	return `${param.name}: ${param.rawType} -> ${formatCanonicalType(param.type)}`
}

function formatParameterSection(title: string, params: readonly TypedParameter[]): string[] {
	if (params.length === 0) return [`${title}: none`]
	return [`${title}:`, ...params.map((p) => `  ${formatTypedParameter(p)}`)]
}

export function formatInspection(result: InspectResult): string[] {
	const { classification: c, intrinsic } = result
	return [
		`${intrinsic.name} (${intrinsic.tech})`,
		`node: ${c.defName}`,
		`convention: ${c.convention}`,
		`generics: ${c.generics}`,
		`returns: ${intrinsic.returnType} -> ${formatCanonicalType(c.returnType)}`,
		...formatParameterSection('params', c.params),
		...formatParameterSection('offsets', c.offsetParams),
		`categories: ${intrinsic.categories.join(', ')}`,
		`header: ${intrinsic.header}`,
	]
}
