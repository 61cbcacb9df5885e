/**
 * Record Parser
 *
 * Validates one <intrinsic> element and builds the immutable Intrinsic it
 * describes. Any schema violation aborts the run with a diagnostic naming
 * the record and the field.
 */

import type { MicroArchType, Performance, PerformanceMap } from '@simdgen/runtime'

import type { GenerationContext } from '../core/context.ts'
import type { Intrinsic, Parameter, SourceLocation } from '../core/intrinsic.ts'
import { isArrayType, type TypeTable } from '../types/mapping.ts'
import { childElements, childTexts, textContent, type XmlElement, type XmlRecord } from '../xml/index.ts'
import {
	CATEGORY_NAMES,
	MICROARCH_NAMES,
	normalizeTech,
	RETURN_TYPE_OVERRIDES,
	sanitizeParameterName,
	TYPE_KIND_NAMES,
} from './tables.ts'

export const DEFAULT_DESCRIPTION = 'No description available for this intrinsic'

const UNNAMED_RECORD = '<unnamed>'

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

/**
 * The record being parsed. `name` is used in diagnostics.
 */
interface RecordScope {
	readonly ctx: GenerationContext
	readonly record: XmlRecord
	readonly name: string
	readonly table: TypeTable
}

function locationOf(scope: RecordScope, element: XmlElement): SourceLocation {
	return scope.ctx.locate(scope.record.base + element.offset)
}

function requireAttribute(scope: RecordScope, element: XmlElement, attribute: string): string {
	const args = { attribute, element: element.name, record: scope.name }
	const value = element.attributes.get(attribute)
	if (value === undefined) {
		scope.ctx.fail('SGREC001', locationOf(scope, element), args)
	}
	if (value.trim() === '') {
		scope.ctx.fail('SGREC002', locationOf(scope, element), args)
	}
	return value
}

function requireMappedType(scope: RecordScope, rawType: string, element: XmlElement): void {
	if (!scope.table.has(rawType)) {
		scope.ctx.fail('SGTYPE001', locationOf(scope, element), { record: scope.name, type: rawType })
	}
}

function texts(scope: RecordScope, name: string): string[] {
	return childTexts(scope.record.element, name).map((text) => text.trim())
}

/**
 * Translate every <elementName> child through `names`, keeping first
 * occurrences. At least one child is required.
 */
function lookupAll<T>(
	scope: RecordScope,
	elementName: string,
	names: ReadonlyMap<string, T>,
	code: 'SGREC003' | 'SGREC004'
): T[] {
	const elements = childElements(scope.record.element, elementName)
	if (elements.length === 0) {
		scope.ctx.fail('SGREC007', locationOf(scope, scope.record.element), {
			element: elementName,
			record: scope.name,
		})
	}

	const values: T[] = []
	for (const element of elements) {
		const text = textContent(element).trim()
		const value = names.get(text)
		if (value === undefined) {
			scope.ctx.fail(code, locationOf(scope, element), { record: scope.name, value: text })
		}
		if (!values.includes(value)) values.push(value)
	}
	return values
}

// =============================================================================
// PARAMETERS
// =============================================================================

function parseParameters(scope: RecordScope): Parameter[] {
	const params: Parameter[] = []
	const seen = new Set<string>()

	for (const element of childElements(scope.record.element, 'parameter')) {
		const rawType = requireAttribute(scope, element, 'type')
		if (rawType === 'void') continue
		requireMappedType(scope, rawType, element)

		const name = sanitizeParameterName(requireAttribute(scope, element, 'varname'))
		if (seen.has(name)) continue
		seen.add(name)
		params.push({ name, rawType })
	}

	return params
}

/**
 * One signed-int offset per array parameter, in parameter order.
 */
export function offsetParameters(params: readonly Parameter[], table: TypeTable): Parameter[] {
	return params
		.filter((p) => {
			const type = table.lookup(p.rawType)
			return type !== undefined && isArrayType(type)
		})
		.map((p) => ({ name: `${p.name}Offset`, rawType: 'int' }))
}

// =============================================================================
// PERFORMANCE
// =============================================================================

/**
 * Empty and "Varies" mean the figure was not measured.
 */
function parseFigure(scope: RecordScope, element: XmlElement, attribute: string): number | undefined {
	const raw = element.attributes.get(attribute)
	if (raw === undefined) return undefined
	const text = raw.trim()
	if (text === '' || text === 'Varies') return undefined
	if (!NUMBER_PATTERN.test(text)) {
		scope.ctx.fail('SGREC006', locationOf(scope, element), {
			attribute,
			record: scope.name,
			value: text,
		})
	}
	return Number(text)
}

function parsePerformance(scope: RecordScope): PerformanceMap {
	const performance: Partial<Record<MicroArchType, Performance>> = {}

	for (const element of childElements(scope.record.element, 'perfdata')) {
		const archName = requireAttribute(scope, element, 'arch').trim()
		const arch = MICROARCH_NAMES.get(archName)
		if (arch === undefined) {
			scope.ctx.fail('SGREC005', locationOf(scope, element), { record: scope.name, value: archName })
		}

		const latency = parseFigure(scope, element, 'lat')
		const throughput = parseFigure(scope, element, 'tpt')
		// Nothing measured: leave the microarchitecture out
		if (latency === undefined && throughput === undefined) continue

		performance[arch] = {
			...(latency !== undefined ? { latency } : {}),
			...(throughput !== undefined ? { throughput } : {}),
		}
	}

	return performance
}

// =============================================================================
// RECORDS
// =============================================================================

export function parseRecord(ctx: GenerationContext, record: XmlRecord, table: TypeTable): Intrinsic {
	const { element } = record
	const name = requireAttribute({ ctx, name: UNNAMED_RECORD, record, table }, element, 'name').trim()
	const scope: RecordScope = { ctx, name, record, table }

	const tech = normalizeTech(requireAttribute(scope, element, 'tech').trim())
	const returnType = RETURN_TYPE_OVERRIDES.get(name) ?? requireAttribute(scope, element, 'rettype')
	requireMappedType(scope, returnType, element)

	const intrinsicTypes = lookupAll(scope, 'type', TYPE_KIND_NAMES, 'SGREC004')
	const categories = lookupAll(scope, 'category', CATEGORY_NAMES, 'SGREC003')
	const params = parseParameters(scope)
	const performance = parsePerformance(scope)

	const header = texts(scope, 'header')[0]
	if (header === undefined) {
		ctx.fail('SGREC008', locationOf(scope, element), { record: name })
	}

	return {
		categories,
		cpuid: texts(scope, 'CPUID'),
		description: texts(scope, 'description')[0] || DEFAULT_DESCRIPTION,
		header,
		intrinsicTypes,
		location: locationOf(scope, element),
		name,
		offsetParams: offsetParameters(params, table),
		operation: texts(scope, 'operation'),
		params,
		performance,
		returnType,
		tech,
	}
}

/**
 * Parse every record in document order.
 */
export function parseIntrinsics(
	ctx: GenerationContext,
	records: readonly XmlRecord[],
	table: TypeTable
): Intrinsic[] {
	return records.map((record) => parseRecord(ctx, record, table))
}
