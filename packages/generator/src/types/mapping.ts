/**
 * Type Mapping Table
 *
 * Maps the C type spellings used by the database to canonical staged types.
 * The table is data: see type-mappings.json beside this module.
 */

import { readFileSync } from 'node:fs'

import { raise } from '../core/context.ts'

/**
 * Canonical scalar type names, as spelled in generated code.
 */
export const SCALAR_NAMES = [
	'Unit',
	'Byte',
	'Short',
	'Int',
	'Long',
	'UByte',
	'UShort',
	'UInt',
	'ULong',
	'Float',
	'Double',
	'Any',
	'DoubleVoidPointer',
	'__m64',
	'__m128',
	'__m128d',
	'__m128i',
	'__m256',
	'__m256d',
	'__m256i',
	'__m512',
	'__m512d',
	'__m512i',
] as const

export type ScalarName = (typeof SCALAR_NAMES)[number]

export type CanonicalType =
	| { readonly kind: 'scalar'; readonly name: ScalarName }
	| { readonly kind: 'array'; readonly element: ScalarName }

const SCALAR_SET: ReadonlySet<string> = new Set(SCALAR_NAMES)

function isScalarName(name: string): name is ScalarName {
	return SCALAR_SET.has(name)
}

/**
 * Parse `Int` or `Array[Int]`. Returns null for anything else.
 */
export function parseCanonicalType(text: string): CanonicalType | null {
	const array = /^Array\[(\w+)\]$/.exec(text)
	if (array) {
		const element = array[1] ?? ''
		return isScalarName(element) ? { element, kind: 'array' } : null
	}
	return isScalarName(text) ? { kind: 'scalar', name: text } : null
}

export function formatCanonicalType(type: CanonicalType): string {
	return type.kind === 'array' ? `Array[${type.element}]` : type.name
}

export function isArrayType(type: CanonicalType): boolean {
	return type.kind === 'array'
}

/**
 * An array of untyped memory (`void*` and its spellings).
 */
export function isVoidPointer(type: CanonicalType): boolean {
	return type.kind === 'array' && type.element === 'Any'
}

export class TypeTable {
	private readonly entries: ReadonlyMap<string, CanonicalType>

	constructor(entries: ReadonlyMap<string, CanonicalType>) {
		this.entries = entries
	}

	lookup(rawType: string): CanonicalType | undefined {
		return this.entries.get(rawType)
	}

	/**
	 * Canonical type of `rawType`; an unmapped spelling aborts the run.
	 */
	resolve(rawType: string, record: string): CanonicalType {
		const type = this.entries.get(rawType)
		if (type === undefined) {
			raise('SGTYPE001', { record, type: rawType })
		}
		return type
	}

	has(rawType: string): boolean {
		return this.entries.has(rawType)
	}

	get size(): number {
		return this.entries.size
	}

	rawTypes(): string[] {
		return [...this.entries.keys()]
	}
}

/**
 * Build a table from raw spelling → canonical spelling pairs.
 */
export function createTypeTable(raw: Readonly<Record<string, unknown>>): TypeTable {
	const entries = new Map<string, CanonicalType>()
	for (const [rawType, value] of Object.entries(raw)) {
		if (typeof value !== 'string') {
			raise('SGTYPE002', { detail: 'expected a type name', type: rawType })
		}
		const type = parseCanonicalType(value)
		if (type === null) {
			raise('SGTYPE002', { detail: `unknown canonical type ${value}`, type: rawType })
		}
		entries.set(rawType, type)
	}
	return new TypeTable(entries)
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

let defaultTable: TypeTable | null = null

/**
 * The bundled table, read once.
 */
export function loadTypeTable(): TypeTable {
	if (defaultTable !== null) return defaultTable
	const text = readFileSync(new URL('./type-mappings.json', import.meta.url), 'utf8')
	const raw: unknown = JSON.parse(text)
	if (!isRecord(raw)) {
		raise('SGTYPE002', { detail: 'the table must be a JSON object', type: '<root>' })
	}
	defaultTable = createTypeTable(raw)
	return defaultTable
}
