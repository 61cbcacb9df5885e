import { IntrinsicsCategory, IntrinsicsType } from '@simdgen/runtime'

import type { Intrinsic, Parameter } from '../src/core/intrinsic.ts'
import { offsetParameters } from '../src/parse/record.ts'
import { loadTypeTable } from '../src/types/mapping.ts'

export interface RecordSpec {
	name: string
	tech?: string
	rettype?: string
	params?: readonly (readonly [type: string, varname: string])[]
	types?: readonly string[]
	categories?: readonly string[]
	header?: string
	description?: string
	extra?: readonly string[]
}

/**
 * One <intrinsic> element, one child per line.
 */
export function recordXml(spec: RecordSpec): string {
	const lines = [`<intrinsic tech="${spec.tech ?? 'SSE2'}" rettype="${spec.rettype ?? '__m128i'}" name="${spec.name}">`]
	for (const type of spec.types ?? ['Integer']) lines.push(`\t<type>${type}</type>`)
	for (const category of spec.categories ?? ['Arithmetic']) lines.push(`\t<category>${category}</category>`)
	for (const [type, varname] of spec.params ?? []) lines.push(`\t<parameter type="${type}" varname="${varname}"/>`)
	if (spec.description !== undefined) lines.push(`\t<description>${spec.description}</description>`)
	lines.push(...(spec.extra ?? []).map((line) => `\t${line}`))
	lines.push(`\t<header>${spec.header ?? 'emmintrin.h'}</header>`, '</intrinsic>')
	return lines.join('\n')
}

export function databaseXml(records: readonly string[]): string {
	return ['<?xml version="1.0" encoding="UTF-8"?>', '<intrinsics_list version="test">', ...records, '</intrinsics_list>', ''].join('\n')
}

export const ADD_EPI32 = recordXml({
	description: 'Add packed 32-bit integers in "a" and "b".',
	name: '_mm_add_epi32',
	params: [
		['__m128i', 'a'],
		['__m128i', 'b'],
	],
})

export const LOAD_PS = recordXml({
	categories: ['Load'],
	description: 'Load 128-bits from memory into "dst".',
	header: 'xmmintrin.h',
	name: '_mm_load_ps',
	params: [['float const*', 'mem_addr']],
	rettype: '__m128',
	tech: 'SSE',
	types: ['Floating Point'],
})

/**
 * An Intrinsic built directly, bypassing the parser.
 */
export function makeIntrinsic(overrides: Partial<Intrinsic> = {}): Intrinsic {
	const params = overrides.params ?? [
		{ name: 'a', rawType: '__m128i' },
		{ name: 'b', rawType: '__m128i' },
	]
	return {
		categories: [IntrinsicsCategory.Arithmetic],
		cpuid: [],
		description: 'Test intrinsic.',
		header: 'emmintrin.h',
		intrinsicTypes: [IntrinsicsType.Integer],
		location: { column: 1, line: 1 },
		name: '_mm_add_epi32',
		operation: [],
		performance: {},
		returnType: '__m128i',
		tech: 'SSE2',
		...overrides,
		offsetParams: overrides.offsetParams ?? offsetParameters(params, loadTypeTable()),
		params,
	}
}
