import assert from 'node:assert'
import { describe, it } from 'node:test'

import { IntrinsicsCategory } from '@simdgen/runtime'

import { classify } from '../../src/classify/classifier.ts'
import { cArgument, emissionStatement, renderCGenUnit } from '../../src/codegen/cgen-unit.ts'
import type { UnitOptions } from '../../src/codegen/ir-unit.ts'
import { renderCGenUmbrella } from '../../src/codegen/umbrella.ts'
import { loadTypeTable } from '../../src/types/mapping.ts'
import { makeIntrinsic } from '../fixtures.ts'

const table = loadTypeTable()
const options: UnitOptions = { importExtension: '.ts', runtimeModule: '@simdgen/runtime' }

const add = classify(makeIntrinsic(), table)
const load = classify(
	makeIntrinsic({
		categories: [IntrinsicsCategory.Load],
		name: '_mm_load_ps',
		params: [{ name: 'mem_addr', rawType: 'float const*' }],
		returnType: '__m128',
	}),
	table
)
const store = classify(
	makeIntrinsic({
		categories: [IntrinsicsCategory.Store],
		name: '_mm_storeu_si128',
		params: [
			{ name: 'mem_addr', rawType: '__m128i*' },
			{ name: 'a', rawType: '__m128i' },
		],
		returnType: 'void',
	}),
	table
)

describe('codegen/cgen-unit', () => {
	describe('cArgument', () => {
		it('should quote plain arguments', () => {
			const [a] = add.params
			assert.ok(a)
			assert.strictEqual(cArgument(add, a), '${cg.quote(rhs.a)}')
		})

		it('should cast arrays and displace them by their offset', () => {
			const [mem] = load.params
			assert.ok(mem)
			assert.strictEqual(cArgument(load, mem), '(float const*) (${cg.quoteWithOffset(rhs.mem_addr, rhs.mem_addrOffset)})')
		})
	})

	describe('emissionStatement', () => {
		it('should bind value-returning calls to the symbol', () => {
			assert.strictEqual(
				emissionStatement(add),
				'cg.emitValDef(sym, `_mm_add_epi32(${cg.quote(rhs.a)}, ${cg.quote(rhs.b)})`)'
			)
		})

		it('should print unit-returning calls as statements', () => {
			assert.strictEqual(
				emissionStatement(store),
				'cg.println(`_mm_storeu_si128((__m128i*) (${cg.quoteWithOffset(rhs.mem_addr, rhs.mem_addrOffset)}), ${cg.quote(rhs.a)});`)'
			)
		})

		it('should leave offsets out of the C call', () => {
			assert.ok(!emissionStatement(load).includes('${cg.quote(rhs.mem_addrOffset)}'))
		})
	})

	describe('renderCGenUnit', () => {
		it('should emit one case per node in database order', () => {
			const lines = renderCGenUnit('SSE', [load, add], options).split('\n')
			const start = lines.indexOf('\tswitch (rhs.kind) {')
			assert.deepStrictEqual(lines.slice(start - 3, start + 8), [
				'export function emitSSE(cg: rt.CodegenContext, sym: rt.Sym<unknown>, rhs: rt.Def<unknown>): boolean {',
				'\tif (!isSSENode(rhs)) return false',
				'\tcg.headers.add(rhs.header)',
				'\tswitch (rhs.kind) {',
				"\t\tcase 'MM_LOAD_PS':",
				'\t\t\tcg.emitValDef(sym, `_mm_load_ps((float const*) (${cg.quoteWithOffset(rhs.mem_addr, rhs.mem_addrOffset)}))`)',
				'\t\t\treturn true',
				"\t\tcase 'MM_ADD_EPI32':",
				'\t\t\tcg.emitValDef(sym, `_mm_add_epi32(${cg.quote(rhs.a)}, ${cg.quote(rhs.b)})`)',
				'\t\t\treturn true',
				'\t}',
			])
		})

		it('should import the guard of its IR unit', () => {
			const lines = renderCGenUnit('SSE', [load], { importExtension: '.js', runtimeModule: '../runtime.js' }).split('\n')
			assert.strictEqual(lines[2], "import * as rt from '../runtime.js'")
			assert.strictEqual(lines[3], "import { isSSENode } from './SSE.js'")
		})

		it('should reject every node when the unit is empty', () => {
			const source = renderCGenUnit('SVML', [], options)
			assert.ok(source.endsWith('\tif (!isSVMLNode(rhs)) return false\n\treturn false\n}\n'))
		})
	})

	describe('renderCGenUmbrella', () => {
		it('should try each part emitter in order', () => {
			const lines = renderCGenUmbrella('AVX512', ['AVX51200', 'AVX51201'], options).split('\n')
			assert.strictEqual(lines[3], "import { emitAVX51200 } from './CGenAVX51200.ts'")
			assert.ok(lines.includes('\treturn emitAVX51200(cg, sym, rhs) || emitAVX51201(cg, sym, rhs)'))
		})
	})
})
