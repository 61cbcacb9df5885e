import assert from 'node:assert'
import { describe, it } from 'node:test'

import { IntrinsicsCategory } from '@simdgen/runtime'

import { classify, irNodeName } from '../../src/classify/classifier.ts'
import { loadTypeTable } from '../../src/types/mapping.ts'
import { makeIntrinsic } from '../fixtures.ts'

const table = loadTypeTable()

describe('classify/classifier', () => {
	describe('irNodeName', () => {
		it('should uppercase and strip leading underscores', () => {
			assert.strictEqual(irNodeName('_mm_add_epi32'), 'MM_ADD_EPI32')
			assert.strictEqual(irNodeName('__rdtsc'), 'RDTSC')
			assert.strictEqual(irNodeName('_MM_TRANSPOSE4_PS'), 'MM_TRANSPOSE4_PS')
		})
	})

	describe('classify', () => {
		it('should classify a vector add as pure without generics', () => {
			const c = classify(makeIntrinsic(), table)
			assert.strictEqual(c.defName, 'MM_ADD_EPI32')
			assert.strictEqual(c.convention, 'pure')
			assert.strictEqual(c.generics, 'none')
			assert.strictEqual(c.hasArrayParams, false)
			assert.strictEqual(c.hasArrayReturn, false)
			assert.deepStrictEqual(c.returnType, { kind: 'scalar', name: '__m128i' })
		})

		it('should classify a float load as reading with pointer generics', () => {
			const c = classify(
				makeIntrinsic({
					categories: [IntrinsicsCategory.Load],
					name: '_mm_load_ps',
					params: [{ name: 'mem_addr', rawType: 'float const*' }],
					returnType: '__m128',
				}),
				table
			)
			assert.strictEqual(c.convention, 'reading')
			assert.strictEqual(c.generics, 'pointer')
			assert.deepStrictEqual(
				c.arrayParams.map((p) => p.name),
				['mem_addr']
			)
			assert.deepStrictEqual(
				c.offsetParams.map((p) => p.name),
				['mem_addrOffset']
			)
		})

		it('should classify a store as writing', () => {
			const c = classify(
				makeIntrinsic({
					categories: [IntrinsicsCategory.Store],
					name: '_mm_store_ps',
					params: [
						{ name: 'mem_addr', rawType: 'float*' },
						{ name: 'a', rawType: '__m128' },
					],
					returnType: 'void',
				}),
				table
			)
			assert.strictEqual(c.convention, 'writing')
		})

		it('should prefer reading over writing for loads with array parameters', () => {
			const c = classify(
				makeIntrinsic({
					categories: [IntrinsicsCategory.Load, IntrinsicsCategory.Store],
					params: [{ name: 'p', rawType: 'int*' }],
				}),
				table
			)
			assert.strictEqual(c.convention, 'reading')
		})

		it('should classify an array return as constructing ahead of everything else', () => {
			const c = classify(
				makeIntrinsic({
					categories: [IntrinsicsCategory.Load],
					name: '_mm_malloc',
					params: [
						{ name: 'size', rawType: 'size_t' },
						{ name: 'align', rawType: 'size_t' },
					],
					returnType: 'void*',
				}),
				table
			)
			assert.strictEqual(c.convention, 'constructing')
			assert.strictEqual(c.hasArrayReturn, true)
			assert.strictEqual(c.hasVoidPointerReturn, true)
			assert.strictEqual(c.generics, 'none')
		})

		it('should classify a void return without arrays as effectful', () => {
			const c = classify(makeIntrinsic({ name: '_mm_sfence', params: [], returnType: 'void' }), table)
			assert.strictEqual(c.convention, 'effectful')
			assert.strictEqual(c.generics, 'none')
		})

		it('should require the element type parameter for void pointer arguments', () => {
			const c = classify(
				makeIntrinsic({
					categories: [IntrinsicsCategory.Store],
					name: '_mm_stream_si128',
					params: [
						{ name: 'mem_addr', rawType: 'void*' },
						{ name: 'a', rawType: '__m128i' },
					],
					returnType: 'void',
				}),
				table
			)
			assert.strictEqual(c.hasVoidPointerParams, true)
			assert.strictEqual(c.generics, 'voidPointer')
		})

		it('should give a typed array return pointer generics', () => {
			const c = classify(makeIntrinsic({ params: [], returnType: 'float*' }), table)
			assert.strictEqual(c.convention, 'constructing')
			assert.strictEqual(c.generics, 'pointer')
		})

		it('should give reading intrinsics a container even without arrays', () => {
			const c = classify(
				makeIntrinsic({ categories: [IntrinsicsCategory.Load], params: [{ name: 'a', rawType: 'int' }] }),
				table
			)
			assert.strictEqual(c.convention, 'reading')
			assert.strictEqual(c.generics, 'pointer')
		})
	})
})
