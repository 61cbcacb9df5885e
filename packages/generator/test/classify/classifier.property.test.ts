import { describe, it } from 'node:test'
import fc from 'fast-check'

import { IntrinsicsCategory } from '@simdgen/runtime'

import { CALLING_CONVENTIONS, type CallingConvention, classify } from '../../src/classify/classifier.ts'
import { loadTypeTable } from '../../src/types/mapping.ts'
import { makeIntrinsic } from '../fixtures.ts'

const table = loadTypeTable()
const rawTypes = table.rawTypes()

const intrinsicArb = fc
	.record({
		categories: fc.uniqueArray(fc.constantFrom(...Object.values(IntrinsicsCategory)), {
			maxLength: 3,
			minLength: 1,
		}),
		paramTypes: fc.array(fc.constantFrom(...rawTypes.filter((t) => t !== 'void')), { maxLength: 4 }),
		returnType: fc.constantFrom(...rawTypes),
	})
	.map(({ categories, paramTypes, returnType }) =>
		makeIntrinsic({
			categories,
			params: paramTypes.map((rawType, i) => ({ name: `p${i}`, rawType })),
			returnType,
		})
	)

/**
 * Bucket by the documented precedence, written independently of the classifier.
 */
function expectedConvention(returnArray: boolean, load: boolean, arrays: number, unit: boolean): CallingConvention {
	if (returnArray) return 'constructing'
	if (load) return 'reading'
	if (arrays > 0) return 'writing'
	if (unit) return 'effectful'
	return 'pure'
}

describe('classify/classifier properties', () => {
	it('assigns exactly one convention, following precedence', () => {
		fc.assert(
			fc.property(intrinsicArb, (intrinsic) => {
				const c = classify(intrinsic, table)
				const returnType = table.resolve(intrinsic.returnType, intrinsic.name)
				const arrays = intrinsic.params.filter((p) => table.lookup(p.rawType)?.kind === 'array').length
				const expected = expectedConvention(
					returnType.kind === 'array',
					intrinsic.categories.includes(IntrinsicsCategory.Load),
					arrays,
					returnType.kind === 'scalar' && returnType.name === 'Unit'
				)
				return CALLING_CONVENTIONS.includes(c.convention) && c.convention === expected
			})
		)
	})

	it('never drops generics from a node with array parameters', () => {
		fc.assert(
			fc.property(intrinsicArb, (intrinsic) => {
				const c = classify(intrinsic, table)
				return !c.hasArrayParams || c.generics !== 'none'
			})
		)
	})

	it('asks for the element type exactly when a parameter is an untyped pointer', () => {
		fc.assert(
			fc.property(intrinsicArb, (intrinsic) => {
				const c = classify(intrinsic, table)
				return (c.generics === 'voidPointer') === c.hasVoidPointerParams
			})
		)
	})

	it('pairs offsets with array parameters', () => {
		fc.assert(
			fc.property(intrinsicArb, (intrinsic) => {
				const c = classify(intrinsic, table)
				return (
					c.offsetParams.length === c.arrayParams.length &&
					c.arrayParams.every((p, i) => c.offsetParams[i]?.name === `${p.name}Offset`)
				)
			})
		)
	})
})
