import assert from 'node:assert'
import { describe, it } from 'node:test'

import { GenerateError, GenerationContext, raise } from '../../src/core/context.ts'
import { DiagnosticSeverity } from '../../src/core/diagnostics.ts'
import { NO_LOCATION } from '../../src/core/intrinsic.ts'

describe('core/context', () => {
	describe('GenerationContext', () => {
		it('should store source and filename', () => {
			const ctx = new GenerationContext('<a/>', 'data.xml')
			assert.strictEqual(ctx.source, '<a/>')
			assert.strictEqual(ctx.filename, 'data.xml')
		})

		it('should use default filename if not provided', () => {
			const ctx = new GenerationContext('')
			assert.strictEqual(ctx.filename, '<database>')
		})

		it('should start with no diagnostics', () => {
			const ctx = new GenerationContext('')
			assert.deepStrictEqual(ctx.getWarnings(), [])
		})
	})

	describe('locate', () => {
		const ctx = new GenerationContext('ab\ncd\n\nef')

		it('should map offsets on the first line', () => {
			assert.deepStrictEqual(ctx.locate(0), { column: 1, line: 1 })
			assert.deepStrictEqual(ctx.locate(1), { column: 2, line: 1 })
		})

		it('should map offsets after newlines', () => {
			assert.deepStrictEqual(ctx.locate(3), { column: 1, line: 2 })
			assert.deepStrictEqual(ctx.locate(4), { column: 2, line: 2 })
			assert.deepStrictEqual(ctx.locate(6), { column: 1, line: 3 })
			assert.deepStrictEqual(ctx.locate(8), { column: 2, line: 4 })
		})
	})

	describe('emit', () => {
		it('should interpolate the message and keep the location', () => {
			const ctx = new GenerationContext('')
			const diagnostic = ctx.emit('SGGEN050', { column: 3, line: 7 }, { count: 2, record: '_mm_foo' })
			assert.strictEqual(diagnostic.message, 'intrinsic _mm_foo has 2 pointer arguments')
			assert.strictEqual(diagnostic.line, 7)
			assert.strictEqual(diagnostic.column, 3)
			assert.strictEqual(diagnostic.def.severity, DiagnosticSeverity.Warning)
		})

		it('should count warnings and notes as warnings', () => {
			const ctx = new GenerationContext('')
			ctx.emit('SGXML050', NO_LOCATION)
			ctx.emit('SGGEN053', NO_LOCATION, { isa: 'SSE2', previous: 'SSE', record: '_mm_foo' })
			assert.deepStrictEqual(
				ctx.getWarnings().map((d) => d.def.code),
				['SGXML050', 'SGGEN053']
			)
		})
	})

	describe('fail', () => {
		it('should throw GenerateError with its code and the formatted diagnostic', () => {
			const ctx = new GenerationContext('<intrinsic name="x">', 'data.xml')
			assert.throws(
				() => ctx.fail('SGREC001', { column: 1, line: 1 }, { attribute: 'tech', element: 'intrinsic', record: 'x' }),
				(e: unknown) => {
					assert.ok(e instanceof GenerateError)
					assert.strictEqual(e.code, 'SGREC001')
					assert.deepStrictEqual(e.message.split('\n').slice(0, 2), [
						'error[SGREC001]: missing attribute "tech" on <intrinsic> in record x',
						'  --> data.xml:1:1',
					])
					return true
				}
			)
			assert.deepStrictEqual(ctx.getWarnings(), [])
		})
	})

	describe('raise', () => {
		it('should throw a one-line message without location', () => {
			assert.throws(() => raise('SGGEN002', { cap: 0 }), {
				message: 'error[SGGEN002]: unit cap must be a positive integer, got 0',
				name: 'GenerateError',
			})
		})
	})

	describe('formatDiagnostic', () => {
		it('should point at the column in the source line', () => {
			const ctx = new GenerationContext('<list>\n  <intrinsic name="_mm_x">\n</list>', 'data.xml')
			const diagnostic = ctx.emit(
				'SGREC001',
				{ column: 3, line: 2 },
				{ attribute: 'tech', element: 'intrinsic', record: '_mm_x' }
			)
			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				[
					'error[SGREC001]: missing attribute "tech" on <intrinsic> in record _mm_x',
					'  --> data.xml:2:3',
					'   | ',
					' 2 |   <intrinsic name="_mm_x">',
					'   |   ^',
					'   | ',
					'   = help: Add a tech="..." attribute to the <intrinsic> element.',
				].join('\n')
			)
		})

		it('should omit the source excerpt when there is no location', () => {
			const ctx = new GenerationContext('', 'data.xml')
			const diagnostic = ctx.emit('SGXML050', NO_LOCATION)
			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				'warning[SGXML050]: database contains no <intrinsic> records\n  --> data.xml'
			)
		})
	})
})
