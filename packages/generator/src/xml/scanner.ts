/**
 * Record scanner.
 *
 * Finds each <intrinsic> element in the database so the grammar only ever
 * matches one record at a time. Comments, CDATA sections and processing
 * instructions between records are skipped.
 */

import type { GenerationContext } from '../core/context.ts'

export const RECORD_ELEMENT = 'intrinsic'

/**
 * Half-open character range [start, end) of one record in the source.
 */
export interface RecordSpan {
	readonly start: number
	readonly end: number
}

const SKIPPED_SECTIONS: readonly (readonly [string, string])[] = [
	['<!--', '-->'],
	['<![CDATA[', ']]>'],
	['<?', '?>'],
	['<!', '>'],
]

function isNameBoundary(char: string | undefined): boolean {
	return char === undefined || char === '>' || char === '/' || /\s/.test(char)
}

function opensRecord(source: string, pos: number): boolean {
	return (
		source.startsWith(`<${RECORD_ELEMENT}`, pos) &&
		isNameBoundary(source[pos + RECORD_ELEMENT.length + 1])
	)
}

/**
 * Index just past the `>` closing the start tag at `pos`, honoring quoted values.
 */
function findTagEnd(source: string, pos: number): number {
	let quote: string | null = null
	for (let i = pos; i < source.length; i++) {
		const char = source[i]
		if (quote !== null) {
			if (char === quote) quote = null
		} else if (char === '"' || char === "'") {
			quote = char
		} else if (char === '>') {
			return i + 1
		}
	}
	return -1
}

function findRecordEnd(source: string, tagEnd: number): number {
	if (source[tagEnd - 2] === '/') return tagEnd
	const closing = new RegExp(`</${RECORD_ELEMENT}\\s*>`, 'g')
	closing.lastIndex = tagEnd
	const match = closing.exec(source)
	return match === null ? -1 : match.index + match[0].length
}

function skipSection(ctx: GenerationContext, pos: number): number | null {
	const { source } = ctx
	for (const [open, close] of SKIPPED_SECTIONS) {
		if (!source.startsWith(open, pos)) continue
		const end = source.indexOf(close, pos + open.length)
		if (end === -1) {
			ctx.fail('SGXML001', ctx.locate(pos), { detail: `unterminated ${open} section` })
		}
		return end + close.length
	}
	return null
}

export function scanRecords(ctx: GenerationContext): RecordSpan[] {
	const { source } = ctx
	const spans: RecordSpan[] = []
	let pos = source.indexOf('<')

	while (pos !== -1) {
		const skipped = skipSection(ctx, pos)
		if (skipped !== null) {
			pos = source.indexOf('<', skipped)
			continue
		}

		if (!opensRecord(source, pos)) {
			pos = source.indexOf('<', pos + 1)
			continue
		}

		const tagEnd = findTagEnd(source, pos)
		const end = tagEnd === -1 ? -1 : findRecordEnd(source, tagEnd)
		if (end === -1) {
			ctx.fail('SGXML001', ctx.locate(pos), { detail: `unterminated <${RECORD_ELEMENT}> element` })
		}
		spans.push({ end, start: pos })
		pos = source.indexOf('<', end)
	}

	return spans
}
