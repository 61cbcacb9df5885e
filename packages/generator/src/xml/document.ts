import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

import type { GenerationContext } from '../core/context.ts'
import type { RecordSpan } from './scanner.ts'

/**
 * An element of one record. Offsets are relative to the record start.
 */
export interface XmlElement {
	readonly kind: 'element'
	readonly name: string
	readonly attributes: ReadonlyMap<string, string>
	readonly children: readonly XmlNode[]
	readonly offset: number
}

export interface XmlText {
	readonly kind: 'text'
	readonly text: string
}

export type XmlNode = XmlElement | XmlText

/**
 * A parsed record and the source offset it starts at.
 */
export interface XmlRecord {
	readonly element: XmlElement
	readonly base: number
}

/**
 * Grammar for a single record element.
 *
 * Every rule is lexical: whitespace is significant inside text content.
 */
const grammarSource = String.raw`
IntrinsicRecord {
  record = space* element space*

  element = emptyElement | fullElement
  emptyElement = "<" name attribute* space* "/>"
  fullElement = "<" name attribute* space* ">" content* "</" name space* ">"

  attribute = space+ name space* "=" space* attributeValue
  attributeValue = "\"" (~"\"" any)* "\""  -- double
                 | "'" (~"'" any)* "'"  -- single

  content = comment | cdata | instruction | element | text
  comment = "<!--" (~"-->" any)* "-->"
  cdata = "<![CDATA[" (~"]]>" any)* "]]>"
  instruction = "<?" (~"?>" any)* "?>"
  text = (~"<" any)+

  name = nameStart nameChar*
  nameStart = letter | "_" | ":"
  nameChar = alnum | "_" | ":" | "-" | "."
}
`

export const IntrinsicRecordGrammar = ohm.grammar(grammarSource)

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
	amp: '&',
	apos: "'",
	gt: '>',
	lt: '<',
	quot: '"',
}

/** Largest Unicode code point */
const MAX_CODE_POINT = 0x10ffff

/**
 * Replace predefined and numeric character references. Unknown named
 * references are kept as written; a numeric reference outside Unicode is
 * handed to `invalid` with its offset in `text`, and its result replaces it.
 */
export function decodeEntities(text: string, invalid: (reference: string, offset: number) => string): string {
	return text.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (whole: string, ref: string, offset: number) => {
		if (!ref.startsWith('#')) return NAMED_ENTITIES[ref] ?? whole
		const codePoint = ref.startsWith('#x') ? Number.parseInt(ref.slice(2), 16) : Number.parseInt(ref.slice(1), 10)
		return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : invalid(whole, offset)
	})
}

function createSemantics(ctx: GenerationContext, base: number): Semantics {
	const semantics = IntrinsicRecordGrammar.createSemantics()

	function toAttributes(attributes: Node): Map<string, string> {
		const entries: [string, string][] = attributes.children.map((a: Node) => a['toAttribute']())
		return new Map(entries)
	}

	function decode(node: Node): string {
		return decodeEntities(node.sourceString, (reference, offset) =>
			ctx.fail('SGXML001', ctx.locate(base + node.source.startIdx + offset), {
				detail: `invalid character reference ${reference}`,
			})
		)
	}

	function toChildren(contents: Node): XmlNode[] {
		const nodes: (XmlNode | null)[] = contents.children.map((c: Node) => c['toNode']())
		return nodes.filter((n): n is XmlNode => n !== null)
	}

	semantics.addOperation<[string, string]>('toAttribute', {
		attribute(_space: Node, name: Node, _s1: Node, _eq: Node, _s2: Node, value: Node) {
			return [name.sourceString, value['toValue']()]
		},
	})

	semantics.addOperation<string>('toValue', {
		attributeValue_double(_open: Node, chars: Node, _close: Node) {
			return decode(chars)
		},
		attributeValue_single(_open: Node, chars: Node, _close: Node) {
			return decode(chars)
		},
	})

	semantics.addOperation<XmlNode | null>('toNode', {
		cdata(_open: Node, chars: Node, _close: Node) {
			return { kind: 'text', text: chars.sourceString }
		},
		comment(_open: Node, _chars: Node, _close: Node) {
			return null
		},
		emptyElement(_open: Node, name: Node, attributes: Node, _space: Node, _close: Node) {
			return {
				attributes: toAttributes(attributes),
				children: [],
				kind: 'element',
				name: name.sourceString,
				offset: this.source.startIdx,
			}
		},
		fullElement(
			_open: Node,
			name: Node,
			attributes: Node,
			_space: Node,
			_end: Node,
			contents: Node,
			_closeOpen: Node,
			closeName: Node,
			_closeSpace: Node,
			_close: Node
		) {
			if (closeName.sourceString !== name.sourceString) {
				ctx.fail('SGXML002', ctx.locate(base + closeName.source.startIdx - 2), {
					expected: name.sourceString,
					found: closeName.sourceString,
				})
			}
			return {
				attributes: toAttributes(attributes),
				children: toChildren(contents),
				kind: 'element',
				name: name.sourceString,
				offset: this.source.startIdx,
			}
		},
		instruction(_open: Node, _chars: Node, _close: Node) {
			return null
		},
		record(_leading: Node, element: Node, _trailing: Node) {
			return element['toNode']()
		},
		text(_chars: Node) {
			return { kind: 'text', text: decode(this) }
		},
	})

	return semantics
}

/**
 * Parse the record occupying `span`.
 */
export function parseRecordElement(ctx: GenerationContext, span: RecordSpan): XmlRecord {
	const input = ctx.source.slice(span.start, span.end)
	const matchResult = IntrinsicRecordGrammar.match(input)

	if (matchResult.failed()) {
		ctx.fail('SGXML001', ctx.locate(span.start), {
			detail: matchResult.shortMessage ?? 'unexpected input',
		})
	}

	const element: XmlElement = createSemantics(ctx, span.start)(matchResult)['toNode']()
	return { base: span.start, element }
}

// =============================================================================
// QUERIES
// =============================================================================

export function childElements(element: XmlElement, name: string): XmlElement[] {
	return element.children.filter((c): c is XmlElement => c.kind === 'element' && c.name === name)
}

/**
 * Concatenated text of an element and its descendants.
 */
export function textContent(node: XmlNode): string {
	if (node.kind === 'text') return node.text
	return node.children.map(textContent).join('')
}

/**
 * Text of every direct child element named `name`, in document order.
 */
export function childTexts(element: XmlElement, name: string): string[] {
	return childElements(element, name).map(textContent)
}
