/**
 * Line-oriented source builder for generated units. Indents with tabs.
 */
export class SourceWriter {
	private readonly lines: string[] = []
	private depth = 0

	line(text = ''): this {
		this.lines.push(text === '' ? '' : `${'\t'.repeat(this.depth)}${text}`)
		return this
	}

	/**
	 * Write `open`, the body one level deeper, then `close`.
	 */
	block(open: string, body: () => void, close = '}'): this {
		this.line(open)
		this.depth++
		body()
		this.depth--
		return this.line(close)
	}

	docComment(lines: readonly string[]): this {
		if (lines.length === 0) return this
		this.line('/**')
		for (const text of lines) {
			this.line(text === '' ? ' *' : ` * ${text.replace(/\*\//g, '*\\/')}`)
		}
		return this.line(' */')
	}

	toString(): string {
		return `${this.lines.join('\n')}\n`
	}
}

/**
 * Greedy word wrap. Runs of whitespace collapse to one space; a word longer
 * than `width` gets a line of its own.
 */
export function wrapText(text: string, width: number): string[] {
	const words = text.split(/\s+/).filter((w) => w !== '')
	const lines: string[] = []
	let current = ''

	for (const word of words) {
		if (current === '') {
			current = word
		} else if (current.length + 1 + word.length <= width) {
			current = `${current} ${word}`
		} else {
			lines.push(current)
			current = word
		}
	}

	if (current !== '') lines.push(current)
	return lines
}
