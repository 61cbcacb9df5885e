/**
 * Generation context shared by every phase of one run.
 * Collects diagnostics and turns fatal ones into a GenerateError.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	SEVERITY_LABELS,
} from './diagnostics.ts'
import type { SourceLocation } from './intrinsic.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed, 0 when unknown) */
	readonly line: number
	/** Column number (1-indexed, 0 when unknown) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Fatal generation failure. Nothing produced by the run is usable.
 */
export class GenerateError extends Error {
	readonly code: string

	constructor(message: string, code: string) {
		super(message)
		this.name = 'GenerateError'
		this.code = code
	}
}

/**
 * Throw a GenerateError for a failure that has no position in the database.
 */
export function raise(code: DiagnosticCode, args?: DiagnosticArgs): never {
	const def = getDiagnostic(code)
	const label = SEVERITY_LABELS[def.severity]
	throw new GenerateError(`${label}[${def.code}]: ${interpolateMessage(def.message, args)}`, def.code)
}

export class GenerationContext {
	/** Database document text */
	readonly source: string

	/** Database filename for messages */
	readonly filename: string

	private readonly diagnostics: Diagnostic[] = []

	private lineStarts: number[] | null = null

	constructor(source: string, filename = '<database>') {
		this.source = source
		this.filename = filename
	}

	/**
	 * Record a diagnostic by code.
	 */
	emit(code: DiagnosticCode, location: SourceLocation, args?: DiagnosticArgs): Diagnostic {
		const def = getDiagnostic(code)
		const diagnostic: Diagnostic = {
			column: location.column,
			def,
			line: location.line,
			message: interpolateMessage(def.message, args),
			...(args ? { args } : {}),
		}
		this.diagnostics.push(diagnostic)
		return diagnostic
	}

	/**
	 * Record an error and abort the run.
	 */
	fail(code: DiagnosticCode, location: SourceLocation, args?: DiagnosticArgs): never {
		const diagnostic = this.emit(code, location, args)
		throw new GenerateError(this.formatDiagnostic(diagnostic), diagnostic.def.code)
	}

	/**
	 * Line and column of an offset into the source.
	 */
	locate(offset: number): SourceLocation {
		const starts = this.getLineStarts()
		let low = 0
		let high = starts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((starts[mid] ?? 0) <= offset) low = mid
			else high = mid - 1
		}
		return { column: offset - (starts[low] ?? 0) + 1, line: low + 1 }
	}

	private getLineStarts(): number[] {
		if (this.lineStarts !== null) return this.lineStarts
		const starts = [0]
		for (let i = 0; i < this.source.length; i++) {
			if (this.source.charCodeAt(i) === 10) starts.push(i + 1)
		}
		this.lineStarts = starts
		return starts
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity !== DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		if (line < 1) return undefined
		const starts = this.getLineStarts()
		const start = starts[line - 1]
		if (start === undefined) return undefined
		const end = starts[line] ?? this.source.length + 1
		return this.source.slice(start, end - 1).replace(/\r$/, '')
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[SGREC001]: missing attribute "tech" on <intrinsic> in record _mm_add_epi32
	 *   --> data.xml:12:1
	 *    |
	 * 12 | <intrinsic rettype="__m128i" name="_mm_add_epi32">
	 *    | ^
	 *    |
	 *    = help: Add a tech="..." attribute to the <intrinsic> element.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${SEVERITY_LABELS[def.severity]}[${def.code}]: ${diagnostic.message}`
		if (diagnostic.line === 0) {
			return `${header}\n  --> ${this.filename}`
		}
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(Math.max(0, diagnostic.column - 1))}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		if (def.suggestion) {
			lines.push(emptyPrefix, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}

		return lines.join('\n')
	}
}
