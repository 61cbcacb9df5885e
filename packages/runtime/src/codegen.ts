import { type Def, isReflect } from './defs.ts'
import { type Exp, isConstZero, type Sym } from './exp.ts'
import type { ExpressionGraph } from './staging.ts'
import { remap } from './types.ts'

/**
 * Lowers one definition; returns false when the definition is not its own.
 */
export type NodeEmitter = (cg: CodegenContext, sym: Sym<unknown>, rhs: Def<unknown>) => boolean

export class EmitError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'EmitError'
	}
}

function formatConst(value: unknown): string {
	switch (typeof value) {
		case 'number':
			return String(value)
		case 'bigint':
			return `${value}LL`
		case 'boolean':
			return value ? '1' : '0'
		case 'string':
			return JSON.stringify(value)
		default:
			throw new EmitError(`cannot quote constant of type ${typeof value}`)
	}
}

/**
 * Output buffer and helpers for C emission rules.
 */
export class CodegenContext {
	/** Headers the emitted code must include, in first-use order. */
	readonly headers: Set<string> = new Set()

	private readonly lines: string[] = []

	quote(e: Exp<unknown>): string {
		return e.tag === 'sym' ? `x${e.id}` : formatConst(e.value)
	}

	/**
	 * `base + offset`, or just `base` when the offset is a literal zero.
	 */
	quoteWithOffset(base: Exp<unknown>, offset: Exp<unknown>): string {
		if (isConstZero(offset)) return this.quote(base)
		return `${this.quote(base)} + ${this.quote(offset)}`
	}

	emitValDef(sym: Sym<unknown>, rhs: string): void {
		this.lines.push(`${remap(sym.typ)} ${this.quote(sym)} = ${rhs};`)
	}

	println(line: string): void {
		this.lines.push(line)
	}

	/**
	 * Lower every binding of `graph`, unwrapping effect wrappers first.
	 */
	emitGraph(graph: ExpressionGraph, emitters: readonly NodeEmitter[]): void {
		for (const [sym, def] of graph.entries()) {
			const rhs = isReflect(def) ? def.node : def
			if (!emitters.some((emit) => emit(this, sym, rhs))) {
				throw new EmitError(`no emission rule for ${rhs.kind}`)
			}
		}
	}

	getLines(): readonly string[] {
		return this.lines
	}

	toString(): string {
		const includes = [...this.headers].map((header) => `#include <${header}>`)
		return [...includes, ...(includes.length > 0 ? [''] : []), ...this.lines].join('\n')
	}
}
