import { type Def, PURE_SUMMARY, Reflect, type Summary } from './defs.ts'
import { type Exp, isSym, type Sym } from './exp.ts'

/**
 * Substitution applied to sub-expressions while rewriting a node.
 */
export type Transformer = <T>(e: Exp<T>) => Exp<T>

/**
 * Hooks staged intrinsics use to bind their definitions.
 */
export interface Staging {
	/** Bind a definition without effects. */
	toAtom<T>(def: Def<T>): Exp<T>
	/** Bind a definition whose result may be mutated later. */
	reflectMutable<T>(def: Def<T>): Exp<T>
	/** Bind a definition with a global side effect. */
	reflectEffect<T>(def: Def<T>): Exp<T>
	/** Bind a definition that writes into `targets`. */
	reflectWrite<T>(targets: readonly Exp<unknown>[], def: Def<T>): Exp<T>
	/** Bind a rewritten, already-reflected definition. */
	reflectMirrored<T>(reflect: Reflect<T>): Exp<T>
	/** Carry an effect summary across a transformer. */
	mapOver(f: Transformer, summary: Summary): Summary
}

/**
 * Append-only expression graph. Symbol ids are dense indices into the
 * definition list; effectful definitions are also recorded in order.
 */
export class ExpressionGraph implements Staging {
	private readonly defs: Def<unknown>[] = []
	private readonly syms: Sym<unknown>[] = []
	private readonly effects: Sym<unknown>[] = []

	private bind<T>(def: Def<T>): Sym<T> {
		const sym: Sym<T> = { id: this.defs.length, tag: 'sym', typ: def.typ }
		this.defs.push(def)
		this.syms.push(sym)
		return sym
	}

	private reflect<T>(def: Def<T>, summary: Summary): Sym<T> {
		const sym = this.bind(Reflect(def, summary, [...this.effects]))
		this.effects.push(sym)
		return sym
	}

	toAtom<T>(def: Def<T>): Exp<T> {
		return this.bind(def)
	}

	reflectMutable<T>(def: Def<T>): Exp<T> {
		return this.reflect(def, { ...PURE_SUMMARY, mutable: true })
	}

	reflectEffect<T>(def: Def<T>): Exp<T> {
		return this.reflect(def, { ...PURE_SUMMARY, simple: true })
	}

	reflectWrite<T>(targets: readonly Exp<unknown>[], def: Def<T>): Exp<T> {
		const writes = targets.filter(isSym)
		return this.reflect(def, { ...PURE_SUMMARY, writes })
	}

	reflectMirrored<T>(reflect: Reflect<T>): Exp<T> {
		const sym = this.bind(reflect)
		this.effects.push(sym)
		return sym
	}

	mapOver(f: Transformer, summary: Summary): Summary {
		const writes = summary.writes.map((sym) => f(sym)).filter(isSym)
		return { ...summary, writes }
	}

	definitionOf<T>(sym: Sym<T>): Def<unknown> | undefined {
		return this.defs[sym.id]
	}

	/** Effectful symbols in binding order. */
	getEffects(): readonly Sym<unknown>[] {
		return this.effects
	}

	/** All bindings in order. */
	*entries(): IterableIterator<[Sym<unknown>, Def<unknown>]> {
		for (let i = 0; i < this.defs.length; i++) {
			const sym = this.syms[i]
			const def = this.defs[i]
			if (sym !== undefined && def !== undefined) yield [sym, def]
		}
	}

	count(): number {
		return this.defs.length
	}
}
