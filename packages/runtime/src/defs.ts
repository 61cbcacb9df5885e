import type { Container, ContainerKind } from './container.ts'
import type { Exp, Sym } from './exp.ts'
import type { IntrinsicsCategory, IntrinsicsType, PerformanceMap } from './metadata.ts'
import type { Integral, Typ } from './types.ts'

/**
 * A definition in the expression graph, tagged by `kind`.
 */
export interface Def<T> {
	readonly kind: string
	readonly typ: Typ<T>
}

export interface IntrinsicsDef<T> extends Def<T> {
	readonly category: readonly IntrinsicsCategory[]
	readonly intrinsicType: readonly IntrinsicsType[]
	readonly performance: PerformanceMap
	readonly header: string
}

/**
 * An intrinsic touching memory through a container, addressed with offsets of type U.
 */
export interface PointerIntrinsicsDef<A extends ContainerKind, U extends Integral, T>
	extends IntrinsicsDef<T> {
	readonly integralType: Typ<U>
	readonly cont: Container<A>
}

/**
 * A pointer intrinsic with untyped (`void*`) arguments whose element type is V.
 */
export interface VoidPointerIntrinsicsDef<A extends ContainerKind, V, U extends Integral, T>
	extends PointerIntrinsicsDef<A, U, T> {
	readonly voidType: Typ<V>
}

/**
 * Effect summary recorded when a definition is reflected. `writes` holds the
 * symbols the definition writes into.
 */
export interface Summary {
	readonly mutable: boolean
	readonly simple: boolean
	readonly writes: readonly Sym<unknown>[]
}

export const PURE_SUMMARY: Summary = { mutable: false, simple: false, writes: [] }

/**
 * A definition wrapped with its effect summary `summary` and dependencies `deps`.
 */
export interface Reflect<T> extends Def<T> {
	readonly kind: 'Reflect'
	readonly node: Def<T>
	readonly summary: Summary
	readonly deps: readonly Exp<unknown>[]
}

export function Reflect<T>(node: Def<T>, summary: Summary, deps: readonly Exp<unknown>[]): Reflect<T> {
	return { deps, kind: 'Reflect', node, summary, typ: node.typ }
}

export function isReflect(def: Def<unknown>): def is Reflect<unknown> {
	return def.kind === 'Reflect'
}
