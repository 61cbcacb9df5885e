import type { Def } from './defs.ts'
import type { Exp } from './exp.ts'
import type { Staging, Transformer } from './staging.ts'

/**
 * Storage representations addressable by pointer intrinsics, keyed by name.
 * Augment this interface to register another representation.
 */
export interface ContainerKinds<T> {
	Array: readonly T[]
}

export type ContainerKind = keyof ContainerKinds<unknown>

/**
 * The storage type of kind A holding elements of type T.
 */
export type Kind<A extends ContainerKind, T> = ContainerKinds<T>[A]

/**
 * Capability set a storage representation provides to pointer intrinsics:
 * tracked reads, tracked writes, and transformation under rewrite. Reads and
 * writes bind into the graph `ir` they are given.
 */
export interface Container<A extends ContainerKind> {
	readonly kind: A
	read<R>(ir: Staging, sources: readonly Exp<Kind<A, unknown>>[], def: Def<R>): Exp<R>
	write<R>(ir: Staging, targets: readonly Exp<Kind<A, unknown>>[], def: Def<R>): Exp<R>
	applyTransformer<T>(x: Exp<T>, f: Transformer): Exp<T>
}

/**
 * Contiguous arrays. Writes are reflected against their targets; reads are
 * bound as plain definitions.
 */
export const arrayContainer: Container<'Array'> = {
	applyTransformer: (x, f) => f(x),
	kind: 'Array',
	read: (ir, _sources, def) => ir.toAtom(def),
	write: (ir, targets, def) => ir.reflectWrite(targets, def),
}
