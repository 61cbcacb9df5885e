import type { Typ } from './types.ts'

export interface Const<T> {
	readonly tag: 'const'
	readonly value: T
}

export interface Sym<T> {
	readonly tag: 'sym'
	readonly id: number
	readonly typ: Typ<T>
}

/**
 * A staged value: a literal or a reference to a bound definition.
 */
export type Exp<T> = Const<T> | Sym<T>

export function Const<T>(value: T): Const<T> {
	return { tag: 'const', value }
}

export function isSym<T>(e: Exp<T>): e is Sym<T> {
	return e.tag === 'sym'
}

/**
 * True only for a literal zero. A symbol whose runtime value happens to be
 * zero is not a constant and does not qualify.
 */
export function isConstZero(e: Exp<unknown>): boolean {
	return e.tag === 'const' && (e.value === 0 || e.value === 0n)
}
