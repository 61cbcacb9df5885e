/**
 * ISA Partitioner
 *
 * Groups intrinsics by instruction set, drops names an earlier group
 * already generated, and splits groups that reach the unit cap into
 * numbered sub-units behind an umbrella unit.
 *
 * The set of generated names is threaded through explicitly: each call
 * takes the names emitted so far and returns the extended map.
 */

import { raise } from '../core/context.ts'
import type { Intrinsic } from '../core/intrinsic.ts'

/**
 * Intrinsic name → instruction set that generated it.
 */
export type EmittedNames = ReadonlyMap<string, string>

export const NO_EMITTED_NAMES: EmittedNames = new Map()

export interface SkippedIntrinsic {
	readonly intrinsic: Intrinsic
	/** Instruction set that already generated this name */
	readonly previous: string
}

export interface IsaSelection {
	readonly isa: string
	/** Intrinsics of the group, first occurrence of each name, in database order */
	readonly selected: readonly Intrinsic[]
	readonly skipped: readonly SkippedIntrinsic[]
	readonly emitted: EmittedNames
}

export function selectIsa(isa: string, intrinsics: readonly Intrinsic[], emitted: EmittedNames): IsaSelection {
	const next = new Map(emitted)
	const selected: Intrinsic[] = []
	const skipped: SkippedIntrinsic[] = []

	for (const intrinsic of intrinsics) {
		if (intrinsic.tech !== isa) continue
		const previous = next.get(intrinsic.name)
		if (previous !== undefined) {
			skipped.push({ intrinsic, previous })
			continue
		}
		next.set(intrinsic.name, isa)
		selected.push(intrinsic)
	}

	return { emitted: next, isa, selected, skipped }
}

/**
 * Consecutive slices of `size` items; the last may be shorter.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
	const chunks: T[][] = []
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size))
	}
	return chunks
}

export function validateCap(cap: number): number {
	if (!Number.isInteger(cap) || cap < 1) {
		raise('SGGEN002', { cap: String(cap) })
	}
	return cap
}

export function subUnitName(isa: string, index: number): string {
	return `${isa}0${index}`
}

export interface UnitSlice<T> {
	readonly name: string
	readonly items: readonly T[]
}

export type IsaPlan<T> =
	| { readonly kind: 'single'; readonly isa: string; readonly unit: UnitSlice<T> }
	| {
			readonly kind: 'split'
			readonly isa: string
			readonly units: readonly UnitSlice<T>[]
			/** Units the umbrella composes after the sub-units */
			readonly extensions: readonly string[]
	  }

export interface PlanOptions {
	readonly cap: number
	/** Instruction set → extension unit its umbrella also composes */
	readonly extensionUnits: ReadonlyMap<string, string>
	/** Whether a unit of that name exists, in this run or already on disk */
	readonly unitAvailable: (unit: string) => boolean
}

/**
 * Below the cap one unit; at or above it `ceil(n / cap)` sub-units plus
 * an umbrella.
 */
export function planIsa<T>(isa: string, items: readonly T[], options: PlanOptions): IsaPlan<T> {
	const cap = validateCap(options.cap)
	if (items.length < cap) {
		return { isa, kind: 'single', unit: { items, name: isa } }
	}

	const units = chunk(items, cap).map((slice, index) => ({
		items: slice,
		name: subUnitName(isa, index),
	}))
	const extension = options.extensionUnits.get(isa)
	const extensions = extension !== undefined && options.unitAvailable(extension) ? [extension] : []

	return { extensions, isa, kind: 'split', units }
}

/**
 * Names of every unit a plan produces, umbrella last.
 */
export function planUnits<T>(plan: IsaPlan<T>): string[] {
	if (plan.kind === 'single') return [plan.unit.name]
	return [...plan.units.map((u) => u.name), plan.isa]
}
