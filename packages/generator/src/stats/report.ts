/**
 * Statistics report written beside each generated instruction set.
 */

import type { Classification } from '../classify/classifier.ts'
import type { GenerationContext } from '../core/context.ts'

export interface UnitStats {
	readonly unit: string
	/** One line per intrinsic worth a second look */
	readonly warnings: readonly string[]
	/** Intrinsics that write through a pointer argument, in unit order */
	readonly pointerIntrinsics: readonly string[]
}

export function warningLines(c: Classification): string[] {
	const lines: string[] = []
	const { name } = c.intrinsic
	if (c.arrayParams.length > 1) {
		lines.push(`Intrinsic ${name} has ${c.arrayParams.length} pointer arguments`)
	}
	if (c.hasVoidPointerReturn) {
		lines.push(`Intrinsic ${name} has untyped pointer return type`)
	}
	return lines
}

export function unitStats(unit: string, classifications: readonly Classification[]): UnitStats {
	return {
		pointerIntrinsics: classifications.filter((c) => c.convention === 'writing').map((c) => c.intrinsic.name),
		unit,
		warnings: classifications.flatMap(warningLines),
	}
}

function pointerSection(stats: UnitStats): string[] {
	return [`Number of intrinsics with pointer arguments: ${stats.pointerIntrinsics.length}`, ...stats.pointerIntrinsics]
}

/**
 * Report for one instruction set. A split set lists each sub-unit after
 * the total.
 *
 * ```
 * SSE2 statistics:
 *
 *
 * Intrinsic _mm_maskmoveu_si128 has 2 pointer arguments
 * Number of SSE2 intrinsics: 12
 * Number of intrinsics with pointer arguments: 1
 * _mm_maskmoveu_si128
 * ```
 */
export function formatIsaStats(isa: string, total: number, units: readonly UnitStats[], split: boolean): string {
	const lines = [`${isa} statistics:`, '', '']

	if (!split) {
		for (const stats of units) {
			lines.push(...stats.warnings, `Number of ${isa} intrinsics: ${total}`, ...pointerSection(stats))
		}
	} else {
		lines.push(`Number of ${isa} intrinsics: ${total}`)
		for (const stats of units) {
			lines.push('', `${stats.unit}:`, ...stats.warnings, ...pointerSection(stats))
		}
	}

	return `${lines.join('\n')}\n`
}

/**
 * Surface the same findings as warnings on the run.
 */
export function reportPointerWarnings(ctx: GenerationContext, classifications: readonly Classification[]): void {
	for (const c of classifications) {
		const { location, name } = c.intrinsic
		if (c.arrayParams.length > 1) {
			ctx.emit('SGGEN050', location, { count: c.arrayParams.length, record: name })
		}
		if (c.hasVoidPointerReturn) {
			ctx.emit('SGGEN051', location, { record: name })
		}
	}
}
