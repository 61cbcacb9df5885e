/**
 * Generation pipeline
 *
 * database → records → intrinsics → per instruction set, in order:
 * dedup → classify → plan → IR and emission units + statistics.
 */

import { type Classification, classify } from './classify/classifier.ts'
import { cgenUnitName, renderCGenUnit } from './codegen/cgen-unit.ts'
import { renderIrUnit, type UnitOptions } from './codegen/ir-unit.ts'
import { renderCGenUmbrella, renderIrUmbrella } from './codegen/umbrella.ts'
import { type GenerateOptions, type ResolvedOptions, resolveOptions } from './config.ts'
import { GenerationContext } from './core/context.ts'
import type { DiagnosticSeverity } from './core/diagnostics.ts'
import { type Intrinsic, NO_LOCATION } from './core/intrinsic.ts'
import { parseIntrinsics } from './parse/record.ts'
import {
	type EmittedNames,
	type IsaSelection,
	NO_EMITTED_NAMES,
	planIsa,
	planUnits,
	selectIsa,
	validateCap,
} from './partition/partition.ts'
import { formatIsaStats, reportPointerWarnings, unitStats } from './stats/report.ts'
import { readDatabase } from './xml/index.ts'

export interface GeneratedFile {
	/** Path relative to the output directory */
	readonly path: string
	readonly unit: string
	readonly role: 'ir' | 'cgen'
	readonly source: string
}

export interface IsaOutput {
	readonly isa: string
	readonly intrinsicCount: number
	/** Generated units, umbrella last when the set was split */
	readonly units: readonly string[]
	readonly split: boolean
	readonly files: readonly GeneratedFile[]
	/** Statistics report text */
	readonly stats: string
}

export interface GenerateWarning {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly line: number
	readonly column: number
	readonly formattedMessage: string
}

export interface GenerateResult {
	readonly isas: readonly IsaOutput[]
	/** Every parsed record, including ones no unit generated */
	readonly intrinsics: readonly Intrinsic[]
	readonly warnings: readonly GenerateWarning[]
}

function unitOptions(options: ResolvedOptions): UnitOptions {
	return { importExtension: options.importExtension, runtimeModule: options.runtimeModule }
}

function unitFiles(unit: string, ir: string, cgen: string): GeneratedFile[] {
	return [
		{ path: `${unit}.ts`, role: 'ir', source: ir, unit },
		{ path: `${cgenUnitName(unit)}.ts`, role: 'cgen', source: cgen, unit },
	]
}

/**
 * Consistency checks on IR node names within one instruction set.
 */
function checkNodeNames(ctx: GenerationContext, classifications: readonly Classification[]): void {
	const owners = new Map<string, string>()
	for (const c of classifications) {
		const { location, name } = c.intrinsic
		if (c.defName === name) {
			ctx.fail('SGGEN001', location, { node: c.defName, record: name })
		}
		const other = owners.get(c.defName)
		if (other !== undefined) {
			ctx.fail('SGGEN003', location, { node: c.defName, other, record: name })
		}
		owners.set(c.defName, name)
	}
}

/**
 * Generate every unit of one instruction set from its already deduplicated
 * intrinsics. `unitAvailable` decides whether an extension unit is composed.
 */
export function generateIsa(
	ctx: GenerationContext,
	isa: string,
	intrinsics: readonly Intrinsic[],
	options: ResolvedOptions,
	unitAvailable: (unit: string) => boolean = options.unitExists
): IsaOutput {
	const classifications = intrinsics.map((intrinsic) => classify(intrinsic, options.typeTable))
	checkNodeNames(ctx, classifications)
	reportPointerWarnings(ctx, classifications)

	const render = unitOptions(options)
	const plan = planIsa(isa, classifications, {
		cap: options.cap,
		extensionUnits: options.extensionUnits,
		unitAvailable,
	})
	const slices = plan.kind === 'single' ? [plan.unit] : plan.units

	const files = slices.flatMap((slice) =>
		unitFiles(slice.name, renderIrUnit(slice.name, slice.items, render), renderCGenUnit(slice.name, slice.items, render))
	)
	if (plan.kind === 'split') {
		const parts = [...plan.units.map((u) => u.name), ...plan.extensions]
		files.push(...unitFiles(isa, renderIrUmbrella(isa, parts, render), renderCGenUmbrella(isa, parts, render)))
	}

	return {
		files,
		intrinsicCount: intrinsics.length,
		isa,
		split: plan.kind === 'split',
		stats: formatIsaStats(
			isa,
			intrinsics.length,
			slices.map((slice) => unitStats(slice.name, slice.items)),
			plan.kind === 'split'
		),
		units: planUnits(plan),
	}
}

function reportSkipped(ctx: GenerationContext, selection: IsaSelection): void {
	for (const { intrinsic, previous } of selection.skipped) {
		ctx.emit('SGGEN053', intrinsic.location, { isa: selection.isa, previous, record: intrinsic.name })
	}
}

/**
 * Warn about instruction sets present in the database but missing from the order.
 */
function reportUnlistedIsas(ctx: GenerationContext, intrinsics: readonly Intrinsic[], order: readonly string[]): void {
	const listed = new Set(order)
	const counts = new Map<string, number>()
	for (const { tech } of intrinsics) {
		if (!listed.has(tech)) counts.set(tech, (counts.get(tech) ?? 0) + 1)
	}
	for (const [isa, count] of counts) {
		ctx.emit('SGGEN052', NO_LOCATION, { count, isa })
	}
}

function collectWarnings(ctx: GenerationContext): GenerateWarning[] {
	return ctx.getWarnings().map((d) => ({
		code: d.def.code,
		column: d.column,
		formattedMessage: ctx.formatDiagnostic(d),
		line: d.line,
		message: d.message,
		severity: d.def.severity,
	}))
}

/**
 * Parse the database and validate every record.
 *
 * @throws {GenerateError} On the first malformed record
 */
export function readIntrinsics(ctx: GenerationContext, options: ResolvedOptions): Intrinsic[] {
	return parseIntrinsics(ctx, readDatabase(ctx), options.typeTable)
}

/**
 * Generate every instruction set of a database.
 *
 * @param source - Database XML text
 * @throws {GenerateError} If the database is malformed or inconsistent
 */
export function generate(source: string, options: GenerateOptions = {}): GenerateResult {
	const resolved = resolveOptions(options)
	validateCap(resolved.cap)

	const ctx = new GenerationContext(source, resolved.filename)
	const intrinsics = readIntrinsics(ctx, resolved)
	reportUnlistedIsas(ctx, intrinsics, resolved.isaOrder)

	const generatedUnits = new Set<string>()
	const unitAvailable = (unit: string): boolean => generatedUnits.has(unit) || resolved.unitExists(unit)

	let emitted: EmittedNames = NO_EMITTED_NAMES
	const isas: IsaOutput[] = []
	for (const isa of resolved.isaOrder) {
		const selection = selectIsa(isa, intrinsics, emitted)
		emitted = selection.emitted
		reportSkipped(ctx, selection)

		const output = generateIsa(ctx, isa, selection.selected, resolved, unitAvailable)
		for (const unit of output.units) generatedUnits.add(unit)
		isas.push(output)
	}

	return { intrinsics, isas, warnings: collectWarnings(ctx) }
}

export interface InspectResult {
	readonly intrinsic: Intrinsic
	readonly classification: Classification
}

/**
 * Parsed and classified view of the first record named `name`.
 */
export function inspectIntrinsic(
	source: string,
	name: string,
	options: GenerateOptions = {}
): InspectResult | undefined {
	const resolved = resolveOptions(options)
	const ctx = new GenerationContext(source, resolved.filename)
	const intrinsic = readIntrinsics(ctx, resolved).find((i) => i.name === name)
	if (intrinsic === undefined) return undefined
	return { classification: classify(intrinsic, resolved.typeTable), intrinsic }
}
