/**
 * IR unit template.
 *
 * Renders `<ISA>.ts`: node definitions, then dispatch operations, then the
 * mirror rules, in database order within each section.
 */

import type { Classification, TypedParameter } from '../classify/classifier.ts'
import { allParams } from '../core/intrinsic.ts'
import {
	allParameters,
	argumentList,
	baseInterface,
	enumList,
	implicitParameters,
	parameterList,
	parameterType,
	performanceLiteral,
	quoteString,
	RUNTIME_NAMESPACE,
	returnType,
	typeArguments,
	typeParameters,
	typTerm,
	wideTypeArguments,
} from './render.ts'
import { SourceWriter, wrapText } from './writer.ts'

export const GENERATED_BANNER = '// Generated by simdgen from the intrinsics database. Regenerate instead of editing.'

export const DOC_WIDTH = 78

export interface UnitOptions {
	/** Module the generated code imports the runtime from */
	readonly runtimeModule: string
	/** Extension written on imports between generated units */
	readonly importExtension: string
}

/**
 * Names a unit exports, derived from the unit name.
 */
export interface UnitNames {
	readonly guard: string
	readonly kinds: string
	readonly mirror: string
	readonly node: string
	readonly ops: string
	readonly opsType: string
}

export function unitNames(unit: string): UnitNames {
	return {
		guard: `is${unit}Node`,
		kinds: `${unit}_KINDS`,
		mirror: `mirror${unit}`,
		node: `${unit}Node`,
		ops: unit,
		opsType: `${unit}Ops`,
	}
}

export function writeHeader(w: SourceWriter, options: UnitOptions): void {
	w.line(GENERATED_BANNER)
	w.line()
	w.line(`import * as ${RUNTIME_NAMESPACE} from ${quoteString(options.runtimeModule)}`)
}

/**
 * Wrapped description followed by the raw parameter list.
 */
export function docLines(c: Classification): string[] {
	const lines = wrapText(c.intrinsic.description, DOC_WIDTH)
	const params = allParams(c.intrinsic)
	if (params.length > 0) {
		lines.push('', params.map((p) => `${p.name}: ${p.rawType}`).join(', '))
	}
	return lines
}

// =============================================================================
// NODE DEFINITIONS
// =============================================================================

function writeNodeDefinition(w: SourceWriter, c: Classification): void {
	const { intrinsic } = c
	const typeParams = typeParameters(c)

	w.docComment(docLines(c))
	w.block(`export interface ${c.defName}${typeParams} extends ${baseInterface(c)} {`, () => {
		w.line(`readonly kind: '${c.defName}'`)
		for (const p of allParameters(c)) {
			w.line(`readonly ${p.name}: ${parameterType(c, p)}`)
		}
	})
	w.line()

	const signature = `export function ${c.defName}${typeParams}(${parameterList(c)}): ${c.defName}${typeArguments(c)} {`
	w.block(signature, () => {
		w.block('return {', () => {
			w.line(`kind: '${c.defName}',`)
			w.line(`typ: ${typTerm(c)},`)
			for (const p of allParameters(c)) w.line(`${p.name},`)
			w.line(`category: ${enumList('IntrinsicsCategory', intrinsic.categories)},`)
			w.line(`intrinsicType: ${enumList('IntrinsicsType', intrinsic.intrinsicTypes)},`)
			w.line(`performance: ${performanceLiteral(intrinsic.performance)},`)
			w.line(`header: ${quoteString(intrinsic.header)},`)
			for (const p of implicitParameters(c)) w.line(`${p.name},`)
		})
	})
	w.line()
}

function writeNodeUnion(w: SourceWriter, unit: string, classifications: readonly Classification[]): void {
	const names = unitNames(unit)
	const members = classifications.map((c) => `${c.defName}${wideTypeArguments(c)}`)

	if (members.length === 0) {
		w.line(`export type ${names.node} = never`)
	} else {
		w.line(`export type ${names.node} =`)
		for (const member of members) w.line(`\t| ${member}`)
	}
	w.line()

	w.block(`export const ${names.kinds}: ReadonlySet<string> = new Set([`, () => {
		for (const c of classifications) w.line(`'${c.defName}',`)
	}, '])')
	w.line()

	w.block(`export function ${names.guard}(def: ${RUNTIME_NAMESPACE}.Def<unknown>): def is ${names.node} {`, () => {
		w.line(`return ${names.kinds}.has(def.kind)`)
	})
	w.line()
}

// =============================================================================
// DISPATCH OPERATIONS
// =============================================================================

/**
 * Body of a dispatch operation, by calling convention.
 */
export function dispatchStatement(c: Classification): string {
	const node = `${c.defName}(${argumentList(c)})`
	const arrays = `[${c.arrayParams.map((p) => p.name).join(', ')}]`
	switch (c.convention) {
		case 'constructing':
			return `return ir.reflectMutable(${node})`
		case 'reading':
			return `return cont.read(ir, ${arrays}, ${node})`
		case 'writing':
			return `return cont.write(ir, ${arrays}, ${node})`
		case 'effectful':
			return `return ir.reflectEffect(${node})`
		case 'pure':
			return `return ir.toAtom(${node})`
	}
}

function writeDispatchOperations(w: SourceWriter, unit: string, classifications: readonly Classification[]): void {
	const names = unitNames(unit)

	w.docComment(['Staged operations, one per intrinsic, bound into `ir`.'])
	w.block(`export function ${names.ops}(ir: ${RUNTIME_NAMESPACE}.Staging) {`, () => {
		w.block('return {', () => {
			for (const c of classifications) {
				const result = `${RUNTIME_NAMESPACE}.Exp<${returnType(c)}>`
				w.block(`${c.intrinsic.name}${typeParameters(c)}(${parameterList(c)}): ${result} {`, () => {
					w.line(dispatchStatement(c))
				}, '},')
			}
		})
	})
	w.line()
	w.line(`export type ${names.opsType} = ReturnType<typeof ${names.ops}>`)
	w.line()
}

// =============================================================================
// MIRROR RULES
// =============================================================================

/**
 * Rebuild one argument under `f`. Nodes holding arrays route every argument
 * through their container.
 */
function mirroredArgument(c: Classification, node: string, param: TypedParameter): string {
	const field = `${node}.${param.name}`
	return c.hasArrayParams ? `${node}.cont.applyTransformer(${field}, f)` : `f(${field})`
}

export function mirroredArguments(c: Classification, node: string): string {
	const declared = allParameters(c).map((p) => mirroredArgument(c, node, p))
	const implicit = implicitParameters(c).map((p) => `${node}.${p.name}`)
	return [...declared, ...implicit].join(', ')
}

function writeMirror(w: SourceWriter, unit: string, classifications: readonly Classification[]): void {
	const names = unitNames(unit)
	const rt = RUNTIME_NAMESPACE

	w.docComment([
		'Rebuild a node of this unit under `f`. Effect-wrapped nodes are',
		're-reflected with their summary and dependencies carried over.',
		'Returns undefined for nodes from other units.',
	])
	const signature =
		`export function ${names.mirror}(ops: ${names.opsType}, ir: ${rt}.Staging, ` +
		`e: ${rt}.Def<unknown>, f: ${rt}.Transformer): ${rt}.Exp<unknown> | undefined {`

	w.block(signature, () => {
		if (classifications.length === 0) {
			w.line('return undefined')
			return
		}

		w.block(`if (${rt}.isReflect(e)) {`, () => {
			w.line('const node = e.node')
			w.block(`if (${names.guard}(node)) {`, () => {
				w.block('switch (node.kind) {', () => {
					for (const c of classifications) {
						w.line(`case '${c.defName}':`)
						w.line(
							`\treturn ir.reflectMirrored(${rt}.Reflect(${c.defName}(${mirroredArguments(c, 'node')}), ` +
								'ir.mapOver(f, e.summary), e.deps.map(f)))'
						)
					}
				})
			})
		})
		w.block(`if (${names.guard}(e)) {`, () => {
			w.block('switch (e.kind) {', () => {
				for (const c of classifications) {
					w.line(`case '${c.defName}':`)
					w.line(`\treturn ops.${c.intrinsic.name}(${mirroredArguments(c, 'e')})`)
				}
			})
		})
		w.line('return undefined')
	})
}

export function renderIrUnit(
	unit: string,
	classifications: readonly Classification[],
	options: UnitOptions
): string {
	const w = new SourceWriter()
	writeHeader(w, options)
	w.line()

	for (const c of classifications) writeNodeDefinition(w, c)
	writeNodeUnion(w, unit, classifications)
	writeDispatchOperations(w, unit, classifications)
	writeMirror(w, unit, classifications)

	return w.toString()
}
