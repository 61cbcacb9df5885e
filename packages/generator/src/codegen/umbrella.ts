/**
 * Umbrella units compose the sub-units of a split instruction set (and any
 * extension unit) under the instruction set's own names.
 */

import { cgenUnitName, emitterName } from './cgen-unit.ts'
import { type UnitOptions, unitNames, writeHeader } from './ir-unit.ts'
import { RUNTIME_NAMESPACE } from './render.ts'
import { SourceWriter } from './writer.ts'

function importPath(unit: string, options: UnitOptions): string {
	return `'./${unit}${options.importExtension}'`
}

/**
 * Composes the split units of one instruction set. Intrinsic names are
 * unique across `parts`, so no two parts define the same operation.
 */
export function renderIrUmbrella(unit: string, parts: readonly string[], options: UnitOptions): string {
	const names = unitNames(unit)
	const rt = RUNTIME_NAMESPACE
	const partNames = parts.map(unitNames)
	const w = new SourceWriter()

	writeHeader(w, options)
	for (const part of partNames) {
		const specifiers = [part.ops, `type ${part.node}`, part.kinds, part.mirror]
		w.line(`import { ${specifiers.join(', ')} } from ${importPath(part.ops, options)}`)
	}
	w.line()

	w.line(`export type ${names.node} = ${partNames.map((p) => p.node).join(' | ') || 'never'}`)
	w.line()
	w.line(
		`export const ${names.kinds}: ReadonlySet<string> = new Set([${partNames.map((p) => `...${p.kinds}`).join(', ')}])`
	)
	w.line()

	w.block(`export function ${names.guard}(def: ${rt}.Def<unknown>): def is ${names.node} {`, () => {
		w.line(`return ${names.kinds}.has(def.kind)`)
	})
	w.line()

	w.block(`export function ${names.ops}(ir: ${rt}.Staging) {`, () => {
		w.line(`return { ${partNames.map((p) => `...${p.ops}(ir)`).join(', ')} }`)
	})
	w.line()
	w.line(`export type ${names.opsType} = ReturnType<typeof ${names.ops}>`)
	w.line()

	const signature =
		`export function ${names.mirror}(ops: ${names.opsType}, ir: ${rt}.Staging, ` +
		`e: ${rt}.Def<unknown>, f: ${rt}.Transformer): ${rt}.Exp<unknown> | undefined {`
	w.block(signature, () => {
		const calls = partNames.map((p) => `${p.mirror}(ops, ir, e, f)`)
		w.line(`return ${calls.join(' ?? ') || 'undefined'}`)
	})

	return w.toString()
}

export function renderCGenUmbrella(unit: string, parts: readonly string[], options: UnitOptions): string {
	const rt = RUNTIME_NAMESPACE
	const w = new SourceWriter()

	writeHeader(w, options)
	for (const part of parts) {
		w.line(`import { ${emitterName(part)} } from ${importPath(cgenUnitName(part), options)}`)
	}
	w.line()

	const signature =
		`export function ${emitterName(unit)}(cg: ${rt}.CodegenContext, ` +
		`sym: ${rt}.Sym<unknown>, rhs: ${rt}.Def<unknown>): boolean {`
	w.block(signature, () => {
		const calls = parts.map((part) => `${emitterName(part)}(cg, sym, rhs)`)
		w.line(`return ${calls.join(' || ') || 'false'}`)
	})

	return w.toString()
}
