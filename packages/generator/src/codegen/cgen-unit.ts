/**
 * Emission unit template.
 *
 * Renders `CGen<ISA>.ts`: one function lowering every node of the unit to
 * a literal C call.
 */

import type { Classification, TypedParameter } from '../classify/classifier.ts'
import { type UnitOptions, unitNames, writeHeader } from './ir-unit.ts'
import { RUNTIME_NAMESPACE } from './render.ts'
import { SourceWriter } from './writer.ts'

export function cgenUnitName(unit: string): string {
	return `CGen${unit}`
}

export function emitterName(unit: string): string {
	return `emit${unit}`
}

/**
 * Template text of one C argument. Arrays are cast to their declared pointer
 * type and displaced by their offset.
 */
export function cArgument(c: Classification, param: TypedParameter): string {
	const index = c.arrayParams.indexOf(param)
	const offset = c.offsetParams[index]
	if (index === -1 || offset === undefined) return `\${cg.quote(rhs.${param.name})}`
	return `(${param.rawType}) (\${cg.quoteWithOffset(rhs.${param.name}, rhs.${offset.name})})`
}

/**
 * Statement lowering `c`: a bare call when nothing is returned, a value
 * definition bound to `sym` otherwise.
 */
export function emissionStatement(c: Classification): string {
	const call = `${c.intrinsic.name}(${c.params.map((p) => cArgument(c, p)).join(', ')})`
	if (c.returnType.kind === 'scalar' && c.returnType.name === 'Unit') {
		return `cg.println(\`${call};\`)`
	}
	return `cg.emitValDef(sym, \`${call}\`)`
}

export function renderCGenUnit(
	unit: string,
	classifications: readonly Classification[],
	options: UnitOptions
): string {
	const names = unitNames(unit)
	const rt = RUNTIME_NAMESPACE
	const w = new SourceWriter()

	writeHeader(w, options)
	w.line(`import { ${names.guard} } from './${unit}${options.importExtension}'`)
	w.line()

	w.docComment([`Lower a node of ${unit} to C. Returns false for nodes from other units.`])
	const signature =
		`export function ${emitterName(unit)}(cg: ${rt}.CodegenContext, ` +
		`sym: ${rt}.Sym<unknown>, rhs: ${rt}.Def<unknown>): boolean {`

	w.block(signature, () => {
		w.line(`if (!${names.guard}(rhs)) return false`)
		if (classifications.length === 0) {
			w.line('return false')
			return
		}
		w.line('cg.headers.add(rhs.header)')
		w.block('switch (rhs.kind) {', () => {
			for (const c of classifications) {
				w.line(`case '${c.defName}':`)
				w.line(`\t${emissionStatement(c)}`)
				w.line('\treturn true')
			}
		})
		w.line('return false')
	})

	return w.toString()
}
