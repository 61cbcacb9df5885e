/**
 * TypeScript spellings of classified intrinsics, shared by the unit templates.
 * Every runtime name is reached through the `rt` namespace import.
 */

import type { PerformanceMap } from '@simdgen/runtime'

import type { Classification, TypedParameter } from '../classify/classifier.ts'
import type { CanonicalType, ScalarName } from '../types/mapping.ts'

export const RUNTIME_NAMESPACE = 'rt'

function runtime(name: string): string {
	return `${RUNTIME_NAMESPACE}.${name}`
}

/**
 * Element type of an array. Untyped memory takes the node's `T`.
 */
function elementType(element: ScalarName): string {
	return element === 'Any' ? 'T' : runtime(element)
}

function valueType(type: CanonicalType): string {
	if (type.kind === 'array') return `${runtime('Kind')}<A, ${elementType(type.element)}>`
	return runtime(type.name)
}

export function parameterType(c: Classification, param: TypedParameter): string {
	if (c.offsetParams.includes(param)) return `${runtime('Exp')}<U>`
	return `${runtime('Exp')}<${valueType(param.type)}>`
}

export function returnType(c: Classification): string {
	if (c.hasVoidPointerReturn) return runtime('VoidPointer')
	return valueType(c.returnType)
}

/**
 * Runtime descriptor of the result, stored as the node's `typ`.
 */
export function typTerm(c: Classification): string {
	const type = c.returnType
	if (c.hasVoidPointerReturn) return runtime('Typs.VoidPointer')
	if (type.kind === 'array') {
		const element = elementType(type.element)
		return `${runtime('pointerTyp')}<${returnType(c)}, ${element}>(${runtime(`Typs.${type.element}`)})`
	}
	return runtime(`Typs.${type.name}`)
}

export function typeParameters(c: Classification): string {
	switch (c.generics) {
		case 'none':
			return ''
		case 'pointer':
			return `<A extends ${runtime('ContainerKind')}, U extends ${runtime('Integral')}>`
		case 'voidPointer':
			return `<A extends ${runtime('ContainerKind')}, T, U extends ${runtime('Integral')}>`
	}
}

export function typeArguments(c: Classification): string {
	switch (c.generics) {
		case 'none':
			return ''
		case 'pointer':
			return '<A, U>'
		case 'voidPointer':
			return '<A, T, U>'
	}
}

/**
 * Type arguments covering every instantiation, for unions over nodes.
 */
export function wideTypeArguments(c: Classification): string {
	switch (c.generics) {
		case 'none':
			return ''
		case 'pointer':
			return `<${runtime('ContainerKind')}, ${runtime('Integral')}>`
		case 'voidPointer':
			return `<${runtime('ContainerKind')}, unknown, ${runtime('Integral')}>`
	}
}

export function baseInterface(c: Classification): string {
	const result = returnType(c)
	switch (c.generics) {
		case 'none':
			return `${runtime('IntrinsicsDef')}<${result}>`
		case 'pointer':
			return `${runtime('PointerIntrinsicsDef')}<A, U, ${result}>`
		case 'voidPointer':
			return `${runtime('VoidPointerIntrinsicsDef')}<A, T, U, ${result}>`
	}
}

export interface ImplicitParameter {
	readonly name: 'voidType' | 'integralType' | 'cont'
	readonly type: string
}

/**
 * Descriptors and container passed after the declared parameters.
 */
export function implicitParameters(c: Classification): ImplicitParameter[] {
	if (c.generics === 'none') return []
	const pointer: ImplicitParameter[] = [
		{ name: 'integralType', type: `${runtime('Typ')}<U>` },
		{ name: 'cont', type: `${runtime('Container')}<A>` },
	]
	if (c.generics === 'pointer') return pointer
	return [{ name: 'voidType', type: `${runtime('Typ')}<T>` }, ...pointer]
}

export function allParameters(c: Classification): readonly TypedParameter[] {
	return [...c.params, ...c.offsetParams]
}

/**
 * `a: rt.Exp<rt.__m128i>, b: rt.Exp<rt.__m128i>` plus implicit parameters.
 */
export function parameterList(c: Classification): string {
	const declared = allParameters(c).map((p) => `${p.name}: ${parameterType(c, p)}`)
	const implicit = implicitParameters(c).map((p) => `${p.name}: ${p.type}`)
	return [...declared, ...implicit].join(', ')
}

/**
 * Argument list forwarding every parameter, implicit ones included.
 */
export function argumentList(c: Classification): string {
	return [...allParameters(c).map((p) => p.name), ...implicitParameters(c).map((p) => p.name)].join(', ')
}

export function enumList(enumName: string, values: readonly string[]): string {
	return `[${values.map((v) => runtime(`${enumName}.${v}`)).join(', ')}]`
}

export function performanceLiteral(performance: PerformanceMap): string {
	const entries = Object.entries(performance).flatMap(([arch, perf]) => {
		if (perf === undefined) return []
		const fields: string[] = []
		if (perf.latency !== undefined) fields.push(`latency: ${perf.latency}`)
		if (perf.throughput !== undefined) fields.push(`throughput: ${perf.throughput}`)
		return [`${arch}: { ${fields.join(', ')} }`]
	})
	return entries.length === 0 ? '{}' : `{ ${entries.join(', ')} }`
}

export function quoteString(text: string): string {
	return `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`
}
