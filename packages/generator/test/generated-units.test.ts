import assert from 'node:assert'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { pathToFileURL } from 'node:url'
import {
	arrayContainer,
	CodegenContext,
	Const,
	type Def,
	type Exp,
	ExpressionGraph,
	type Float,
	type Int,
	isReflect,
	type NodeEmitter,
	pointerTyp,
	type Staging,
	type Transformer,
	Typs,
} from '@simdgen/runtime'

import { generate } from '../src/generate.ts'
import { databaseXml, recordXml } from './fixtures.ts'

type Operation = (...args: unknown[]) => Exp<unknown>
type Operations = Readonly<Record<string, Operation>>

interface IrModule {
	SSE2(ir: Staging): Operations
	mirrorSSE2(ops: Operations, ir: Staging, e: Def<unknown>, f: Transformer): Exp<unknown> | undefined
}

interface CGenModule {
	emitSSE2: NodeEmitter
}

function isIrModule(mod: unknown): mod is IrModule {
	return (
		typeof mod === 'object' &&
		mod !== null &&
		'SSE2' in mod &&
		typeof mod.SSE2 === 'function' &&
		'mirrorSSE2' in mod &&
		typeof mod.mirrorSSE2 === 'function'
	)
}

function isCGenModule(mod: unknown): mod is CGenModule {
	return typeof mod === 'object' && mod !== null && 'emitSSE2' in mod && typeof mod.emitSSE2 === 'function'
}

function operation(ops: Operations, name: string): Operation {
	const op = ops[name]
	assert.ok(op, `no operation ${name}`)
	return op
}

// One intrinsic per calling convention: reading, pure, writing, effectful, constructing.
const RECORDS = [
	recordXml({
		categories: ['Load'],
		header: 'xmmintrin.h',
		name: '_mm_load_ps',
		params: [['float const*', 'mem_addr']],
		rettype: '__m128',
		types: ['Floating Point'],
	}),
	recordXml({
		header: 'xmmintrin.h',
		name: '_mm_add_ps',
		params: [
			['__m128', 'a'],
			['__m128', 'b'],
		],
		rettype: '__m128',
		types: ['Floating Point'],
	}),
	recordXml({
		categories: ['Store'],
		header: 'xmmintrin.h',
		name: '_mm_storeu_ps',
		params: [
			['float*', 'mem_addr'],
			['__m128', 'a'],
		],
		rettype: 'void',
		types: ['Floating Point'],
	}),
	recordXml({ categories: ['General Support'], header: 'xmmintrin.h', name: '_mm_sfence', rettype: 'void' }),
	recordXml({
		categories: ['General Support'],
		header: 'mm_malloc.h',
		name: '_mm_malloc',
		params: [
			['size_t', 'size'],
			['size_t', 'align'],
		],
		rettype: 'void*',
	}),
]

const RUNTIME_MODULE = new URL('../../runtime/src/index.ts', import.meta.url).href

const identity: Transformer = <T>(e: Exp<T>): Exp<T> => e

const emitParam: NodeEmitter = (_cg, _sym, rhs) => rhs.kind === 'Param'

function bindParams(graph: ExpressionGraph): [Exp<readonly Float[]>, Exp<Int>] {
	const mem = graph.toAtom<readonly Float[]>({ kind: 'Param', typ: pointerTyp<readonly Float[], Float>(Typs.Float) })
	const index = graph.toAtom<Int>({ kind: 'Param', typ: Typs.Int })
	return [mem, index]
}

/**
 * x0, x1 parameters; x2..x7 one call per intrinsic.
 */
function stageKernel(ir: IrModule): ExpressionGraph {
	const graph = new ExpressionGraph()
	const ops = ir.SSE2(graph)
	const [mem, index] = bindParams(graph)

	const first = operation(ops, '_mm_load_ps')(mem, Const(0), Typs.Int, arrayContainer)
	const second = operation(ops, '_mm_load_ps')(mem, index, Typs.Int, arrayContainer)
	const sum = operation(ops, '_mm_add_ps')(first, second)
	operation(ops, '_mm_storeu_ps')(mem, sum, index, Typs.Int, arrayContainer)
	operation(ops, '_mm_sfence')()
	operation(ops, '_mm_malloc')(Const(64), Const(16))
	return graph
}

function emit(graph: ExpressionGraph, cgen: CGenModule): CodegenContext {
	const cg = new CodegenContext()
	cg.emitGraph(graph, [emitParam, cgen.emitSSE2])
	return cg
}

const KERNEL_C = [
	'__m128 x2 = _mm_load_ps((float const*) (x0));',
	'__m128 x3 = _mm_load_ps((float const*) (x0 + x1));',
	'__m128 x4 = _mm_add_ps(x2, x3);',
	'_mm_storeu_ps((float*) (x0 + x1), x4);',
	'_mm_sfence();',
	'void* x7 = _mm_malloc(64, 16);',
]

describe('generated units', () => {
	let dir = ''
	let ir: IrModule | undefined
	let cgen: CGenModule | undefined

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), 'simdgen-'))
		const result = generate(databaseXml(RECORDS), { isaOrder: ['SSE2'], runtimeModule: RUNTIME_MODULE })
		const sse2 = result.isas[0]
		assert.ok(sse2)
		assert.strictEqual(sse2.intrinsicCount, 5)

		await writeFile(join(dir, 'package.json'), '{ "type": "module" }\n')
		for (const file of sse2.files) {
			await writeFile(join(dir, file.path), file.source)
		}

		const irModule: unknown = await import(pathToFileURL(join(dir, 'SSE2.ts')).href)
		const cgenModule: unknown = await import(pathToFileURL(join(dir, 'CGenSSE2.ts')).href)
		assert.ok(isIrModule(irModule))
		assert.ok(isCGenModule(cgenModule))
		ir = irModule
		cgen = cgenModule
	})

	after(async () => {
		await rm(dir, { force: true, recursive: true })
	})

	function loaded(): [IrModule, CGenModule] {
		assert.ok(ir && cgen, 'generated units not loaded')
		return [ir, cgen]
	}

	it('should lower every calling convention to C', () => {
		const [irUnit, cgenUnit] = loaded()
		const cg = emit(stageKernel(irUnit), cgenUnit)

		assert.deepStrictEqual(cg.getLines(), KERNEL_C)
		assert.deepStrictEqual([...cg.headers], ['xmmintrin.h', 'mm_malloc.h'])
	})

	it('should bind each convention the way its dispatch operation says', () => {
		const [irUnit] = loaded()
		const graph = stageKernel(irUnit)

		assert.deepStrictEqual(
			graph.getEffects().map((sym) => sym.id),
			[5, 6, 7]
		)
		const store = [...graph.entries()][5]?.[1]
		assert.ok(store && isReflect(store))
		assert.deepStrictEqual(store.summary, {
			mutable: false,
			simple: false,
			writes: [{ id: 0, tag: 'sym', typ: pointerTyp(Typs.Float) }],
		})
	})

	it('should mirror every binding into the target graph', () => {
		const [irUnit, cgenUnit] = loaded()
		const source = stageKernel(irUnit)
		const target = new ExpressionGraph()
		const ops = irUnit.SSE2(target)
		bindParams(target)

		for (const [sym, def] of source.entries()) {
			if (def.kind === 'Param') continue
			assert.deepStrictEqual(irUnit.mirrorSSE2(ops, target, def, identity), sym)
		}

		assert.strictEqual(source.count(), 8)
		assert.strictEqual(target.count(), 8)
		assert.deepStrictEqual([...target.entries()], [...source.entries()])
		assert.deepStrictEqual(emit(target, cgenUnit).getLines(), KERNEL_C)
	})

	it('should leave nodes of other units to other rules', () => {
		const [irUnit] = loaded()
		const graph = new ExpressionGraph()

		const mirrored = irUnit.mirrorSSE2(irUnit.SSE2(graph), graph, { kind: 'Param', typ: Typs.Int }, identity)

		assert.strictEqual(mirrored, undefined)
		assert.strictEqual(graph.count(), 0)
	})
})
