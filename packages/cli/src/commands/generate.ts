import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type GenerateResult, generate } from '@simdgen/generator'
import {
	formatGenerateError,
	formatInvalidCapError,
	formatIsaSummary,
	formatReadError,
	formatWriteError,
	parseCap,
	resolveStatsPath,
	resolveUnitPath,
} from '../utils.ts'

export default class GenerateCommand extends BaseCommand {
	static override commandName = 'generate'
	static override description = 'Generate IR and C emission units from an intrinsics database'

	@args.string({ description: 'Intrinsics database (.xml)' })
	declare database: string

	@flags.string({ alias: 'o', default: 'generated', description: 'Directory for generated units' })
	declare output: string

	@flags.string({ alias: 's', default: 'stats', description: 'Directory for statistics reports' })
	declare stats: string

	@flags.string({ description: 'Maximum intrinsics per unit before an instruction set is split' })
	declare cap?: string

	@flags.array({ description: 'Instruction set to generate, in order (repeatable)' })
	declare isa?: string[]

	@flags.string({ description: 'Module specifier generated units import the runtime from' })
	declare runtime?: string

	private resolveCap(): number | undefined | null {
		if (this.cap === undefined) return undefined
		const cap = parseCap(this.cap)
		if (cap === null) {
			this.logger.error(formatInvalidCapError(this.cap))
			this.exitCode = 1
		}
		return cap
	}

	private async readDatabase(): Promise<string | null> {
		try {
			return await readFile(this.database, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.database, error))
			this.exitCode = 1
			return null
		}
	}

	private generateUnits(source: string, cap: number | undefined): GenerateResult | null {
		try {
			return generate(source, {
				cap,
				filename: this.database,
				isaOrder: this.isa !== undefined && this.isa.length > 0 ? this.isa : undefined,
				runtimeModule: this.runtime,
				unitExists: (unit) => existsSync(join(this.output, `${unit}.ts`)),
			})
		} catch (error: unknown) {
			this.logger.error(formatGenerateError(error))
			this.exitCode = 1
			return null
		}
	}

	private async writeOutputFile(path: string, content: string): Promise<boolean> {
		try {
			await writeFile(path, content)
			return true
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			return false
		}
	}

	private async emitOutput(result: GenerateResult): Promise<number> {
		await mkdir(this.output, { recursive: true })
		await mkdir(this.stats, { recursive: true })

		let written = 0
		for (const output of result.isas) {
			for (const file of output.files) {
				if (await this.writeOutputFile(resolveUnitPath(this.output, file), file.source)) written++
				else this.exitCode = 1
			}
			if (!(await this.writeOutputFile(resolveStatsPath(this.stats, output.isa), output.stats))) {
				this.exitCode = 1
			}
			this.logger.info(formatIsaSummary(output))
		}
		return written
	}

	override async run(): Promise<void> {
		const cap = this.resolveCap()
		if (cap === null) return

		const source = await this.readDatabase()
		if (source === null) return

		const result = this.generateUnits(source, cap)
		if (result === null) return

		for (const warning of result.warnings) {
			this.logger.warning(warning.formattedMessage)
		}

		const written = await this.emitOutput(result)
		if (this.exitCode !== 1) {
			this.logger.success(`Wrote ${written} units for ${result.isas.length} instruction sets to ${this.output}`)
		}
	}
}
