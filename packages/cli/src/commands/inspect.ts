import { readFile } from 'node:fs/promises'
import { args, BaseCommand } from '@adonisjs/ace'
import { type InspectResult, inspectIntrinsic } from '@simdgen/generator'
import { formatGenerateError, formatInspection, formatNotFoundError, formatReadError } from '../utils.ts'

export default class InspectCommand extends BaseCommand {
	static override commandName = 'inspect'
	static override description = 'Show how one intrinsic of a database is parsed and classified'

	@args.string({ description: 'Intrinsics database (.xml)' })
	declare database: string

	@args.string({ description: 'Intrinsic name, e.g. _mm_add_epi32' })
	declare intrinsicName: string

	private async readDatabase(): Promise<string | null> {
		try {
			return await readFile(this.database, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.database, error))
			this.exitCode = 1
			return null
		}
	}

	private inspect(source: string): InspectResult | null {
		try {
			const result = inspectIntrinsic(source, this.intrinsicName, { filename: this.database })
			if (result === undefined) {
				this.logger.error(formatNotFoundError(this.intrinsicName))
				this.exitCode = 1
				return null
			}
			return result
		} catch (error: unknown) {
			this.logger.error(formatGenerateError(error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const source = await this.readDatabase()
		if (source === null) return

		const result = this.inspect(source)
		if (result === null) return

		for (const line of formatInspection(result)) {
			this.logger.info(line)
		}
	}
}
