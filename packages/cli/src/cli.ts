#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import GenerateCommand from './commands/generate.ts'
import InspectCommand from './commands/inspect.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'simdgen')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([GenerateCommand, InspectCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(`simdgen v${version}`)
		console.log('')
		console.log('Usage: simdgen <command> [options]')
		console.log('')
		console.log('Commands:')
		console.log('  generate <database>         Generate every instruction set unit')
		console.log('  inspect <database> <name>   Show how one intrinsic is classified')
		console.log('')
		console.log('Run "simdgen --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
