#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import TokenizeCommand from './commands/tokenize.ts'

const version = '0.1.0'

function printUsage(): void {
	console.log(`vmasm v${version}`)
	console.log('')
	console.log('Usage: vmasm tokenize <input> [--numeric unsigned|signed|float] [--json]')
	console.log('')
	console.log('Run "vmasm help tokenize" for details.')
}

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'vmasm')
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

	kernel.addLoader(new ListLoader([TokenizeCommand, HelpCommand]))

	kernel.on('version', async () => {
		console.log(`vmasm v${version}`)
		return true
	})

	kernel.on('help', async () => {
		printUsage()
		return true
	})

	kernel.on('finding:command', async () => {
		printUsage()
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
