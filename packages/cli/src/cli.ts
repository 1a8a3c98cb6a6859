#!/usr/bin/env tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import ExplainCommand from './commands/explain.ts'
import ReplayCommand from './commands/replay.ts'
import { formatUsage } from './utils.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'ferrule')
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

	kernel.addLoader(new ListLoader([ReplayCommand, ExplainCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(formatUsage(version, [ReplayCommand, ExplainCommand]))
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
