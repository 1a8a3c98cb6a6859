import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { createReporter, formatDiagnostic, WarningCollector, withCompilationSession } from '@ferrule/reporter'
import {
	type FragmentEntry,
	formatReadError,
	formatSummary,
	getErrorMessage,
	parseFragmentLog,
	replayLog,
} from '../utils.ts'

export default class ReplayCommand extends BaseCommand {
	static override commandName = 'replay'
	static override description = 'Replay recorded parser fragments through the diagnostic reporter'

	@args.string({ description: 'JSON file with recorded fragments' })
	declare log: string

	@flags.string({ description: 'Show file paths relative to this directory (default: current directory)' })
	declare cwd?: string

	private async readLog(): Promise<string | null> {
		try {
			return await readFile(this.log, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.log, error))
			this.exitCode = 1
			return null
		}
	}

	private parseLog(source: string): FragmentEntry[] | null {
		try {
			return parseFragmentLog(source)
		} catch (error: unknown) {
			this.logger.error(getErrorMessage(error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const source = await this.readLog()
		if (source === null) return

		const entries = this.parseLog(source)
		if (entries === null) return

		const reporter = createReporter(this.cwd === undefined ? {} : { cwd: this.cwd })
		const collector = new WarningCollector()
		try {
			const summary = withCompilationSession(collector, () => replayLog(reporter, entries))
			for (const diagnostic of summary.diagnostics) {
				this.logger.error(formatDiagnostic(diagnostic, reporter.config.cwd))
			}
			this.logger.info(formatSummary(summary.diagnostics.length, collector.warningCount))
			if (summary.diagnostics.length > 0) {
				this.exitCode = 1
			}
		} finally {
			collector.close()
		}
	}
}
