import { FRCOMP050 } from '@ferrule/diagnostics'
import { type ReporterConfig, resolvePalette } from '../core/config.ts'
import { formatLocation } from '../core/diagnostic.ts'
import { type LineInput, lineOf } from '../core/location.ts'
import { currentSession } from '../core/session.ts'

export function warningPrefix(config: ReporterConfig): string {
	return config.ansiEnabled ? resolvePalette(config).yellow(FRCOMP050.message) : FRCOMP050.message
}

/**
 * Print a warning without location.
 * Counts it on the current session, when one is registered.
 */
export function warn(config: ReporterConfig, text: string): void {
	currentSession()?.registerWarning()
	config.stream.write(`${warningPrefix(config)}${text}\n`)
}

/**
 * Print a warning with its location below it, and forward it to the current session.
 */
export function warnAt(config: ReporterConfig, line: LineInput, file: string, text: string): void {
	const resolvedLine = lineOf(line)
	currentSession()?.postMessage({ file, line: resolvedLine, text, type: 'warning' })
	warn(config, `${text}\n  ${formatLocation(file, resolvedLine, config.cwd)}`)
}
