import {
	type DiagnosticDef,
	FRCLI001,
	FRCLI002,
	FRCLI003,
	FRCLI004,
	getDiagnostic,
	interpolateMessage,
	isDiagnosticKind,
	isValidDiagnosticCode,
	KIND_DESCRIPTIONS,
} from '@ferrule/diagnostics'
import {
	type Diagnostic,
	type DiagnosticReporter,
	type ErrorPrefix,
	isDiagnosticError,
} from '@ferrule/reporter'

/**
 * One recorded call into the reporter.
 */
export type FragmentEntry =
	| {
			readonly type: 'parse'
			readonly file: string
			readonly line: number
			readonly prefix: ErrorPrefix
			readonly token: string
	  }
	| {
			readonly type: 'compile'
			readonly file: string
			readonly line: number
			readonly message: string
	  }
	| {
			readonly type: 'warning'
			readonly file: string
			readonly line: number
			readonly text: string
	  }
	| { readonly type: 'note'; readonly text: string }

export interface ReplaySummary {
	readonly diagnostics: readonly Diagnostic[]
}

/**
 * Error thrown for fragment logs that cannot be replayed.
 */
export class FragmentLogError extends Error {
	constructor(reason: string) {
		super(formatDiagnosticLine(FRCLI003, { reason }))
		this.name = 'FragmentLogError'
	}
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatDiagnosticLine(def: DiagnosticDef, args: Record<string, string>): string {
	return `[${def.code}] ${interpolateMessage(def, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnosticLine(FRCLI001, { path: filePath })
	}
	return formatDiagnosticLine(FRCLI002, { reason: getErrorMessage(error) })
}

export function formatUnknownKindError(kind: string): string {
	return formatDiagnosticLine(FRCLI004, { kind })
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(entry: Record<string, unknown>, key: string, index: number): string {
	const value = entry[key]
	if (typeof value !== 'string') throw new FragmentLogError(`entry ${index}: "${key}" must be a string`)
	return value
}

function readLine(entry: Record<string, unknown>, index: number): number {
	const value = entry['line']
	if (value === undefined || value === null) return 0
	if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
		throw new FragmentLogError(`entry ${index}: "line" must be a non-negative integer`)
	}
	return value
}

function readPrefix(entry: Record<string, unknown>, index: number): ErrorPrefix {
	const value = entry['prefix']
	if (typeof value === 'string') return value
	if (Array.isArray(value) && value.length === 2) {
		const [prefix, suffix]: unknown[] = value
		if (typeof prefix === 'string' && typeof suffix === 'string') return [prefix, suffix]
	}
	throw new FragmentLogError(`entry ${index}: "prefix" must be a string or a [prefix, suffix] pair`)
}

function parseEntry(value: unknown, index: number): FragmentEntry {
	if (!isRecord(value)) throw new FragmentLogError(`entry ${index} is not an object`)
	switch (value['type']) {
		case 'parse':
			return {
				file: readString(value, 'file', index),
				line: readLine(value, index),
				prefix: readPrefix(value, index),
				token: readString(value, 'token', index),
				type: 'parse',
			}
		case 'compile':
			return {
				file: readString(value, 'file', index),
				line: readLine(value, index),
				message: readString(value, 'message', index),
				type: 'compile',
			}
		case 'warning':
			return {
				file: readString(value, 'file', index),
				line: readLine(value, index),
				text: readString(value, 'text', index),
				type: 'warning',
			}
		case 'note':
			return { text: readString(value, 'text', index), type: 'note' }
		default:
			throw new FragmentLogError(`entry ${index} has unknown type ${JSON.stringify(value['type'])}`)
	}
}

/**
 * Parse and validate a JSON fragment log.
 */
export function parseFragmentLog(source: string): FragmentEntry[] {
	let parsed: unknown
	try {
		parsed = JSON.parse(source)
	} catch (error: unknown) {
		throw new FragmentLogError(getErrorMessage(error))
	}
	if (!Array.isArray(parsed)) throw new FragmentLogError('expected an array of fragments')
	return parsed.map((entry: unknown, index) => parseEntry(entry, index))
}

export function replayEntry(reporter: DiagnosticReporter, entry: FragmentEntry): void {
	switch (entry.type) {
		case 'parse':
			return reporter.parseError(entry.line, entry.file, entry.prefix, entry.token)
		case 'compile':
			return reporter.compileError({ line: entry.line }, entry.file, entry.message)
		case 'warning':
			return reporter.warnAt(entry.line, entry.file, entry.text)
		case 'note':
			return reporter.warn(entry.text)
	}
}

/**
 * Replay every entry. Each fatal diagnostic ends its own entry only, so one
 * log can exercise many failures.
 */
export function replayLog(reporter: DiagnosticReporter, entries: readonly FragmentEntry[]): ReplaySummary {
	const diagnostics: Diagnostic[] = []
	for (const entry of entries) {
		try {
			replayEntry(reporter, entry)
		} catch (error: unknown) {
			if (!isDiagnosticError(error)) throw error
			diagnostics.push(error.diagnostic)
		}
	}
	return { diagnostics }
}

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`
}

export function formatSummary(errors: number, warnings: number): string {
	return `${plural(errors, 'error')}, ${plural(warnings, 'warning')}`
}

/**
 * Text shown by `ferrule explain`, or null when `name` is neither a kind nor a code.
 */
export function explainDiagnostic(name: string): string | null {
	if (isDiagnosticKind(name)) return `${name}: ${KIND_DESCRIPTIONS[name]}`
	if (!isValidDiagnosticCode(name)) return null
	const def = getDiagnostic(name)
	const lines = [`${def.code}: ${def.message}`, '', def.description]
	if (def.suggestion !== undefined) lines.push('', `Suggestion: ${def.suggestion}`)
	return lines.join('\n')
}

export interface CommandSummary {
	readonly commandName: string
	readonly description: string
}

/**
 * Banner shown when ferrule runs without a command.
 */
export function formatUsage(version: string, commands: readonly CommandSummary[]): string {
	const width = Math.max(0, ...commands.map((command) => command.commandName.length))
	return [
		`ferrule v${version}`,
		'',
		'Usage: ferrule <command> [options]',
		'',
		'Commands:',
		...commands.map((command) => `  ${command.commandName.padEnd(width)}  ${command.description}`),
	].join('\n')
}
