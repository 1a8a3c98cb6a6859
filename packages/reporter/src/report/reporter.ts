import { type DiagnosticArgs, DiagnosticKind, interpolateMessage } from '@ferrule/diagnostics'
import { type LoadReporterConfigOptions, loadReporterConfig, type ReporterConfig } from '../core/config.ts'
import { type LineInput, type LocationMeta, resolveLocation } from '../core/location.ts'
import { type ErrorPrefix, normalizeParseError } from '../normalize/rules.ts'
import { raise } from './raise.ts'
import { warn, warnAt } from './warn.ts'

/**
 * Turns a phase-specific error description into message text.
 */
export interface ErrorFormatter<D> {
	formatError(desc: D): string
}

type Meta = LocationMeta | null | undefined

/**
 * Entry points used by the lexer, parser and later phases.
 *
 * Errors throw a DiagnosticError; warnings are printed to the configured
 * stream and reported to the current compilation session.
 */
export class DiagnosticReporter {
	readonly config: ReporterConfig

	constructor(config: ReporterConfig = loadReporterConfig()) {
		this.config = config
	}

	/**
	 * Raise a CompileError at the location `meta` points to.
	 * With `args`, `message` is a template and `{key}` placeholders are filled in.
	 */
	compileError(meta: Meta, file: string, message: string, args?: DiagnosticArgs): never {
		const location = resolveLocation(meta, file)
		const text = args === undefined ? message : interpolateMessage(message, args)
		return raise(location.line, location.file, DiagnosticKind.CompileError, text)
	}

	formError<D>(meta: Meta, file: string, formatter: ErrorFormatter<D>, desc: D): never {
		return this.compileError(meta, file, formatter.formatError(desc))
	}

	formWarn<D>(meta: Meta, file: string, formatter: ErrorFormatter<D>, desc: D): void {
		const location = resolveLocation(meta, file)
		this.warnAt(location.line, location.file, formatter.formatError(desc))
	}

	/**
	 * Raise the normalized diagnostic for a raw parser failure.
	 */
	parseError(line: LineInput, file: string, prefix: ErrorPrefix, token: string): never {
		const diagnostic = normalizeParseError(line, file, prefix, token)
		return raise(diagnostic.line, diagnostic.file, diagnostic.kind, diagnostic.message)
	}

	warn(text: string): void {
		warn(this.config, text)
	}

	warnAt(line: LineInput, file: string, text: string): void {
		warnAt(this.config, line, file, text)
	}
}

export function createReporter(options?: LoadReporterConfigOptions): DiagnosticReporter {
	return new DiagnosticReporter(loadReporterConfig(options))
}
