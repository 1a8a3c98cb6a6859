/**
 * @ferrule/reporter
 *
 * Normalizes parser failures, raises compile errors and reports warnings.
 */

export {
	type DiagnosticStream,
	detectAnsi,
	type LoadReporterConfigOptions,
	loadReporterConfig,
	type ReporterConfig,
	type WarningPalette,
} from './core/config.ts'
export {
	type Diagnostic,
	DiagnosticError,
	formatDiagnostic,
	formatLocation,
	isDiagnosticError,
	relativeToCwd,
} from './core/diagnostic.ts'
export {
	type LineInput,
	type LocationMeta,
	lineOf,
	resolveLocation,
	type SourceLocation,
	type TokenPosition,
} from './core/location.ts'
export {
	type CompilationSession,
	currentSession,
	isWarningNotification,
	WarningCollector,
	type WarningEvent,
	type WarningNotification,
	withCompilationSession,
} from './core/session.ts'
export {
	type ErrorPrefix,
	NORMALIZATION_RULES,
	type NormalizationRule,
	type NormalizedError,
	normalizeFragment,
	normalizeParseError,
	type RawErrorFragment,
	SYNTAX_ERROR_BEFORE,
	selectRule,
} from './normalize/rules.ts'
export { raise } from './report/raise.ts'
export { createReporter, DiagnosticReporter, type ErrorFormatter } from './report/reporter.ts'
export { warn, warnAt, warningPrefix } from './report/warn.ts'
export { TermDecodeError } from './term/decode.ts'
