import type { DiagnosticKind } from '@ferrule/diagnostics'
import { type Diagnostic, DiagnosticError } from '../core/diagnostic.ts'
import { type LineInput, lineOf } from '../core/location.ts'

/**
 * Throw a diagnostic, aborting the current compilation unit.
 *
 * The stack trace starts at the caller; this frame is left out. Nothing is
 * printed here: whoever catches the error decides how to show it.
 */
export function raise(line: LineInput, file: string, kind: DiagnosticKind, message: string): never {
	const diagnostic: Diagnostic = Object.freeze({ file, kind, line: lineOf(line), message })
	const error = new DiagnosticError(diagnostic)
	Error.captureStackTrace(error, raise)
	throw error
}
