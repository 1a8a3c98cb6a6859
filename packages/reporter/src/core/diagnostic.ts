import { isAbsolute, relative, sep } from 'node:path'
import type { DiagnosticKind } from '@ferrule/diagnostics'

/**
 * A fatal diagnostic with its resolved location.
 */
export interface Diagnostic {
	readonly kind: DiagnosticKind
	/** Normalized, user-facing message */
	readonly message: string
	readonly file: string
	/** 1-indexed; 0 means no specific line */
	readonly line: number
}

/**
 * Thrown to abort the current compilation unit.
 * `message` is the normalized message; location lives on `diagnostic`.
 */
export class DiagnosticError extends Error {
	readonly diagnostic: Diagnostic

	constructor(diagnostic: Diagnostic) {
		super(diagnostic.message)
		this.name = diagnostic.kind
		this.diagnostic = diagnostic
	}

	get kind(): DiagnosticKind {
		return this.diagnostic.kind
	}

	get file(): string {
		return this.diagnostic.file
	}

	get line(): number {
		return this.diagnostic.line
	}
}

export function isDiagnosticError(error: unknown): error is DiagnosticError {
	return error instanceof DiagnosticError
}

/**
 * Show `file` relative to `cwd` when it lives below it, otherwise as given.
 */
export function relativeToCwd(file: string, cwd: string): string {
	if (!isAbsolute(file)) return file
	const rel = relative(cwd, file)
	if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return file
	return rel
}

/**
 * `file` or `file:line`; line 0 has no suffix.
 */
export function formatLocation(file: string, line: number, cwd: string): string {
	const shown = relativeToCwd(file, cwd)
	return line === 0 ? shown : `${shown}:${line}`
}

export function formatDiagnostic(diagnostic: Diagnostic, cwd: string): string {
	const location = formatLocation(diagnostic.file, diagnostic.line, cwd)
	return `[${diagnostic.kind}] ${location}: ${diagnostic.message}`
}
