/**
 * Kinds of fatal diagnostics. Closed: nothing registers new kinds at runtime.
 */
export const DiagnosticKind = {
	CompileError: 'CompileError',
	SyntaxError: 'SyntaxError',
	TokenMissingError: 'TokenMissingError',
} as const

export type DiagnosticKind = (typeof DiagnosticKind)[keyof typeof DiagnosticKind]

/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	/** Present on fatal definitions; warnings carry no kind */
	readonly kind?: DiagnosticKind
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>

export function isDiagnosticKind(value: string): value is DiagnosticKind {
	return Object.values<string>(DiagnosticKind).includes(value)
}
