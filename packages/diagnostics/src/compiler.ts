/**
 * Compiler diagnostic definitions.
 *
 * Error code format: FR<PHASE><NUMBER>
 * - FRPARSE: Parser errors (001-099)
 * - FRCOMP: Compile errors (001-049), warnings (050-099)
 */

import { type DiagnosticDef, DiagnosticKind, DiagnosticSeverity } from './types.ts'

// =============================================================================
// PARSER ERRORS (FRPARSE001-099)
// =============================================================================

export const FRPARSE001: DiagnosticDef = {
	code: 'FRPARSE001',
	description:
		'The file ended (or the snippet stopped) before the expression was finished. Something like a closing bracket or an `end` is missing.',
	kind: DiagnosticKind.TokenMissingError,
	message: 'syntax error: expression is incomplete',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that every opened construct is closed.',
}

export const FRPARSE002: DiagnosticDef = {
	code: 'FRPARSE002',
	description: 'The line ended in the middle of an expression.',
	kind: DiagnosticKind.SyntaxError,
	message: 'unexpectedly reached end of line. The current expression is invalid or incomplete',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Finish the expression on this line, or continue it after an operator.',
}

export const FRPARSE003: DiagnosticDef = {
	code: 'FRPARSE003',
	description: 'An `end` showed up without a block to close.',
	kind: DiagnosticKind.SyntaxError,
	message: 'unexpected token: end',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the extra `end`, or add the `do` it was meant to close.',
}

export const FRPARSE004: DiagnosticDef = {
	code: 'FRPARSE004',
	description: 'The parser gave up right before a sigil.',
	kind: DiagnosticKind.SyntaxError,
	message: "syntax error before: sigil ~{sigil} starting with content '{content}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Look at what comes right before the sigil; an operator or separator is probably missing.',
}

// =============================================================================
// COMPILE ERRORS (FRCOMP001-049)
// =============================================================================

export const FRCOMP001: DiagnosticDef = {
	code: 'FRCOMP001',
	description: 'The code parsed, but the compiler cannot accept it.',
	kind: DiagnosticKind.CompileError,
	message: '{detail}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// COMPILE WARNINGS (FRCOMP050-099)
// =============================================================================

export const FRCOMP050: DiagnosticDef = {
	code: 'FRCOMP050',
	description: 'Something in the code is suspicious but does not stop compilation.',
	message: 'warning: ',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Compile errors
	FRCOMP001,
	// Compile warnings
	FRCOMP050,
	// Parser errors
	FRPARSE001,
	FRPARSE002,
	FRPARSE003,
	FRPARSE004,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS

/**
 * What each fatal kind means, for `ferrule explain`.
 */
export const KIND_DESCRIPTIONS: Readonly<Record<DiagnosticKind, string>> = {
	CompileError: 'A generic compile-time failure. The message comes from the phase that rejected the code.',
	SyntaxError: 'The tokens are in an order the parser does not accept.',
	TokenMissingError: 'The input ended before a construct was complete.',
}
