/**
 * CLI diagnostic definitions.
 *
 * Error code format: FRCLI<NUMBER>
 * - FRCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (FRCLI001-099)
// =============================================================================

export const FRCLI001: DiagnosticDef = {
	code: 'FRCLI001',
	description: "Ferrule couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const FRCLI002: DiagnosticDef = {
	code: 'FRCLI002',
	description: "The file exists but Ferrule can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const FRCLI003: DiagnosticDef = {
	code: 'FRCLI003',
	description: "The fragment log isn't valid JSON, or isn't an array of fragments.",
	message: 'invalid fragment log: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Each entry needs a "type" of parse, compile, warning or note.',
}

export const FRCLI004: DiagnosticDef = {
	code: 'FRCLI004',
	description: "Ferrule doesn't know this diagnostic kind.",
	message: 'unknown diagnostic kind "{kind}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use CompileError, TokenMissingError or SyntaxError.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	FRCLI001,
	FRCLI002,
	FRCLI003,
	FRCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
