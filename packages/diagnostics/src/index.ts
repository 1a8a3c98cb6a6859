/**
 * @ferrule/diagnostics
 *
 * Shared diagnostic kinds and message catalog for Ferrule packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	FRCLI001,
	FRCLI002,
	FRCLI003,
	FRCLI004,
} from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	FRCOMP001,
	FRCOMP050,
	FRPARSE001,
	FRPARSE002,
	FRPARSE003,
	FRPARSE004,
	KIND_DESCRIPTIONS,
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticKind,
	DiagnosticSeverity,
	isDiagnosticKind,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}
