/**
 * Parser error normalization.
 *
 * Raw parser failures arrive as an error prefix plus the offending token. The
 * rule table below rewrites them into the message a user sees. Rules are tried
 * in order and the first match wins; reordering them changes messages (the
 * alias rule must stay ahead of the generic list rule, for one).
 */

import {
	DiagnosticKind,
	FRPARSE001,
	FRPARSE002,
	FRPARSE003,
	FRPARSE004,
	interpolateMessage,
} from '@ferrule/diagnostics'
import type { Diagnostic } from '../core/diagnostic.ts'
import { type LineInput, lineOf } from '../core/location.ts'
import { decodeStructuredToken } from '../term/decode.ts'

/**
 * Either a plain prefix, or a prefix and suffix the token is inserted between.
 */
export type ErrorPrefix = string | readonly [prefix: string, suffix: string]

export interface RawErrorFragment {
	readonly prefix: ErrorPrefix
	/** Text following the point of failure; empty when input ran out */
	readonly token: string
}

export interface NormalizedError {
	readonly kind: DiagnosticKind
	readonly message: string
}

export interface NormalizationRule {
	readonly name: string
	matches(fragment: RawErrorFragment): boolean
	apply(fragment: RawErrorFragment): NormalizedError
}

export const SYNTAX_ERROR_BEFORE = 'syntax error before: '

/** Printed form of a sigil token starts with its tag */
export const SIGIL_MARKER = '{sigil,'
/** Aliases are printed as a one-atom list */
export const ALIAS_MARKER = "['"
/** Binaries and interpolation are printed inside a list */
export const LIST_MARKER = '['

function isSyntaxErrorBefore(prefix: ErrorPrefix): boolean {
	return prefix === SYNTAX_ERROR_BEFORE
}

function prefixText(prefix: ErrorPrefix): string {
	return typeof prefix === 'string' ? prefix : `${prefix[0]}${prefix[1]}`
}

function insertToken(prefix: ErrorPrefix, token: string): string {
	return typeof prefix === 'string' ? `${prefix}${token}` : `${prefix[0]}${token}${prefix[1]}`
}

function syntaxError(message: string): NormalizedError {
	return { kind: DiagnosticKind.SyntaxError, message }
}

export const NORMALIZATION_RULES: readonly NormalizationRule[] = [
	{
		apply: () => ({ kind: DiagnosticKind.TokenMissingError, message: FRPARSE001.message }),
		matches: ({ prefix, token }) => token === '' && isSyntaxErrorBefore(prefix),
		name: 'incomplete-expression',
	},
	{
		apply: ({ prefix }) => ({ kind: DiagnosticKind.TokenMissingError, message: prefixText(prefix) }),
		matches: ({ token }) => token === '',
		name: 'missing-token',
	},
	{
		apply: () => syntaxError(FRPARSE002.message),
		matches: ({ prefix, token }) => isSyntaxErrorBefore(prefix) && token === 'eol',
		name: 'end-of-line',
	},
	{
		apply: () => syntaxError(FRPARSE003.message),
		matches: ({ prefix, token }) => isSyntaxErrorBefore(prefix) && token === "'end'",
		name: 'unexpected-end',
	},
	{
		apply: ({ token }) => {
			const { sigil, content } = decodeStructuredToken(token, 'sigil')
			return syntaxError(interpolateMessage(FRPARSE004, { content: content ?? '', sigil }))
		},
		matches: ({ token }) => token.startsWith(SIGIL_MARKER),
		name: 'sigil',
	},
	{
		apply: ({ prefix, token }) => {
			const { name } = decodeStructuredToken(token, 'identifier')
			return syntaxError(`${prefixText(prefix)}${name}`)
		},
		matches: ({ prefix, token }) => typeof prefix === 'string' && token.startsWith(ALIAS_MARKER),
		name: 'alias',
	},
	{
		apply: ({ prefix, token }) => {
			const { head } = decodeStructuredToken(token, 'list')
			const shown = head === null ? '"' : `"${head}"`
			return syntaxError(`${prefixText(prefix)}${shown}`)
		},
		matches: ({ prefix, token }) => typeof prefix === 'string' && token.startsWith(LIST_MARKER),
		name: 'binary',
	},
	{
		apply: ({ prefix, token }) => syntaxError(insertToken(prefix, token)),
		matches: ({ prefix }) => typeof prefix !== 'string',
		name: 'prefix-suffix',
	},
	{
		apply: ({ prefix, token }) => syntaxError(insertToken(prefix, token)),
		matches: () => true,
		name: 'verbatim',
	},
]

/**
 * The first rule matching `fragment`. The last rule matches everything.
 */
export function selectRule(fragment: RawErrorFragment): NormalizationRule {
	const rule = NORMALIZATION_RULES.find((candidate) => candidate.matches(fragment))
	if (rule === undefined) throw new Error('Normalization rule table has no catch-all rule')
	return rule
}

export function normalizeFragment(fragment: RawErrorFragment): NormalizedError {
	return selectRule(fragment).apply(fragment)
}

/**
 * Build the diagnostic for a raw parser failure at `line` in `file`.
 */
export function normalizeParseError(
	line: LineInput,
	file: string,
	prefix: ErrorPrefix,
	token: string
): Diagnostic {
	const { kind, message } = normalizeFragment({ prefix, token })
	return { file, kind, line: lineOf(line), message }
}
