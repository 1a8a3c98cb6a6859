/**
 * Decoding of structured offending tokens.
 *
 * A few tokens reach the parser error path as printed terms rather than as
 * source text. These helpers parse the printed form back and pull out the
 * part worth showing to a user.
 */

import { createTermSemantics, PrintedTermGrammar, TERM_TERMINATOR, type Term } from './grammar.ts'

/**
 * Error thrown when a structured token cannot be decoded, or decodes to an
 * unexpected shape.
 */
export class TermDecodeError extends Error {
	readonly text: string
	readonly reason: string

	constructor(text: string, reason: string) {
		super(`cannot decode structured token ${JSON.stringify(text)}: ${reason}`)
		this.name = 'TermDecodeError'
		this.text = text
		this.reason = reason
	}
}

export interface SigilToken {
	readonly kind: 'sigil'
	/** The sigil letter, e.g. `r` for `~r` */
	readonly sigil: string
	/** Leading literal content, or null when the sigil starts with interpolation */
	readonly content: string | null
}

export interface IdentifierToken {
	readonly kind: 'identifier'
	readonly name: string
}

export interface ListToken {
	readonly kind: 'list'
	/** First element when it is binary text */
	readonly head: string | null
}

export type StructuredToken = SigilToken | IdentifierToken | ListToken

export type StructuredShape = StructuredToken['kind']

const semantics = createTermSemantics()

/**
 * Parse printed term text into a Term.
 */
export function decodeTerm(text: string): Term {
	const match = PrintedTermGrammar.match(`${text}${TERM_TERMINATOR}`)
	if (match.failed()) {
		throw new TermDecodeError(text, match.shortMessage ?? 'not a term')
	}
	return semantics(match)['toTerm']()
}

function toSigil(text: string, term: Term): SigilToken {
	if (term.kind !== 'tuple') throw new TermDecodeError(text, 'expected a sigil tuple')
	const [tag, , letter, parts] = term.elements
	if (tag?.kind !== 'atom' || tag.name !== 'sigil') {
		throw new TermDecodeError(text, 'expected a tuple tagged sigil')
	}
	if (letter?.kind !== 'integer' || !isCodePoint(letter.value)) {
		throw new TermDecodeError(text, 'expected a sigil character code')
	}
	if (parts?.kind !== 'list' || parts.elements.length === 0) {
		throw new TermDecodeError(text, 'expected a non-empty list of sigil parts')
	}
	const first = parts.elements[0]
	return {
		content: first?.kind === 'binary' ? first.value : null,
		kind: 'sigil',
		sigil: String.fromCodePoint(letter.value),
	}
}

function isCodePoint(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 0x10ffff
}

function toIdentifier(text: string, term: Term): IdentifierToken {
	if (term.kind !== 'list' || term.tail !== undefined || term.elements.length !== 1) {
		throw new TermDecodeError(text, 'expected a one-element list')
	}
	const [only] = term.elements
	if (only?.kind !== 'atom') throw new TermDecodeError(text, 'expected an atom')
	return { kind: 'identifier', name: only.name }
}

function toList(text: string, term: Term): ListToken {
	if (term.kind !== 'list' || term.elements.length === 0) {
		throw new TermDecodeError(text, 'expected a non-empty list')
	}
	const [head] = term.elements
	return { head: head?.kind === 'binary' ? head.value : null, kind: 'list' }
}

/**
 * Decode a structured token and narrow it to the expected shape.
 * Throws TermDecodeError when the text is not a term or has another shape.
 */
export function decodeStructuredToken(text: string, shape: 'sigil'): SigilToken
export function decodeStructuredToken(text: string, shape: 'identifier'): IdentifierToken
export function decodeStructuredToken(text: string, shape: 'list'): ListToken
export function decodeStructuredToken(text: string, shape: StructuredShape): StructuredToken {
	const term = decodeTerm(text)
	switch (shape) {
		case 'sigil':
			return toSigil(text, term)
		case 'identifier':
			return toIdentifier(text, term)
		case 'list':
			return toList(text, term)
	}
}
