import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * A value decoded from its printed form.
 *
 * Strings are character lists in the printed syntax; they are kept apart from
 * binaries because only binaries count as text when a token is displayed.
 */
export type Term =
	| { readonly kind: 'atom'; readonly name: string }
	| { readonly kind: 'integer'; readonly value: number }
	| { readonly kind: 'float'; readonly value: number }
	| { readonly kind: 'string'; readonly value: string }
	| { readonly kind: 'binary'; readonly value: string }
	| { readonly kind: 'tuple'; readonly elements: readonly Term[] }
	| { readonly kind: 'list'; readonly elements: readonly Term[]; readonly tail?: Term }

/**
 * Appended to every input so a term has to consume the whole token.
 */
export const TERM_TERMINATOR = '.'

/**
 * Printed term grammar.
 *
 * Covers what the lexer writes when it serializes a token into an error
 * fragment: atoms, numbers, characters, strings, binaries, tuples and lists.
 */
const grammarSource = String.raw`
PrintedTerm {
  Term = Value "."

  Value = Tuple | List | Binary | string | char | number | atom

  Tuple = "{" ListOf<Value, ","> "}"

  List = "[" NonemptyListOf<Value, ","> "|" Value "]"  -- improper
       | "[" ListOf<Value, ","> "]"                     -- proper

  Binary = "<<" ListOf<Segment, ","> ">>"
  Segment = string "/" "utf8"  -- utf8
          | string             -- latin1
          | integer            -- byte

  number = float | integer
  float = "-"? digit+ "." digit+ exponent?
  exponent = ("e" | "E") ("+" | "-")? digit+
  integer = "-"? digit+

  atom = quotedAtom | bareAtom
  bareAtom = lower atomChar*
  atomChar = alnum | "_" | "@"
  quotedAtom = "'" quotedAtomChar* "'"
  quotedAtomChar = escape | ~("'" | "\\") any

  string = "\"" stringChar* "\""
  stringChar = escape | ~("\"" | "\\") any
  char = "$" (escape | any)
  escape = "\\" any
}
`

export const PrintedTermGrammar = ohm.grammar(grammarSource)

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
	b: '\b',
	d: '\x7f',
	e: '\x1b',
	f: '\f',
	n: '\n',
	r: '\r',
	s: ' ',
	t: '\t',
	v: '\v',
}

const ESCAPE_PATTERN = /\\(?:([0-7]{1,3})|x\{([0-9a-fA-F]+)\}|x([0-9a-fA-F]{2})|\^(.)|(.))/gsu

/**
 * Resolve backslash escapes inside a quoted atom, string or character.
 */
export function unescapeQuoted(raw: string): string {
	return raw.replace(
		ESCAPE_PATTERN,
		(
			_match: string,
			octal: string | undefined,
			braced: string | undefined,
			hex: string | undefined,
			control: string | undefined,
			other: string | undefined
		) => {
			if (octal !== undefined) return String.fromCodePoint(Number.parseInt(octal, 8))
			if (braced !== undefined) return String.fromCodePoint(Number.parseInt(braced, 16))
			if (hex !== undefined) return String.fromCodePoint(Number.parseInt(hex, 16))
			if (control !== undefined) return String.fromCodePoint((control.codePointAt(0) ?? 0) & 31)
			const simple = other !== undefined ? SIMPLE_ESCAPES[other] : undefined
			return simple ?? other ?? ''
		}
	)
}

function quotedBody(node: Node): string {
	return unescapeQuoted(node.sourceString.slice(1, -1))
}

function latin1Bytes(text: string): number[] {
	return Array.from(text, (c) => (c.codePointAt(0) ?? 0) & 0xff)
}

/**
 * Create semantics for the printed term grammar.
 */
export function createTermSemantics(): Semantics {
	const semantics = PrintedTermGrammar.createSemantics()

	// Raw bytes of one binary segment
	semantics.addOperation<number[]>('toBytes', {
		Segment_byte(integer: Node) {
			return [Number(integer.sourceString) & 0xff]
		},
		Segment_latin1(str: Node) {
			return latin1Bytes(quotedBody(str))
		},
		Segment_utf8(str: Node, _slash: Node, _encoding: Node) {
			return [...Buffer.from(quotedBody(str), 'utf8')]
		},
	})

	semantics.addOperation<Term>('toTerm', {
		Binary(_open: Node, segments: Node, _close: Node) {
			const bytes: number[] = segments.asIteration().children.flatMap((s: Node) => s['toBytes']())
			return { kind: 'binary', value: Buffer.from(bytes).toString('utf8') }
		},
		List_improper(_open: Node, elements: Node, _bar: Node, tail: Node, _close: Node) {
			return {
				elements: elements.asIteration().children.map((e: Node) => e['toTerm']()),
				kind: 'list',
				tail: tail['toTerm'](),
			}
		},
		List_proper(_open: Node, elements: Node, _close: Node) {
			return {
				elements: elements.asIteration().children.map((e: Node) => e['toTerm']()),
				kind: 'list',
			}
		},
		Term(value: Node, _terminator: Node) {
			return value['toTerm']()
		},
		Tuple(_open: Node, elements: Node, _close: Node) {
			return {
				elements: elements.asIteration().children.map((e: Node) => e['toTerm']()),
				kind: 'tuple',
			}
		},
		bareAtom(_first: Node, _rest: Node) {
			return { kind: 'atom', name: this.sourceString }
		},
		char(_dollar: Node, _char: Node) {
			const decoded = unescapeQuoted(this.sourceString.slice(1))
			return { kind: 'integer', value: decoded.codePointAt(0) ?? 0 }
		},
		float(_sign: Node, _whole: Node, _dot: Node, _fraction: Node, _exponent: Node) {
			return { kind: 'float', value: Number(this.sourceString) }
		},
		integer(_sign: Node, _digits: Node) {
			return { kind: 'integer', value: Number(this.sourceString) }
		},
		quotedAtom(_open: Node, _chars: Node, _close: Node) {
			return { kind: 'atom', name: quotedBody(this) }
		},
		string(_open: Node, _chars: Node, _close: Node) {
			return { kind: 'string', value: quotedBody(this) }
		},
	})

	return semantics
}
