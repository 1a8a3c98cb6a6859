/**
 * Location metadata attached to a syntax node.
 */
export interface LocationMeta {
	/** Line of the node in the file being compiled */
	readonly line?: number
	/** Explicit location override, e.g. for code expanded from another file */
	readonly file?: { readonly path: string; readonly line: number }
}

/**
 * Position of a token as reported by the lexer.
 */
export interface TokenPosition {
	readonly line: number
	readonly column: number
}

/**
 * Anything accepted where a line is expected. Absent lines become 0.
 */
export type LineInput = number | TokenPosition | null | undefined

export interface SourceLocation {
	readonly file: string
	/** 1-indexed; 0 means no specific line */
	readonly line: number
}

export function lineOf(input: LineInput): number {
	if (input === null || input === undefined) return 0
	return typeof input === 'number' ? input : input.line
}

/**
 * Pick the most accurate location for a diagnostic.
 * An explicit file override wins; otherwise the fallback file with the meta line.
 */
export function resolveLocation(meta: LocationMeta | null | undefined, file: string): SourceLocation {
	if (meta?.file !== undefined) {
		return { file: meta.file.path, line: meta.file.line }
	}
	return { file, line: meta?.line ?? 0 }
}
