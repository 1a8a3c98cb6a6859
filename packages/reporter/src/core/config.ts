import useColors from '@poppinss/colors'

/**
 * Where warnings are written. Defaults to standard error.
 */
export interface DiagnosticStream {
	write(chunk: string): unknown
	readonly isTTY?: boolean
}

/**
 * Colors used for the warning prefix.
 */
export interface WarningPalette {
	yellow(text: string): string
}

export interface ReporterConfig {
	/** Whether the warning prefix is colored; read each time a warning is printed */
	readonly ansiEnabled: boolean
	/** Paths below this directory are printed relative to it */
	readonly cwd: string
	readonly stream: DiagnosticStream
	/** Palette used when ANSI is enabled */
	readonly palette?: WarningPalette
}

export interface LoadReporterConfigOptions {
	env?: NodeJS.ProcessEnv
	stream?: DiagnosticStream
	cwd?: string
}

/**
 * ANSI output follows FORCE_COLOR, then NO_COLOR, then whether the stream is a terminal.
 */
export function detectAnsi(env: NodeJS.ProcessEnv, stream: DiagnosticStream): boolean {
	const force = env['FORCE_COLOR']
	if (force !== undefined && force !== '0' && force !== 'false') return true
	if (env['NO_COLOR'] !== undefined) return false
	return stream.isTTY === true
}

export function loadReporterConfig(options: LoadReporterConfigOptions = {}): ReporterConfig {
	const stream = options.stream ?? process.stderr
	return {
		ansiEnabled: detectAnsi(options.env ?? process.env, stream),
		cwd: options.cwd ?? process.cwd(),
		stream,
	}
}

export function resolvePalette(config: ReporterConfig): WarningPalette {
	return config.palette ?? useColors.ansi()
}
