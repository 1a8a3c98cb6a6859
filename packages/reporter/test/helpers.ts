import type { DiagnosticStream, ReporterConfig, WarningPalette } from '../src/core/config.ts'
import type { WarningCollector, WarningEvent } from '../src/core/session.ts'

export const TEST_CWD = '/work'

/**
 * Stream that keeps everything written to it.
 */
export class CaptureStream implements DiagnosticStream {
	readonly chunks: string[] = []

	write(chunk: string): boolean {
		this.chunks.push(chunk)
		return true
	}

	get output(): string {
		return this.chunks.join('')
	}
}

export function createTestConfig(
	options: { ansiEnabled?: boolean; palette?: WarningPalette } = {}
): { config: ReporterConfig; stream: CaptureStream } {
	const stream = new CaptureStream()
	const config: ReporterConfig = {
		ansiEnabled: options.ansiEnabled ?? false,
		cwd: TEST_CWD,
		stream,
		...(options.palette ? { palette: options.palette } : {}),
	}
	return { config, stream }
}

/**
 * Resolves once the collector holds at least `count` warnings.
 */
export function waitForWarnings(collector: WarningCollector, count: number): Promise<readonly WarningEvent[]> {
	return new Promise((resolve) => {
		const check = (): void => {
			if (collector.warnings.length >= count) {
				collector.off('warning', check)
				resolve(collector.warnings)
			}
		}
		collector.on('warning', check)
		check()
	})
}
