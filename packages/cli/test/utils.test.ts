import assert from 'node:assert'
import { describe, it } from 'node:test'
import { DiagnosticReporter, type DiagnosticStream } from '@ferrule/reporter'
import {
	explainDiagnostic,
	formatUsage,
	FragmentLogError,
	formatReadError,
	formatSummary,
	formatUnknownKindError,
	getErrorMessage,
	isNodeError,
	parseFragmentLog,
	replayLog,
} from '../src/utils.ts'

class CaptureStream implements DiagnosticStream {
	readonly chunks: string[] = []

	write(chunk: string): boolean {
		this.chunks.push(chunk)
		return true
	}
}

function createTestReporter(): { reporter: DiagnosticReporter; stream: CaptureStream } {
	const stream = new CaptureStream()
	return { reporter: new DiagnosticReporter({ ansiEnabled: false, cwd: '/work', stream }), stream }
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error: NodeJS.ErrnoException = new Error('test')
		error.code = 'ENOENT'
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const error: NodeJS.ErrnoException = new Error('no such file')
		error.code = 'ENOENT'
		assert.strictEqual(formatReadError('/path/to/log.json', error), '[FRCLI001] file not found: /path/to/log.json')
	})

	it('should format other errors with the reason', () => {
		const error: NodeJS.ErrnoException = new Error('permission denied')
		error.code = 'EACCES'
		assert.strictEqual(formatReadError('/path/to/log.json', error), '[FRCLI002] cannot read file: permission denied')
	})
})

describe('formatUnknownKindError', () => {
	it('should name the unknown kind', () => {
		assert.strictEqual(formatUnknownKindError('TypeError'), '[FRCLI004] unknown diagnostic kind "TypeError"')
	})
})

describe('parseFragmentLog', () => {
	it('should parse every entry type', () => {
		const source = JSON.stringify([
			{ file: 'a.ex', line: 3, prefix: 'syntax error before: ', token: 'eol', type: 'parse' },
			{ file: 'a.ex', prefix: ['unexpected ', ' here'], token: 'x', type: 'parse' },
			{ file: 'b.ex', line: 1, message: 'nope', type: 'compile' },
			{ file: 'c.ex', text: 'unused', type: 'warning' },
			{ text: 'slow', type: 'note' },
		])
		assert.deepStrictEqual(parseFragmentLog(source), [
			{ file: 'a.ex', line: 3, prefix: 'syntax error before: ', token: 'eol', type: 'parse' },
			{ file: 'a.ex', line: 0, prefix: ['unexpected ', ' here'], token: 'x', type: 'parse' },
			{ file: 'b.ex', line: 1, message: 'nope', type: 'compile' },
			{ file: 'c.ex', line: 0, text: 'unused', type: 'warning' },
			{ text: 'slow', type: 'note' },
		])
	})

	it('should reject invalid JSON', () => {
		assert.throws(() => parseFragmentLog('{'), FragmentLogError)
	})

	it('should reject a non-array log', () => {
		assert.throws(() => parseFragmentLog('{}'), {
			message: '[FRCLI003] invalid fragment log: expected an array of fragments',
			name: 'FragmentLogError',
		})
	})

	it('should reject unknown entry types', () => {
		assert.throws(() => parseFragmentLog('[{"type":"panic"}]'), {
			message: '[FRCLI003] invalid fragment log: entry 0 has unknown type "panic"',
		})
	})

	it('should reject malformed fields', () => {
		assert.throws(() => parseFragmentLog('[{"type":"note"}]'), {
			message: '[FRCLI003] invalid fragment log: entry 0: "text" must be a string',
		})
		assert.throws(() => parseFragmentLog('[{"type":"warning","file":"a.ex","text":"t","line":-1}]'), {
			message: '[FRCLI003] invalid fragment log: entry 0: "line" must be a non-negative integer',
		})
		assert.throws(() => parseFragmentLog('[{"type":"parse","file":"a.ex","token":"","prefix":["a"]}]'), {
			message: '[FRCLI003] invalid fragment log: entry 0: "prefix" must be a string or a [prefix, suffix] pair',
		})
	})
})

describe('replayLog', () => {
	it('should collect every raised diagnostic and print warnings', () => {
		const { reporter, stream } = createTestReporter()
		const summary = replayLog(reporter, [
			{ file: 'a.ex', line: 3, prefix: 'syntax error before: ', token: "'end'", type: 'parse' },
			{ file: '/work/b.ex', line: 2, text: 'unused variable x', type: 'warning' },
			{ file: 'c.ex', line: 0, message: 'cannot compile', type: 'compile' },
			{ text: 'slow', type: 'note' },
		])
		assert.deepStrictEqual(summary.diagnostics, [
			{ file: 'a.ex', kind: 'SyntaxError', line: 3, message: 'unexpected token: end' },
			{ file: 'c.ex', kind: 'CompileError', line: 0, message: 'cannot compile' },
		])
		assert.deepStrictEqual(stream.chunks, ['warning: unused variable x\n  b.ex:2\n', 'warning: slow\n'])
	})

	it('should not hide decode failures', () => {
		const { reporter } = createTestReporter()
		assert.throws(
			() => replayLog(reporter, [{ file: 'a.ex', line: 1, prefix: 'syntax error before: ', token: '[', type: 'parse' }]),
			{ name: 'TermDecodeError' }
		)
	})
})

describe('formatSummary', () => {
	it('should pluralize counts', () => {
		assert.strictEqual(formatSummary(1, 0), '1 error, 0 warnings')
		assert.strictEqual(formatSummary(2, 1), '2 errors, 1 warning')
	})
})

describe('explainDiagnostic', () => {
	it('should describe a kind', () => {
		assert.strictEqual(
			explainDiagnostic('TokenMissingError'),
			'TokenMissingError: The input ended before a construct was complete.'
		)
	})

	it('should describe a code with its suggestion', () => {
		assert.strictEqual(
			explainDiagnostic('FRPARSE003'),
			[
				'FRPARSE003: unexpected token: end',
				'',
				'An `end` showed up without a block to close.',
				'',
				'Suggestion: Remove the extra `end`, or add the `do` it was meant to close.',
			].join('\n')
		)
	})

	it('should return null for unknown names', () => {
		assert.strictEqual(explainDiagnostic('TypeError'), null)
	})

	it('should return null for inherited object keys', () => {
		assert.strictEqual(explainDiagnostic('toString'), null)
		assert.strictEqual(explainDiagnostic('constructor'), null)
	})
})

describe('formatUsage', () => {
	it('should list each command with its description', () => {
		const usage = formatUsage('0.1.0', [
			{ commandName: 'replay', description: 'Replay fragments' },
			{ commandName: 'explain', description: 'Describe a kind' },
		])
		assert.strictEqual(
			usage,
			[
				'ferrule v0.1.0',
				'',
				'Usage: ferrule <command> [options]',
				'',
				'Commands:',
				'  replay   Replay fragments',
				'  explain  Describe a kind',
			].join('\n')
		)
	})
})
