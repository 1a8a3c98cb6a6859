import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DIAGNOSTICS,
	DiagnosticKind,
	DiagnosticSeverity,
	getDiagnostic,
	isDiagnosticKind,
	isValidDiagnosticCode,
	KIND_DESCRIPTIONS,
} from '../src/index.ts'

describe('diagnostic catalog', () => {
	it('should key every definition by its own code', () => {
		for (const [code, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, code)
		}
	})

	it('should give every error-severity compiler definition a kind', () => {
		for (const def of Object.values(DIAGNOSTICS)) {
			if (def.code.startsWith('FRCLI')) continue
			if (def.severity === DiagnosticSeverity.Error) {
				assert.ok(def.kind !== undefined, `${def.code} has no kind`)
			}
		}
	})

	it('should look definitions up by code', () => {
		assert.strictEqual(getDiagnostic('FRPARSE003').message, 'unexpected token: end')
		assert.strictEqual(getDiagnostic('FRPARSE001').kind, DiagnosticKind.TokenMissingError)
	})

	it('should validate codes', () => {
		assert.strictEqual(isValidDiagnosticCode('FRPARSE001'), true)
		assert.strictEqual(isValidDiagnosticCode('FRPARSE999'), false)
	})

	it('should not accept inherited object keys as codes', () => {
		assert.strictEqual(isValidDiagnosticCode('toString'), false)
		assert.strictEqual(isValidDiagnosticCode('constructor'), false)
	})
})

describe('DiagnosticKind', () => {
	it('should be a closed set of three kinds', () => {
		assert.deepStrictEqual(Object.values(DiagnosticKind).sort(), [
			'CompileError',
			'SyntaxError',
			'TokenMissingError',
		])
	})

	it('should recognize kind names', () => {
		assert.strictEqual(isDiagnosticKind('SyntaxError'), true)
		assert.strictEqual(isDiagnosticKind('TypeError'), false)
	})

	it('should describe every kind', () => {
		for (const kind of Object.values(DiagnosticKind)) {
			assert.ok(KIND_DESCRIPTIONS[kind].length > 0)
		}
	})
})
