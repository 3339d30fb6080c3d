import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DIAGNOSTICS,
	DiagnosticSeverity,
	formatDiagnostic,
	getDiagnostic,
	isValidDiagnosticCode,
	PCRUN004,
	PCSCAN050,
} from '../src/index.ts'

describe('diagnostic catalog', () => {
	it('should key every definition by its own code', () => {
		for (const [key, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, key)
		}
	})

	it('should mark only the 050-099 range as warnings', () => {
		for (const def of Object.values(DIAGNOSTICS)) {
			const number = Number(def.code.replace(/^\D+/, ''))
			const expected = number >= 50 ? DiagnosticSeverity.Warning : DiagnosticSeverity.Error
			assert.strictEqual(def.severity, expected, def.code)
		}
	})

	it('should look up definitions by code', () => {
		assert.strictEqual(getDiagnostic('PCSCAN050'), PCSCAN050)
	})

	it('should recognize valid codes only', () => {
		assert.strictEqual(isValidDiagnosticCode('PCRUN001'), true)
		assert.strictEqual(isValidDiagnosticCode('PCRUN999'), false)
		assert.strictEqual(isValidDiagnosticCode(''), false)
	})
})

describe('formatDiagnostic', () => {
	it('should prefix the interpolated message with the code', () => {
		const result = formatDiagnostic(PCRUN004, {
			code: 1,
			command: 'go',
			detail: 'no Go files',
			expected: 2,
		})
		assert.strictEqual(result, '[PCRUN004] `go` exited with status 1, expected 2: no Go files')
	})
})
