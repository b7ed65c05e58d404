import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	ASSEMBLER_DIAGNOSTICS,
	CLI_DIAGNOSTICS,
	DIAGNOSTICS,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from '../src/index.ts'

describe('interpolateMessage', () => {
	it('should return the template unchanged without arguments', () => {
		assert.strictEqual(interpolateMessage('expected an identifier'), 'expected an identifier')
	})

	it('should replace every placeholder', () => {
		assert.strictEqual(
			interpolateMessage('{a} and {b} and {a}', { a: 'x', b: 2 }),
			'x and 2 and x'
		)
	})

	it('should print bigint arguments in decimal', () => {
		assert.strictEqual(interpolateMessage('value {v}', { v: 18446744073709551615n }), 'value 18446744073709551615')
	})

	it('should leave unknown placeholders in place', () => {
		assert.strictEqual(interpolateMessage('missing {name}', { other: 'x' }), 'missing {name}')
	})

	it('should keep text around a placeholder', () => {
		assert.strictEqual(interpolateMessage("invalid register '${name}'", { name: 'rx' }), "invalid register '$rx'")
	})
})

describe('diagnostic catalog', () => {
	it('should key every entry by its own code', () => {
		for (const [code, def] of Object.entries(DIAGNOSTICS)) {
			assert.strictEqual(def.code, code)
		}
	})

	it('should number lexer diagnostics contiguously', () => {
		assert.deepStrictEqual(
			Object.keys(ASSEMBLER_DIAGNOSTICS),
			Array.from({ length: 11 }, (_, i) => `VMLEX${String(i + 1).padStart(3, '0')}`)
		)
	})

	it('should include every CLI diagnostic', () => {
		assert.deepStrictEqual(Object.keys(CLI_DIAGNOSTICS), ['VMCLI001', 'VMCLI002', 'VMCLI003', 'VMCLI004'])
	})

	it('should mark every entry as an error', () => {
		for (const def of Object.values(DIAGNOSTICS)) {
			assert.strictEqual(def.severity, DiagnosticSeverity.Error)
		}
	})

	it('should describe every entry', () => {
		for (const def of Object.values(DIAGNOSTICS)) {
			assert.ok(def.description.length > 0, def.code)
			assert.ok(def.message.length > 0, def.code)
		}
	})

	it('should look entries up by code', () => {
		assert.strictEqual(getDiagnostic('VMLEX011').message, "unknown directive '%{name}'")
		assert.strictEqual(getDiagnostic('VMCLI001').message, 'file not found: {path}')
	})

	it('should validate codes', () => {
		assert.strictEqual(isValidDiagnosticCode('VMLEX001'), true)
		assert.strictEqual(isValidDiagnosticCode('VMLEX099'), false)
		assert.strictEqual(isValidDiagnosticCode('toString'), false)
	})
})
