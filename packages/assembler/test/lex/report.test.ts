import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FileRegistry, type SourceFile } from '../../src/core/files.ts'
import { position, textRange } from '../../src/core/position.ts'
import { atPosition, type LexError, overRange, unexpectedCharacter } from '../../src/lex/errors.ts'
import { describeLexError, formatLexError, lexErrorCode } from '../../src/lex/report.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function failing(text: string, path = 'main.vasm'): { error: LexError; source: SourceFile } {
	const files = new FileRegistry()
	const source = files.get(files.register(path, text))
	const output = tokenize(source.chars, source.id)
	if (output.succeeded) {
		assert.fail(`expected ${JSON.stringify(text)} to fail`)
	}
	return { error: output.error, source }
}

describe('lex/report', () => {
	describe('lexErrorCode', () => {
		it('should give every error kind its own code', () => {
			const at = position(0, 0, 0)
			const range = textRange(at, at, new FileRegistry().register('x', ''))
			const errors: LexError[] = [
				unexpectedCharacter('?', at),
				atPosition('EmptyIdentifier', at),
				overRange('InvalidHexLiteral', range),
				overRange('InvalidBinaryLiteral', range),
				atPosition('UnexpectedSecondDecimalPoint', at),
				overRange('InvalidFloatLiteral', range),
				overRange('InvalidUnsignedIntegerLiteral', range),
				overRange('InvalidSignedIntegerLiteral', range),
				overRange('InvalidRegister', range),
				atPosition('ExpectedRegisterFoundEOF', at),
				overRange('UnknownDirective', range),
			]

			assert.deepStrictEqual(errors.map(lexErrorCode), [
				'VMLEX001',
				'VMLEX002',
				'VMLEX003',
				'VMLEX004',
				'VMLEX005',
				'VMLEX006',
				'VMLEX007',
				'VMLEX008',
				'VMLEX009',
				'VMLEX010',
				'VMLEX011',
			])
		})
	})

	describe('describeLexError', () => {
		it('should interpolate the offending character', () => {
			const { error, source } = failing('nop @')
			const diagnostic = describeLexError(error, source)

			assert.strictEqual(diagnostic.def.code, 'VMLEX001')
			assert.strictEqual(diagnostic.message, "unexpected character '@'")
			assert.deepStrictEqual(diagnostic.start, position(4, 0, 4))
			assert.strictEqual(diagnostic.width, 1)
		})

		it('should name the bad register without its sigil', () => {
			const { error, source } = failing('ld $rx, 1')
			const diagnostic = describeLexError(error, source)

			assert.deepStrictEqual(diagnostic.args, { name: 'rx' })
			assert.strictEqual(diagnostic.message, "invalid register '$rx'")
			assert.strictEqual(diagnostic.width, 2)
		})

		it('should widen zero-width ranges to one column', () => {
			const { error, source } = failing('0x')
			const diagnostic = describeLexError(error, source)

			assert.strictEqual(diagnostic.message, "invalid hexadecimal literal '0x'")
			assert.deepStrictEqual(diagnostic.start, position(2, 0, 2))
			assert.strictEqual(diagnostic.width, 1)
		})

		it('should point past the sigil at end of input', () => {
			const { error, source } = failing('$')
			const diagnostic = describeLexError(error, source)

			assert.strictEqual(diagnostic.def.code, 'VMLEX010')
			assert.strictEqual(diagnostic.message, 'expected register, found end of file')
			assert.deepStrictEqual(diagnostic.start, position(1, 0, 1))
		})
	})

	describe('formatLexError', () => {
		it('should render an unknown directive with its help line', () => {
			const { error, source } = failing('%bogus')

			assert.strictEqual(
				formatLexError(error, source),
				[
					"error[VMLEX011]: unknown directive '%bogus'",
					'  --> main.vasm:1:2',
					'   | ',
					' 1 | %bogus',
					'   |  ^^^^^',
					'   | ',
					'   = help: Check the directive name for typos.',
				].join('\n')
			)
		})

		it('should underline the register name after the sigil', () => {
			const { error, source } = failing('ld $rx, 1', 'a.vasm')

			assert.strictEqual(
				formatLexError(error, source),
				[
					"error[VMLEX009]: invalid register '$rx'",
					'  --> a.vasm:1:5',
					'   | ',
					' 1 | ld $rx, 1',
					'   |     ^^',
					'   | ',
					'   = help: Check the register name for typos.',
				].join('\n')
			)
		})

		it('should pad the gutter to the line number width', () => {
			const { error, source } = failing(`${'\n'.repeat(9)}@`)

			assert.strictEqual(
				formatLexError(error, source),
				[
					"error[VMLEX001]: unexpected character '@'",
					'  --> main.vasm:10:1',
					'    | ',
					' 10 | @',
					'    | ^',
					'    | ',
					'   = help: Remove the character, or start a comment with `#` if this is meant as a note.',
				].join('\n')
			)
		})

		it('should omit the help line when the catalog has none', () => {
			const files = new FileRegistry()
			const source = files.get(files.register('f.vasm', '0f1.5'))
			const range = textRange(position(2, 0, 2), position(5, 0, 5), source.id)

			assert.strictEqual(
				formatLexError(overRange('InvalidFloatLiteral', range), source),
				[
					'error[VMLEX006]: invalid float literal',
					'  --> f.vasm:1:3',
					'   | ',
					' 1 | 0f1.5',
					'   |   ^^^',
				].join('\n')
			)
		})

		it('should print only the header when the line is missing', () => {
			const files = new FileRegistry()
			const source = files.get(files.register('short.vasm', 'nop'))
			const error = atPosition('EmptyIdentifier', position(40, 5, 0))

			assert.strictEqual(
				formatLexError(error, source),
				['error[VMLEX002]: expected an identifier', '  --> short.vasm:6:1'].join('\n')
			)
		})
	})
})
