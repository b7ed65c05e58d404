import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FileRegistry, fileId } from '../../src/core/files.ts'
import { position, textRange } from '../../src/core/position.ts'

describe('core/files', () => {
	describe('FileRegistry', () => {
		it('should hand out sequential handles', () => {
			const files = new FileRegistry()
			assert.strictEqual(files.register('a.vasm', 'nop'), 0)
			assert.strictEqual(files.register('b.vasm', 'halt'), 1)
			assert.strictEqual(files.count(), 2)
		})

		it('should keep path and text', () => {
			const files = new FileRegistry()
			const id = files.register('main.vasm', 'ld $r0, 1\n')
			const source = files.get(id)

			assert.strictEqual(source.id, id)
			assert.strictEqual(source.path, 'main.vasm')
			assert.strictEqual(source.text, 'ld $r0, 1\n')
		})

		it('should decode text into scalar values', () => {
			const files = new FileRegistry()
			const source = files.get(files.register('u.vasm', 'a😀b'))

			assert.deepStrictEqual(source.chars, ['a', '😀', 'b'])
		})

		it('should throw on an unknown handle', () => {
			const files = new FileRegistry()
			assert.throws(() => files.get(fileId(0)), /Invalid FileId/)
		})

		it('should validate handles', () => {
			const files = new FileRegistry()
			const id = files.register('x', '')

			assert.strictEqual(files.isValid(id), true)
			assert.strictEqual(files.isValid(fileId(1)), false)
			assert.strictEqual(files.isValid(fileId(-1)), false)
		})

		it('should slice the text a range covers', () => {
			const files = new FileRegistry()
			const id = files.register('s.vasm', 'é $rsp')
			const range = textRange(position(3, 0, 3), position(6, 0, 6), id)

			assert.strictEqual(files.sliceRange(range), 'rsp')
		})

		it('should return lines without their break', () => {
			const files = new FileRegistry()
			const id = files.register('l.vasm', 'nop\nhalt\n')

			assert.strictEqual(files.getLine(id, 0), 'nop')
			assert.strictEqual(files.getLine(id, 1), 'halt')
			assert.strictEqual(files.getLine(id, 2), '')
			assert.strictEqual(files.getLine(id, 3), undefined)
		})
	})
})
