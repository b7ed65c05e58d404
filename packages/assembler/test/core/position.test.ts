import assert from 'node:assert'
import { describe, it } from 'node:test'
import { fileId } from '../../src/core/files.ts'
import {
	formatPosition,
	isSingleLine,
	position,
	positionsEqual,
	rangeLength,
	textRange,
} from '../../src/core/position.ts'

describe('core/position', () => {
	describe('position', () => {
		it('should build a position from its parts', () => {
			assert.deepStrictEqual(position(12, 1, 3), { column: 3, offset: 12, row: 1 })
		})
	})

	describe('positionsEqual', () => {
		it('should compare every field', () => {
			assert.strictEqual(positionsEqual(position(4, 0, 4), position(4, 0, 4)), true)
			assert.strictEqual(positionsEqual(position(4, 0, 4), position(4, 1, 0)), false)
			assert.strictEqual(positionsEqual(position(4, 0, 4), position(5, 0, 4)), false)
		})
	})

	describe('textRange', () => {
		const file = fileId(2)

		it('should carry its file handle', () => {
			const range = textRange(position(0, 0, 0), position(3, 0, 3), file)
			assert.strictEqual(range.file, file)
		})

		it('should measure length in characters', () => {
			assert.strictEqual(rangeLength(textRange(position(7, 1, 2), position(10, 1, 5), file)), 3)
		})

		it('should allow zero-width ranges', () => {
			const at = position(5, 0, 5)
			const range = textRange(at, at, file)
			assert.strictEqual(rangeLength(range), 0)
			assert.strictEqual(isSingleLine(range), true)
		})

		it('should detect ranges crossing a line break', () => {
			assert.strictEqual(isSingleLine(textRange(position(2, 0, 2), position(6, 1, 1), file)), false)
			assert.strictEqual(isSingleLine(textRange(position(6, 1, 1), position(9, 1, 4), file)), true)
		})
	})

	describe('formatPosition', () => {
		it('should print one-based row and column', () => {
			assert.strictEqual(formatPosition(position(0, 0, 0)), '1:1')
			assert.strictEqual(formatPosition(position(30, 3, 9)), '4:10')
		})
	})
})
