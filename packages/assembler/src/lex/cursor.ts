import type { FileId } from '../core/files.ts'
import { type Position, position, type TextRange, textRange } from '../core/position.ts'

/**
 * Read position over a decoded character buffer.
 * `index` only moves forward; `col` counts characters since the last line break.
 */
export class Cursor {
	private readonly chars: readonly string[]
	readonly file: FileId
	private index = 0
	private row = 0
	private col = 0

	constructor(chars: readonly string[], file: FileId) {
		this.chars = chars
		this.file = file
	}

	current(): string | undefined {
		return this.chars[this.index]
	}

	/** Character `ahead` places after the current one (default 1). */
	peek(ahead = 1): string | undefined {
		return this.chars[this.index + ahead]
	}

	advance(): void {
		this.index++
		this.col++
	}

	/** The only way to step over `\n`. */
	advanceLine(): void {
		this.index++
		this.col = 0
		this.row++
	}

	position(): Position {
		return position(this.index, this.row, this.col)
	}

	/** Range covering the last `length` characters consumed; they must all be on the current line. */
	rangeOfLast(length: number): TextRange {
		return textRange(
			position(this.index - length, this.row, this.col - length),
			this.position(),
			this.file
		)
	}

	rangeFrom(start: Position): TextRange {
		return textRange(start, this.position(), this.file)
	}

	remaining(): number {
		return this.chars.length - this.index
	}

	isAtEnd(): boolean {
		return this.index >= this.chars.length
	}

	/** Text of the last `length` characters consumed. */
	textOfLast(length: number): string {
		return this.chars.slice(this.index - length, this.index).join('')
	}
}
