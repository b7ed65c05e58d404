/**
 * Source coordinates.
 * All fields are zero-based and counted in Unicode scalar values, not UTF-16 units.
 */

import type { FileId } from './files.ts'

export interface Position {
	/** Absolute offset from the start of the file */
	readonly offset: number
	readonly row: number
	/** Offset since the last line break */
	readonly column: number
}

/**
 * Half-open span `[start, end)` inside one file.
 * Ranges never cross a line break.
 */
export interface TextRange {
	readonly start: Position
	readonly end: Position
	readonly file: FileId
}

export function position(offset: number, row: number, column: number): Position {
	return { column, offset, row }
}

export function textRange(start: Position, end: Position, file: FileId): TextRange {
	return { end, file, start }
}

export function positionsEqual(a: Position, b: Position): boolean {
	return a.offset === b.offset && a.row === b.row && a.column === b.column
}

export function rangeLength(range: TextRange): number {
	return range.end.offset - range.start.offset
}

export function isSingleLine(range: TextRange): boolean {
	return (
		range.start.row === range.end.row &&
		range.end.column - range.start.column === rangeLength(range)
	)
}

/** `row:column`, 1-based for display. */
export function formatPosition(pos: Position): string {
	return `${pos.row + 1}:${pos.column + 1}`
}
