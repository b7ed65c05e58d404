/**
 * Registry of source files.
 * Files are registered once and referenced everywhere else by a small integer handle,
 * so every token and range can point at its file without owning the text.
 */

import type { TextRange } from './position.ts'

/**
 * Branded type for file handles.
 */
export type FileId = number & { readonly __brand: 'FileId' }

export function fileId(n: number): FileId {
	return n as FileId
}

export interface SourceFile {
	readonly id: FileId
	/** Path or display name used in diagnostics */
	readonly path: string
	readonly text: string
	/** `text` split into Unicode scalar values; offsets in positions index this array */
	readonly chars: readonly string[]
}

/**
 * Dense, append-only file storage.
 * A handle stays valid for as long as the registry lives.
 */
export class FileRegistry {
	private readonly files: SourceFile[] = []

	register(path: string, text: string): FileId {
		const id = fileId(this.files.length)
		this.files.push({ chars: Array.from(text), id, path, text })
		return id
	}

	get(id: FileId): SourceFile {
		const file = this.files[id]
		if (file === undefined) {
			throw new Error(`Invalid FileId: ${id}`)
		}
		return file
	}

	count(): number {
		return this.files.length
	}

	isValid(id: FileId): boolean {
		return Number.isInteger(id) && id >= 0 && id < this.files.length
	}

	/** Text covered by a range. */
	sliceRange(range: TextRange): string {
		return this.get(range.file).chars.slice(range.start.offset, range.end.offset).join('')
	}

	/** Line `row` (zero-based) without its line break. */
	getLine(id: FileId, row: number): string | undefined {
		return this.get(id).text.split('\n')[row]
	}
}
