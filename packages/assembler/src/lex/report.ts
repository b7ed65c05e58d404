/**
 * Turns lexer errors into catalog diagnostics and renders them for humans.
 */

import {
	type AssemblerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from '@vmasm/diagnostics'
import type { SourceFile } from '../core/files.ts'
import type { Position } from '../core/position.ts'
import { errorStart, type LexError, type LexErrorKind } from './errors.ts'

const CODES: Record<LexErrorKind, AssemblerDiagnosticCode> = {
	EmptyIdentifier: 'VMLEX002',
	ExpectedRegisterFoundEOF: 'VMLEX010',
	InvalidBinaryLiteral: 'VMLEX004',
	InvalidFloatLiteral: 'VMLEX006',
	InvalidHexLiteral: 'VMLEX003',
	InvalidRegister: 'VMLEX009',
	InvalidSignedIntegerLiteral: 'VMLEX008',
	InvalidUnsignedIntegerLiteral: 'VMLEX007',
	UnexpectedCharacter: 'VMLEX001',
	UnexpectedSecondDecimalPoint: 'VMLEX005',
	UnknownDirective: 'VMLEX011',
}

/**
 * A lexer error resolved against its catalog entry.
 */
export interface LexDiagnostic {
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	readonly args: DiagnosticArgs
	readonly start: Position
	/** Characters to underline; at least 1 */
	readonly width: number
}

export function lexErrorCode(error: LexError): AssemblerDiagnosticCode {
	return CODES[error.kind]
}

function sourceText(source: SourceFile, from: number, to: number): string {
	return source.chars.slice(from, to).join('')
}

function diagnosticArgs(error: LexError, source: SourceFile): DiagnosticArgs {
	switch (error.kind) {
		case 'UnexpectedCharacter':
			return { char: error.char }
		case 'InvalidHexLiteral':
			return { digits: sourceText(source, error.range.start.offset, error.range.end.offset) }
		case 'InvalidRegister':
		case 'UnknownDirective':
			return { name: sourceText(source, error.range.start.offset, error.range.end.offset) }
		default:
			return {}
	}
}

export function describeLexError(error: LexError, source: SourceFile): LexDiagnostic {
	const def = getDiagnostic(lexErrorCode(error))
	const args = diagnosticArgs(error, source)
	const width = 'range' in error ? error.range.end.offset - error.range.start.offset : 1
	return {
		args,
		def,
		message: interpolateMessage(def.message, args),
		start: errorStart(error),
		width: Math.max(width, 1),
	}
}

function severityLabel(severity: DiagnosticSeverity): string {
	const labels: Record<DiagnosticSeverity, string> = {
		[DiagnosticSeverity.Error]: 'error',
		[DiagnosticSeverity.Warning]: 'warning',
		[DiagnosticSeverity.Note]: 'note',
	}
	return labels[severity]
}

/**
 * Format a lexer error for display.
 *
 * Example:
 * ```
 * error[VMLEX011]: unknown directive '%bogus'
 *   --> main.vasm:1:2
 *    |
 *  1 | %bogus
 *    |  ^^^^^
 *    |
 *    = help: Check the directive name for typos.
 * ```
 */
export function formatLexError(error: LexError, source: SourceFile): string {
	const diagnostic = describeLexError(error, source)
	const { def, start } = diagnostic
	const line = start.row + 1
	const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
	const location = `  --> ${source.path}:${line}:${start.column + 1}`

	const sourceLine = source.text.split('\n')[start.row]
	if (sourceLine === undefined) {
		return `${header}\n${location}`
	}

	const pad = ' '.repeat(String(line).length)
	const emptyPrefix = ` ${pad} | `
	const pointer = `${' '.repeat(start.column)}${'^'.repeat(diagnostic.width)}`
	const lines = [header, location, emptyPrefix, ` ${line} | ${sourceLine}`, `${emptyPrefix}${pointer}`]

	if (def.suggestion) {
		lines.push(emptyPrefix, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
	}

	return lines.join('\n')
}
