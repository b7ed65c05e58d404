import {
	formatPosition,
	mnemonicOf,
	type NumericMode,
	registerName,
	type SourceFile,
	type Token,
	TokenKind,
	tokenKindName,
	UnimplementedError,
} from '@vmasm/assembler'
import {
	interpolateMessage,
	VMCLI001,
	VMCLI002,
	VMCLI003,
	VMCLI004,
} from '@vmasm/diagnostics'

const NUMERIC_MODES: readonly NumericMode[] = ['unsigned', 'signed', 'float']

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(VMCLI001.message, { path: filePath })
		return `[${VMCLI001.code}] ${message}`
	}
	const message = interpolateMessage(VMCLI002.message, { reason: getErrorMessage(error) })
	return `[${VMCLI002.code}] ${message}`
}

export function formatInvalidModeError(mode: string): string {
	const message = interpolateMessage(VMCLI003.message, { mode })
	return `[${VMCLI003.code}] ${message}`
}

/** Failures that are not lexer errors: the float stub, or a bug. */
export function formatAbortError(error: unknown): string {
	const reason = error instanceof UnimplementedError ? error.message : getErrorMessage(error)
	const message = interpolateMessage(VMCLI004.message, { reason })
	return `[${VMCLI004.code}] ${message}`
}

export function isNumericMode(value: string): value is NumericMode {
	return NUMERIC_MODES.some((mode) => mode === value)
}

export function tokenLexeme(token: Token, source: SourceFile): string {
	return source.chars.slice(token.range.start.offset, token.range.end.offset).join('')
}

/** Decoded value of a token, or undefined for punctuation, directives and identifiers. */
export function tokenPayload(token: Token): string | undefined {
	switch (token.kind) {
		case TokenKind.Register:
			return `$${registerName(token.register)}`
		case TokenKind.Opcode:
			return mnemonicOf(token.opcode) ?? `0x${token.opcode.toString(16)}`
		case TokenKind.UnsignedIntegerLiteral:
		case TokenKind.SignedIntegerLiteral:
			return token.value.toString()
		default:
			return undefined
	}
}

/**
 * One line per token: `row:col Kind [payload] 'lexeme'`.
 */
export function formatToken(token: Token, source: SourceFile): string {
	const payload = tokenPayload(token)
	const parts = [formatPosition(token.range.start), tokenKindName(token.kind)]
	if (payload !== undefined) parts.push(payload)
	parts.push(`'${tokenLexeme(token, source)}'`)
	return parts.join(' ')
}

export interface TokenJson {
	kind: string
	lexeme: string
	start: { offset: number; row: number; column: number }
	end: { offset: number; row: number; column: number }
	payload?: string
}

/** JSON-safe view of a token; bigint payloads become decimal strings. */
export function tokenToJson(token: Token, source: SourceFile): TokenJson {
	const payload = tokenPayload(token)
	const { start, end } = token.range
	return {
		end: { column: end.column, offset: end.offset, row: end.row },
		kind: tokenKindName(token.kind),
		lexeme: tokenLexeme(token, source),
		start: { column: start.column, offset: start.offset, row: start.row },
		...(payload !== undefined ? { payload } : {}),
	}
}
