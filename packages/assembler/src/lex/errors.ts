/**
 * Lexer failure modes.
 * Every variant carries the position or range a caller needs to point at the source.
 */

import type { Position, TextRange } from '../core/position.ts'

export type LexError =
	| { readonly kind: 'UnexpectedCharacter'; readonly char: string; readonly position: Position }
	| { readonly kind: 'EmptyIdentifier'; readonly position: Position }
	| { readonly kind: 'InvalidHexLiteral'; readonly range: TextRange }
	| { readonly kind: 'InvalidBinaryLiteral'; readonly range: TextRange }
	/** Reserved for float literals */
	| { readonly kind: 'UnexpectedSecondDecimalPoint'; readonly position: Position }
	/** Reserved for float literals */
	| { readonly kind: 'InvalidFloatLiteral'; readonly range: TextRange }
	| { readonly kind: 'InvalidUnsignedIntegerLiteral'; readonly range: TextRange }
	| { readonly kind: 'InvalidSignedIntegerLiteral'; readonly range: TextRange }
	| { readonly kind: 'InvalidRegister'; readonly range: TextRange }
	| { readonly kind: 'ExpectedRegisterFoundEOF'; readonly position: Position }
	| { readonly kind: 'UnknownDirective'; readonly range: TextRange }

export type LexErrorKind = LexError['kind']

type RangeErrorKind = Extract<LexError, { range: TextRange }>['kind']
type PositionErrorKind = Exclude<
	Extract<LexError, { position: Position }>['kind'],
	'UnexpectedCharacter'
>

export function unexpectedCharacter(char: string, position: Position): LexError {
	return { char, kind: 'UnexpectedCharacter', position }
}

export function atPosition(kind: PositionErrorKind, position: Position): LexError {
	return { kind, position }
}

export function overRange(kind: RangeErrorKind, range: TextRange): LexError {
	return { kind, range }
}

/** Start of the source span an error points at. */
export function errorStart(error: LexError): Position {
	return 'range' in error ? error.range.start : error.position
}

/**
 * Thrown for input the lexer deliberately does not handle yet (float literals).
 * Never returned as a LexError, so callers cannot mistake it for a recoverable failure.
 */
export class UnimplementedError extends Error {
	readonly feature: string
	readonly position: Position

	constructor(feature: string, position: Position) {
		super(`${feature} are not implemented (at offset ${position.offset})`)
		this.name = 'UnimplementedError'
		this.feature = feature
		this.position = position
	}
}
