import type { FileId, FileRegistry } from '../core/files.ts'
import { type Position, positionsEqual } from '../core/position.ts'
import {
	DIRECTIVES,
	I64_MAX,
	type Token,
	TokenKind,
	TokenStore,
	U64_MAX,
} from '../core/tokens.ts'
import { lookupOpcode } from '../isa/instructions.ts'
import { NAMED_REGISTERS, positionalRegister } from '../isa/registers.ts'
import { Cursor } from './cursor.ts'
import {
	atPosition,
	type LexError,
	overRange,
	UnimplementedError,
	unexpectedCharacter,
} from './errors.ts'

/** How a literal without a `0x`/`0b`/`0i`/`0u`/`0f` prefix is read. */
export type NumericMode = 'signed' | 'unsigned' | 'float'

export interface TokenizeOptions {
	numericMode?: NumericMode
}

export type TokenizeResult =
	| { readonly succeeded: true }
	| { readonly succeeded: false; readonly error: LexError }

export type TokenizeOutput =
	| { readonly succeeded: true; readonly tokens: Token[] }
	| { readonly succeeded: false; readonly error: LexError }

/** Error produced by one dispatch step, or null when it consumed a lexeme cleanly. */
type Step = LexError | null

const MAX_BINARY_DIGITS = 64

const ALPHABETIC = /^\p{Alphabetic}$/u
const ALPHANUMERIC = /^[\p{Alphabetic}\p{N}]$/u
const WHITESPACE = /^\p{White_Space}$/u
const HEX_DIGIT = /^[0-9a-fA-F]$/

function isDecimalDigit(c: string): boolean {
	return c.length === 1 && c >= '0' && c <= '9'
}

function isBinaryDigit(c: string): boolean {
	return c === '0' || c === '1'
}

function isHexDigit(c: string): boolean {
	return HEX_DIGIT.test(c)
}

function isIdentifierChar(c: string): boolean {
	return c === '_' || ALPHABETIC.test(c)
}

function isAlphanumeric(c: string): boolean {
	return ALPHANUMERIC.test(c)
}

/**
 * Single-pass tokenizer for one source unit.
 * Dispatches once per leading character; each reader consumes exactly its lexeme.
 * Stops at the first error and leaves the tokens read so far in `tokens`.
 */
export class Tokenizer {
	/** Tokens in source order; append-only */
	readonly tokens = new TokenStore()
	readonly numericMode: NumericMode
	private readonly cursor: Cursor

	constructor(chars: readonly string[], file: FileId, numericMode: NumericMode = 'unsigned') {
		this.cursor = new Cursor(chars, file)
		this.numericMode = numericMode
	}

	/**
	 * Drive the tokenizer to the end of input or the first error.
	 * @throws {UnimplementedError} on a float literal
	 */
	run(): TokenizeResult {
		for (let c = this.cursor.current(); c !== undefined; c = this.cursor.current()) {
			const error = this.step(c)
			if (error !== null) return { error, succeeded: false }
		}
		return { succeeded: true }
	}

	/** Where the tokenizer stopped; the failing character on error. */
	position(): Position {
		return this.cursor.position()
	}

	isFinished(): boolean {
		return this.cursor.isAtEnd()
	}

	// ===========================================================================
	// DISPATCH
	// ===========================================================================

	private step(c: string): Step {
		switch (c) {
			case '\n':
				this.cursor.advanceLine()
				return null
			case '%':
				this.cursor.advance()
				return this.readDirective()
			case '#':
				this.skipComment()
				return null
			case ',':
				return this.readPunctuation(TokenKind.Comma)
			case ':':
				return this.readPunctuation(TokenKind.Colon)
			case '$':
				this.cursor.advance()
				return this.readRegister()
			case '0':
				return this.readZeroPrefixed()
		}

		if (WHITESPACE.test(c)) {
			this.cursor.advance()
			return null
		}
		if (isIdentifierChar(c)) return this.readIdentifier()
		if (isDecimalDigit(c) || c === '-') return this.readDefaultNumeric()

		return unexpectedCharacter(c, this.cursor.position())
	}

	/** Consume characters while `predicate` holds; returns how many were consumed. */
	private consumeWhile(predicate: (c: string) => boolean): number {
		let length = 0
		for (let c = this.cursor.current(); c !== undefined && predicate(c); c = this.cursor.current()) {
			this.cursor.advance()
			length++
		}
		return length
	}

	// ===========================================================================
	// TRIVIA AND PUNCTUATION
	// ===========================================================================

	/** `#` up to, not including, the next line break. */
	private skipComment(): void {
		this.cursor.advance()
		this.consumeWhile((c) => c !== '\n')
	}

	private readPunctuation(kind: typeof TokenKind.Comma | typeof TokenKind.Colon): Step {
		this.cursor.advance()
		this.tokens.add({ kind, range: this.cursor.rangeOfLast(1) })
		return null
	}

	// ===========================================================================
	// NAMES
	// ===========================================================================

	private readDirective(): Step {
		const length = this.consumeWhile(isIdentifierChar)
		if (length === 0) {
			return atPosition('EmptyIdentifier', this.cursor.position())
		}

		const range = this.cursor.rangeOfLast(length)
		const kind = DIRECTIVES.get(this.cursor.textOfLast(length))
		if (kind === undefined) {
			return overRange('UnknownDirective', range)
		}

		this.tokens.add({ kind, range })
		return null
	}

	/** Mnemonics never contain `_`, so only underscore-free runs are looked up. */
	private readIdentifier(): Step {
		let length = 0
		let possibleOpcode = true

		for (
			let c = this.cursor.current();
			c !== undefined && isIdentifierChar(c);
			c = this.cursor.current()
		) {
			if (c === '_') possibleOpcode = false
			this.cursor.advance()
			length++
		}

		if (length === 0) {
			return atPosition('EmptyIdentifier', this.cursor.position())
		}

		const range = this.cursor.rangeOfLast(length)
		if (possibleOpcode) {
			const opcode = lookupOpcode(this.cursor.textOfLast(length))
			if (opcode !== undefined) {
				this.tokens.add({ kind: TokenKind.Opcode, opcode, range })
				return null
			}
		}

		this.tokens.add({ kind: TokenKind.Identifier, range })
		return null
	}

	// ===========================================================================
	// REGISTERS
	// ===========================================================================

	/**
	 * After `$`: `r` then a digit (`$r0`) or a two-letter suffix (`$rsp`).
	 * Token and error ranges start after the `$`.
	 */
	private readRegister(): Step {
		const start = this.cursor.position()

		const first = this.cursor.current()
		if (first === undefined) return atPosition('ExpectedRegisterFoundEOF', start)
		if (first !== 'r') return this.invalidRegister(start)
		this.cursor.advance()

		const selector = this.cursor.current()
		if (selector === undefined) return atPosition('ExpectedRegisterFoundEOF', start)
		if (isDecimalDigit(selector)) return this.readPositionalRegister(start, selector)

		const suffixes = NAMED_REGISTERS.get(selector)
		if (suffixes === undefined) return this.invalidRegister(start)
		this.cursor.advance()

		const second = this.cursor.current()
		if (second === undefined) return atPosition('ExpectedRegisterFoundEOF', start)
		const register = suffixes.get(second)
		if (register === undefined) return this.invalidRegister(start)
		this.cursor.advance()

		this.tokens.add({ kind: TokenKind.Register, range: this.cursor.rangeOfLast(3), register })
		return null
	}

	/** `$r<digit>` must end right after the digit. */
	private readPositionalRegister(start: Position, digit: string): Step {
		this.cursor.advance()

		const boundary = this.cursor.position()
		this.consumeWhile(isAlphanumeric)
		const register = positionalRegister(Number(digit))
		if (!positionsEqual(boundary, this.cursor.position()) || register === undefined) {
			return overRange('InvalidRegister', this.cursor.rangeFrom(start))
		}

		this.tokens.add({ kind: TokenKind.Register, range: this.cursor.rangeOfLast(2), register })
		return null
	}

	/** Consume the rest of the alphanumeric run so the error covers the whole bad name. */
	private invalidRegister(start: Position): LexError {
		this.consumeWhile(isAlphanumeric)
		return overRange('InvalidRegister', this.cursor.rangeFrom(start))
	}

	// ===========================================================================
	// NUMBERS
	// ===========================================================================

	private readZeroPrefixed(): Step {
		const reader = this.prefixedReader(this.cursor.peek())
		if (reader === undefined) return this.readDefaultNumeric()

		this.cursor.advance()
		this.cursor.advance()
		return reader()
	}

	private prefixedReader(prefix: string | undefined): (() => Step) | undefined {
		switch (prefix) {
			case 'x':
				return () => this.readHex()
			case 'b':
				return () => this.readBinary()
			case 'i':
				return () => this.readSigned()
			case 'u':
				return () => this.readUnsigned()
			case 'f':
				return () => this.readFloat()
			default:
				return undefined
		}
	}

	private readDefaultNumeric(): Step {
		switch (this.numericMode) {
			case 'signed':
				return this.readSigned()
			case 'unsigned':
				if (this.cursor.current() === '-') {
					return unexpectedCharacter('-', this.cursor.position())
				}
				return this.readUnsigned()
			case 'float':
				return this.readFloat()
		}
	}

	/** An empty digit run is an error, not zero. */
	private readHex(): Step {
		const length = this.consumeWhile(isHexDigit)
		const range = this.cursor.rangeOfLast(length)
		if (length === 0) return overRange('InvalidHexLiteral', range)

		const value = BigInt(`0x${this.cursor.textOfLast(length)}`)
		if (value > U64_MAX) return overRange('InvalidHexLiteral', range)

		this.tokens.add({ kind: TokenKind.UnsignedIntegerLiteral, range, value })
		return null
	}

	/** Bits are shifted in one digit at a time; a 65th digit fails. */
	private readBinary(): Step {
		let value = 0n
		let length = 0

		for (let c = this.cursor.current(); c !== undefined && isBinaryDigit(c); c = this.cursor.current()) {
			this.cursor.advance()
			if (length === MAX_BINARY_DIGITS) {
				return overRange('InvalidBinaryLiteral', this.cursor.rangeOfLast(length + 1))
			}
			value = (value << 1n) | (c === '1' ? 1n : 0n)
			length++
		}

		const range = this.cursor.rangeOfLast(length)
		if (length === 0) return overRange('InvalidBinaryLiteral', range)

		this.tokens.add({ kind: TokenKind.UnsignedIntegerLiteral, range, value })
		return null
	}

	/** Optional `-`, then decimal digits. The magnitude must fit in i64 before negation. */
	private readSigned(): Step {
		const negative = this.cursor.current() === '-'
		let length = 0
		if (negative) {
			this.cursor.advance()
			length++
		}

		const magnitude = this.readDecimalDigits(I64_MAX, length)
		if (magnitude.kind === 'overflow') {
			return overRange('InvalidSignedIntegerLiteral', this.cursor.rangeOfLast(magnitude.length))
		}
		if (magnitude.digits === 0) {
			return overRange('InvalidSignedIntegerLiteral', this.cursor.rangeOfLast(0))
		}

		const value = negative ? -magnitude.value : magnitude.value
		this.tokens.add({
			kind: TokenKind.SignedIntegerLiteral,
			range: this.cursor.rangeOfLast(magnitude.length),
			value,
		})
		return null
	}

	private readUnsigned(): Step {
		const result = this.readDecimalDigits(U64_MAX, 0)
		if (result.kind === 'overflow') {
			return overRange('InvalidUnsignedIntegerLiteral', this.cursor.rangeOfLast(result.length))
		}
		if (result.digits === 0) {
			return overRange('InvalidUnsignedIntegerLiteral', this.cursor.rangeOfLast(0))
		}

		this.tokens.add({
			kind: TokenKind.UnsignedIntegerLiteral,
			range: this.cursor.rangeOfLast(result.length),
			value: result.value,
		})
		return null
	}

	/**
	 * Accumulate decimal digits, checking against `max` after each one.
	 * `prefixLength` is what the lexeme already consumed (a sign). The returned length
	 * covers prefix and digits, up to and including the offending digit on overflow.
	 */
	private readDecimalDigits(max: bigint, prefixLength: number): DecimalRun {
		let value = 0n
		let digits = 0

		for (
			let c = this.cursor.current();
			c !== undefined && isDecimalDigit(c);
			c = this.cursor.current()
		) {
			this.cursor.advance()
			digits++
			value = value * 10n + BigInt(c)
			if (value > max) {
				return { kind: 'overflow', length: prefixLength + digits }
			}
		}

		return { digits, kind: 'ok', length: prefixLength + digits, value }
	}

	private readFloat(): never {
		throw new UnimplementedError('float literals', this.cursor.position())
	}
}

type DecimalRun =
	| { readonly kind: 'ok'; readonly value: bigint; readonly digits: number; readonly length: number }
	| { readonly kind: 'overflow'; readonly length: number }

/**
 * Tokenize a whole source unit.
 * Partial progress is discarded on error; use `Tokenizer` directly to inspect it.
 *
 * @param chars - source text as Unicode scalar values (`Array.from(text)`)
 * @param file - handle stamped on every token range
 */
export function tokenize(
	chars: readonly string[],
	file: FileId,
	options: TokenizeOptions = {}
): TokenizeOutput {
	const { numericMode = 'unsigned' } = options
	const tokenizer = new Tokenizer(chars, file, numericMode)
	const result = tokenizer.run()
	if (!result.succeeded) return result
	return { succeeded: true, tokens: tokenizer.tokens.toArray() }
}

/** Tokenize a file already held by the registry. */
export function tokenizeFile(
	files: FileRegistry,
	file: FileId,
	options: TokenizeOptions = {}
): TokenizeOutput {
	return tokenize(files.get(file).chars, file, options)
}
