/**
 * Token model and append-only token storage.
 */

import type { Register } from '../isa/registers.ts'
import type { TextRange } from './position.ts'

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Punctuation (0-9)
	Colon: 1,
	Comma: 0,

	// Directives (10-99)
	Constant: 16,
	Else: 13,
	EndRepeat: 11,
	Endif: 14,
	If: 12,
	Import: 15,
	Repeat: 10,

	// Operands (100-199)
	Identifier: 102,
	Opcode: 101,
	Register: 100,
	SignedIntegerLiteral: 104,
	UnsignedIntegerLiteral: 103,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type DirectiveKind =
	| typeof TokenKind.Repeat
	| typeof TokenKind.EndRepeat
	| typeof TokenKind.If
	| typeof TokenKind.Else
	| typeof TokenKind.Endif
	| typeof TokenKind.Import
	| typeof TokenKind.Constant

/** Spelling after `%` to directive kind. */
export const DIRECTIVES: ReadonlyMap<string, DirectiveKind> = new Map([
	['repeat', TokenKind.Repeat],
	['end_repeat', TokenKind.EndRepeat],
	['if', TokenKind.If],
	['else', TokenKind.Else],
	['endif', TokenKind.Endif],
	['import', TokenKind.Import],
	['const', TokenKind.Constant],
])

export const U64_MAX = (1n << 64n) - 1n
export const I64_MAX = (1n << 63n) - 1n
export const I64_MIN = -(1n << 63n)

interface TokenBase {
	readonly range: TextRange
}

export interface PlainToken extends TokenBase {
	readonly kind:
		| typeof TokenKind.Comma
		| typeof TokenKind.Colon
		| typeof TokenKind.Identifier
		| DirectiveKind
}

export interface RegisterToken extends TokenBase {
	readonly kind: typeof TokenKind.Register
	readonly register: Register
}

export interface OpcodeToken extends TokenBase {
	readonly kind: typeof TokenKind.Opcode
	readonly opcode: number
}

/**
 * Integer literal. `value` stays a bigint so the full 64-bit range survives:
 * [0, 2^64-1] for unsigned, [-2^63, 2^63-1] for signed.
 */
export interface IntegerToken extends TokenBase {
	readonly kind: typeof TokenKind.UnsignedIntegerLiteral | typeof TokenKind.SignedIntegerLiteral
	readonly value: bigint
}

export type Token = PlainToken | RegisterToken | OpcodeToken | IntegerToken

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

const KIND_NAMES: ReadonlyMap<TokenKind, string> = new Map(
	Object.entries(TokenKind).map(([name, kind]): [TokenKind, string] => [kind, name])
)

export function tokenKindName(kind: TokenKind): string {
	return KIND_NAMES.get(kind) ?? `Unknown(${kind})`
}

/**
 * Dense array storage for tokens.
 * Append-only: a token is never changed once added.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}

	toArray(): Token[] {
		return this.tokens.slice()
	}
}
