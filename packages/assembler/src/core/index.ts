/**
 * Core data structures: source coordinates, file handles and tokens.
 */

export { type FileId, FileRegistry, fileId, type SourceFile } from './files.ts'
export {
	formatPosition,
	isSingleLine,
	type Position,
	position,
	positionsEqual,
	rangeLength,
	type TextRange,
	textRange,
} from './position.ts'
export {
	DIRECTIVES,
	type DirectiveKind,
	I64_MAX,
	I64_MIN,
	type IntegerToken,
	type OpcodeToken,
	type PlainToken,
	type RegisterToken,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindName,
	U64_MAX,
} from './tokens.ts'
