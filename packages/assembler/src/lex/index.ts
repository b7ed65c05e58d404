/**
 * Lexical analysis module.
 * Tokenizes assembler source into a flat array of tokens.
 */

export { Cursor } from './cursor.ts'
export {
	atPosition,
	errorStart,
	type LexError,
	type LexErrorKind,
	overRange,
	UnimplementedError,
	unexpectedCharacter,
} from './errors.ts'
export { describeLexError, formatLexError, type LexDiagnostic, lexErrorCode } from './report.ts'
export {
	type NumericMode,
	type TokenizeOptions,
	type TokenizeOutput,
	type TokenizeResult,
	Tokenizer,
	tokenize,
	tokenizeFile,
} from './tokenizer.ts'
