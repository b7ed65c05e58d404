/**
 * Assembler front end public API.
 *
 * - FileRegistry hands out FileId handles stamped on every range
 * - Tokenizer turns one file into an append-only TokenStore, stopping at the first LexError
 * - formatLexError renders an error against its source line
 */

export * from './core/index.ts'
export * from './isa/index.ts'
export * from './lex/index.ts'
