/**
 * Assembler diagnostic definitions.
 *
 * Error code format: VM<PHASE><NUMBER>
 * - VMLEX: Lexer errors (001-099), one per lexer failure mode
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (VMLEX001-099)
// =============================================================================

export const VMLEX001: DiagnosticDef = {
	code: 'VMLEX001',
	description: "'{char}' can't start any token here.",
	message: "unexpected character '{char}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character, or start a comment with `#` if this is meant as a note.',
}

export const VMLEX002: DiagnosticDef = {
	code: 'VMLEX002',
	description: 'A name was expected at this point, but no letters or underscores follow.',
	message: 'expected an identifier',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write the directive name right after `%`, for example `%repeat`.',
}

export const VMLEX003: DiagnosticDef = {
	code: 'VMLEX003',
	description: 'Hex literals need between 1 and 16 hex digits after `0x` to fit in 64 bits.',
	message: "invalid hexadecimal literal '0x{digits}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use 1 to 16 digits from 0-9 and a-f.',
}

export const VMLEX004: DiagnosticDef = {
	code: 'VMLEX004',
	description: 'Binary literals hold at most 64 digits after `0b`.',
	message: 'binary literal is longer than 64 bits',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Drop leading zeros or split the value; at most 64 binary digits fit.',
}

export const VMLEX005: DiagnosticDef = {
	code: 'VMLEX005',
	description: 'A number can contain at most one decimal point.',
	message: 'unexpected second decimal point',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the extra `.`.',
}

export const VMLEX006: DiagnosticDef = {
	code: 'VMLEX006',
	description: "This float literal couldn't be read.",
	message: 'invalid float literal',
	severity: DiagnosticSeverity.Error,
}

export const VMLEX007: DiagnosticDef = {
	code: 'VMLEX007',
	description: 'Unsigned literals must have at least one digit and fit in 64 bits.',
	message: 'invalid unsigned integer literal',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a value between 0 and 18446744073709551615.',
}

export const VMLEX008: DiagnosticDef = {
	code: 'VMLEX008',
	description: 'Signed literals must have at least one digit and fit in 64 bits.',
	message: 'invalid signed integer literal',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a value between -9223372036854775807 and 9223372036854775807.',
}

export const VMLEX009: DiagnosticDef = {
	code: 'VMLEX009',
	description: 'Registers are written `$r0` to `$r9`, or `$rsp`, `$rfp`, `$rfl`, `$rou`, `$rra`, `$rrb`.',
	message: "invalid register '${name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the register name for typos.',
}

export const VMLEX010: DiagnosticDef = {
	code: 'VMLEX010',
	description: 'The file ends in the middle of a register name.',
	message: 'expected register, found end of file',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Finish the register name, for example `$r0`.',
}

export const VMLEX011: DiagnosticDef = {
	code: 'VMLEX011',
	description:
		'Directives are %repeat, %end_repeat, %if, %else, %endif, %import and %const.',
	message: "unknown directive '%{name}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the directive name for typos.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all assembler diagnostics.
 */
export const ASSEMBLER_DIAGNOSTICS = {
	VMLEX001,
	VMLEX002,
	VMLEX003,
	VMLEX004,
	VMLEX005,
	VMLEX006,
	VMLEX007,
	VMLEX008,
	VMLEX009,
	VMLEX010,
	VMLEX011,
} as const

/**
 * All valid assembler diagnostic codes.
 */
export type AssemblerDiagnosticCode = keyof typeof ASSEMBLER_DIAGNOSTICS
