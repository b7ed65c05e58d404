/**
 * CLI diagnostic definitions.
 *
 * Error code format: VMCLI<NUMBER>
 * - VMCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (VMCLI001-099)
// =============================================================================

export const VMCLI001: DiagnosticDef = {
	code: 'VMCLI001',
	description: "There's no file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const VMCLI002: DiagnosticDef = {
	code: 'VMCLI002',
	description: "The file exists but can't be opened.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const VMCLI003: DiagnosticDef = {
	code: 'VMCLI003',
	description: 'The default numeric mode decides how literals without a prefix are read.',
	message: 'unknown numeric mode "{mode}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--numeric unsigned`, `--numeric signed` or `--numeric float`.',
}

export const VMCLI004: DiagnosticDef = {
	code: 'VMCLI004',
	description: 'Something unexpected went wrong while tokenizing.',
	message: 'tokenization aborted: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	VMCLI001,
	VMCLI002,
	VMCLI003,
	VMCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
