/**
 * @vmasm/diagnostics
 *
 * Shared diagnostic catalog for the assembler packages.
 */

export {
	ASSEMBLER_DIAGNOSTICS,
	type AssemblerDiagnosticCode,
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
} from './assembler.ts'
export { CLI_DIAGNOSTICS, type CliDiagnosticCode, VMCLI001, VMCLI002, VMCLI003, VMCLI004 } from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

import { ASSEMBLER_DIAGNOSTICS } from './assembler.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...ASSEMBLER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

export type DiagnosticCode = keyof typeof DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}
