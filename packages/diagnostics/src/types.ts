/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Catalog entry for one failure mode.
 * `message`, `description` and `suggestion` are templates with `{name}` placeholders.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 * Integer literal payloads are 64-bit, so bigint is accepted alongside number.
 */
export type DiagnosticArgs = Record<string, string | number | bigint>
