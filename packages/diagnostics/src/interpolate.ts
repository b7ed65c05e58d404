import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Replace every `{key}` in a template with the matching argument.
 * Unknown keys are left in place so a missing argument shows up in the output.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (!args) return template
	return template.replace(PLACEHOLDER, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
