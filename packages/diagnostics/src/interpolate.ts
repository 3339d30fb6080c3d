import type { DiagnosticArgs } from './types.ts'

/**
 * Replace every `{key}` in `template` with the matching value from `args`.
 * Unknown keys are left in place so a missing argument shows up in the output.
 *
 * Shared by diagnostic messages and the Go source template.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (!args) return template
	return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}
