import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 * Accepts either a raw template or a catalog definition.
 */
export function interpolateMessage(template: string | DiagnosticDef, args?: DiagnosticArgs): string {
	const message = typeof template === 'string' ? template : template.message
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
