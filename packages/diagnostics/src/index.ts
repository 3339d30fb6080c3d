/**
 * @primconv/diagnostics
 *
 * Error and warning definitions shared by the primconv packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	PCCLI001,
	PCCLI002,
	PCCLI003,
	PCCLI004,
	PCCLI005,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	PCCFG001,
	PCGEN001,
	PCGEN002,
	PCGEN003,
	PCINT001,
	PCRUN001,
	PCRUN002,
	PCRUN003,
	PCRUN004,
	PCRUN005,
	PCRUN006,
	PCRUN007,
	PCSCAN001,
	PCSCAN002,
	PCSCAN050,
	PIPELINE_DIAGNOSTICS,
	type PipelineDiagnosticCode,
} from './pipeline.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	type Stage,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { interpolateMessage } from './interpolate.ts'
import { PIPELINE_DIAGNOSTICS } from './pipeline.ts'
import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...PIPELINE_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}

/**
 * Render a diagnostic as `[CODE] message` with its arguments applied.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
