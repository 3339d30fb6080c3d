/**
 * CLI diagnostic definitions.
 *
 * Error code format: PCCLI<NUMBER>
 * - PCCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (PCCLI001-099)
// =============================================================================

export const PCCLI001: DiagnosticDef = {
	code: 'PCCLI001',
	description: "primconv doesn't recognize this value for the flag.",
	message: 'invalid --{flag} "{value}", expected one of: {choices}',
	severity: DiagnosticSeverity.Error,
	stage: 'configure',
}

export const PCCLI002: DiagnosticDef = {
	code: 'PCCLI002',
	description: 'This flag takes a whole number.',
	message: 'invalid --{flag} "{value}", expected {constraint}',
	severity: DiagnosticSeverity.Error,
	stage: 'configure',
}

export const PCCLI003: DiagnosticDef = {
	code: 'PCCLI003',
	description: 'Something unexpected went wrong while building the matrix.',
	message: 'unexpected failure: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'report',
	suggestion: 'Report this if it seems like a bug.',
}

export const PCCLI004: DiagnosticDef = {
	code: 'PCCLI004',
	description: "primconv couldn't find the recorded compiler output at this path.",
	message: 'replay file not found: {path}',
	severity: DiagnosticSeverity.Error,
	stage: 'configure',
	suggestion: 'Double-check the path passed to `--replay`.',
}

export const PCCLI005: DiagnosticDef = {
	code: 'PCCLI005',
	description: "The replay file exists but primconv can't open it.",
	message: 'cannot read replay file: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'configure',
	suggestion: 'Check that you have read permission for this file.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	PCCLI001,
	PCCLI002,
	PCCLI003,
	PCCLI004,
	PCCLI005,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
