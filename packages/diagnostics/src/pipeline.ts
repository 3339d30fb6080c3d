/**
 * Pipeline diagnostic definitions.
 *
 * Error code format: PC<STAGE><NUMBER>
 * - PCCFG: Catalog and configuration errors (001-049)
 * - PCGEN: Source synthesis errors (001-049)
 * - PCRUN: Compiler invocation errors (001-049)
 * - PCSCAN: Diagnostic extraction errors (001-049), warnings (050-099)
 * - PCINT: Failures outside the expected taxonomy (001-049)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CONFIGURATION ERRORS (PCCFG001-049)
// =============================================================================

export const PCCFG001: DiagnosticDef = {
	code: 'PCCFG001',
	description: 'The type catalog has to be a non-empty list of distinct Go identifiers.',
	message: 'invalid type catalog: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'configure',
	suggestion: 'Remove duplicate or malformed names, and make sure every alias points at a listed type.',
}

// =============================================================================
// SYNTHESIS ERRORS (PCGEN001-049)
// =============================================================================

export const PCGEN001: DiagnosticDef = {
	code: 'PCGEN001',
	description: 'The Go source template could not be found.',
	message: 'template not found: {path}',
	severity: DiagnosticSeverity.Error,
	stage: 'synthesize',
	suggestion: 'Pass an existing file with `--template`, or omit the flag to use the bundled template.',
}

export const PCGEN002: DiagnosticDef = {
	code: 'PCGEN002',
	description: 'The Go source template exists but could not be read.',
	message: 'cannot read template {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'synthesize',
	suggestion: 'Check that you have read permission for the template file.',
}

export const PCGEN003: DiagnosticDef = {
	code: 'PCGEN003',
	description: 'The generated Go source could not be written.',
	message: 'cannot write generated source {path}: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'synthesize',
	suggestion: 'Check that you have write permission for the output directory.',
}

// =============================================================================
// COMPILER INVOCATION ERRORS (PCRUN001-049)
// =============================================================================

export const PCRUN001: DiagnosticDef = {
	code: 'PCRUN001',
	description: 'The compiler binary is not on the search path.',
	message: 'compiler not found: {command}',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
	suggestion: 'Install the Go toolchain, or point `--compiler` at the go binary.',
}

export const PCRUN002: DiagnosticDef = {
	code: 'PCRUN002',
	description: 'The compiler process could not be started.',
	message: 'cannot launch `{command}`: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
	suggestion: 'Check that the compiler binary is executable.',
}

export const PCRUN003: DiagnosticDef = {
	code: 'PCRUN003',
	description:
		'The generated source contains conversions the compiler must reject, so a successful build means the probe is broken.',
	message: '`{command}` compiled the generated source without errors',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
	suggestion: 'Check that the generated source still contains the invalid conversions.',
}

export const PCRUN004: DiagnosticDef = {
	code: 'PCRUN004',
	description: 'The compiler exited with a status other than the one it uses for reported build errors.',
	message: '`{command}` exited with status {code}, expected {expected}: {detail}',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
	suggestion: 'Run the command by hand, or pass `--expected-exit-code` if your toolchain uses another status.',
}

export const PCRUN005: DiagnosticDef = {
	code: 'PCRUN005',
	description: 'The compiler was terminated by a signal before it finished.',
	message: '`{command}` was terminated by {signal}',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
}

export const PCRUN006: DiagnosticDef = {
	code: 'PCRUN006',
	description: 'The compiler did not finish within the allowed time and was killed.',
	message: '`{command}` timed out after {timeout}ms',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
	suggestion: 'Raise the limit with `--timeout`.',
}

export const PCRUN007: DiagnosticDef = {
	code: 'PCRUN007',
	description: 'The run was cancelled while the compiler was running.',
	message: '`{command}` was cancelled',
	severity: DiagnosticSeverity.Error,
	stage: 'harvest',
}

// =============================================================================
// EXTRACTION ERRORS (PCSCAN001-049)
// =============================================================================

export const PCSCAN001: DiagnosticDef = {
	code: 'PCSCAN001',
	description:
		'A "cannot convert" diagnostic did not have the expected shape, so the results cannot be trusted.',
	message: 'unrecognized conversion diagnostic for shape {shape}: {line}',
	severity: DiagnosticSeverity.Error,
	stage: 'extract',
	suggestion: 'Try another `--shape`, or add a shape for this compiler version.',
}

export const PCSCAN002: DiagnosticDef = {
	code: 'PCSCAN002',
	description: 'A conversion diagnostic named a type that is not in the catalog.',
	message: 'unknown type "{name}" in diagnostic: {line}',
	severity: DiagnosticSeverity.Error,
	stage: 'extract',
	suggestion: 'Make sure the generated source was produced from the same catalog.',
}

// =============================================================================
// EXTRACTION WARNINGS (PCSCAN050-099)
// =============================================================================

export const PCSCAN050: DiagnosticDef = {
	code: 'PCSCAN050',
	description:
		'Some primitive conversions are always invalid, so an empty result usually means the compiler changed its wording.',
	message: 'no conversion diagnostics found in {lines} lines of compiler output',
	severity: DiagnosticSeverity.Warning,
	stage: 'extract',
	suggestion: 'Check the compiler output by hand before trusting the matrix.',
}

// =============================================================================
// INTERNAL ERRORS (PCINT001-049)
// =============================================================================

export const PCINT001: DiagnosticDef = {
	code: 'PCINT001',
	description: 'A stage failed in a way primconv does not classify.',
	message: 'unexpected failure while running {stage}: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'report',
	suggestion: 'Report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all pipeline diagnostics.
 */
export const PIPELINE_DIAGNOSTICS = {
	// Configuration errors
	PCCFG001,
	// Synthesis errors
	PCGEN001,
	PCGEN002,
	PCGEN003,
	// Compiler invocation errors
	PCRUN001,
	PCRUN002,
	PCRUN003,
	PCRUN004,
	PCRUN005,
	PCRUN006,
	PCRUN007,
	// Extraction errors
	PCSCAN001,
	PCSCAN002,
	// Extraction warnings
	PCSCAN050,
	// Internal errors
	PCINT001,
} as const

/**
 * All valid pipeline diagnostic codes.
 */
export type PipelineDiagnosticCode = keyof typeof PIPELINE_DIAGNOSTICS
