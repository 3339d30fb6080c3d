import {
	formatDiagnostic,
	interpolateMessage,
	PCCLI001,
	PCCLI002,
	PCCLI003,
	PCCLI004,
	PCCLI005,
} from '@primconv/diagnostics'
import { getErrorMessage, isNodeError, isPipelineError } from '@primconv/matrix'

export const DEFAULT_OUTPUT_PATH = 'output/conversions.go'

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnostic(PCCLI004, { path: filePath })
	}
	return formatDiagnostic(PCCLI005, { reason: getErrorMessage(error) })
}

export function formatChoiceError(flag: string, value: string, choices: readonly string[]): string {
	return formatDiagnostic(PCCLI001, { choices: choices.join(', '), flag, value })
}

export function formatNumberError(flag: string, value: number, constraint: string): string {
	return formatDiagnostic(PCCLI002, { constraint, flag, value })
}

/**
 * `[CODE] stage: message` for pipeline failures, a generic wrapper otherwise.
 */
export function formatRunError(error: unknown): string {
	if (isPipelineError(error)) {
		return `[${error.code}] ${error.stage}: ${error.message}`
	}
	const message = interpolateMessage(PCCLI003.message, { reason: getErrorMessage(error) })
	return `[${PCCLI003.code}] ${message}`
}

export function getSuggestion(error: unknown): string | undefined {
	return isPipelineError(error) ? error.def.suggestion : undefined
}

/**
 * Exit statuses a process can actually report.
 */
export function isValidExitCode(value: number): boolean {
	return Number.isInteger(value) && value >= 1 && value <= 255
}

export function isValidTimeout(value: number): boolean {
	return Number.isInteger(value) && value > 0
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms.toFixed(1)}ms`
	return `${(ms / 1000).toFixed(3)}s`
}
