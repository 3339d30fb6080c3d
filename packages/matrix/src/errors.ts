import {
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
	type Stage,
} from '@primconv/diagnostics'

/**
 * Fatal error raised by any pipeline stage. Carries the catalog definition it
 * was built from so callers can render the code, stage and suggestion.
 */
export class PipelineError extends Error {
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs | undefined
	/** Stage that failed; the definition's own stage unless overridden */
	readonly stage: Stage

	constructor(
		def: DiagnosticDef,
		args?: DiagnosticArgs,
		options: { cause?: unknown; stage?: Stage } = {}
	) {
		super(interpolateMessage(def.message, args), { cause: options.cause })
		this.name = 'PipelineError'
		this.def = def
		this.args = args
		this.stage = options.stage ?? def.stage
	}

	get code(): string {
		return this.def.code
	}
}

export function isPipelineError(error: unknown): error is PipelineError {
	return error instanceof PipelineError
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
