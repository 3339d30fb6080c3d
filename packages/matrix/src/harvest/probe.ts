import { resolve } from 'node:path'
import { PCRUN007 } from '@primconv/diagnostics'
import { PipelineError } from '../errors.ts'
import {
	DEFAULT_SHAPE,
	type DiagnosticShape,
	type Extraction,
	extractFailures,
} from '../extract/index.ts'
import { type SynthesizedSource, writeSource } from '../synthesize/index.ts'
import { goBuildInvocation, harvestDiagnostics } from './index.ts'

export interface ProbeOptions {
	signal?: AbortSignal
}

/**
 * Given a synthesized program, report which of its conversions the compiler
 * rejects. The only seam between the pipeline and an external toolchain.
 */
export interface ConversionProbe {
	probe(source: SynthesizedSource, options?: ProbeOptions): Promise<Extraction>
}

export interface GoToolchainOptions {
	/** Where the generated source is written before compiling */
	sourcePath: string
	compiler?: string
	/** Overrides the shape's own exit status */
	expectedExitCode?: number
	timeoutMs?: number
	shape?: DiagnosticShape
	cwd?: string
}

/**
 * Probe backed by a real `go build`.
 */
export class GoToolchainProbe implements ConversionProbe {
	private readonly options: GoToolchainOptions

	constructor(options: GoToolchainOptions) {
		this.options = options
	}

	async probe(source: SynthesizedSource, options: ProbeOptions = {}): Promise<Extraction> {
		// sourcePath is relative to cwd, where the compiler runs
		await writeSource(resolve(this.options.cwd ?? '', this.options.sourcePath), source.text)

		const shape = this.options.shape ?? DEFAULT_SHAPE
		const invocation = goBuildInvocation(this.options.sourcePath, { compiler: this.options.compiler })
		const diagnostics = await harvestDiagnostics(invocation, {
			cwd: this.options.cwd,
			expectedExitCode: this.options.expectedExitCode ?? shape.exitCode,
			signal: options.signal,
			timeoutMs: this.options.timeoutMs,
		})

		return extractFailures(diagnostics, source.catalog, shape)
	}
}

/**
 * Probe that replays previously captured compiler output instead of running
 * a toolchain.
 */
export class RecordedDiagnosticsProbe implements ConversionProbe {
	private readonly diagnostics: string
	private readonly shape: DiagnosticShape
	private readonly sources: SynthesizedSource[] = []

	constructor(diagnostics: string, shape: DiagnosticShape = DEFAULT_SHAPE) {
		this.diagnostics = diagnostics
		this.shape = shape
	}

	/** Sources passed to {@link probe}, oldest first. */
	get received(): readonly SynthesizedSource[] {
		return this.sources
	}

	async probe(source: SynthesizedSource, options: ProbeOptions = {}): Promise<Extraction> {
		if (options.signal?.aborted) {
			throw new PipelineError(PCRUN007, { command: 'replay' })
		}
		this.sources.push(source)
		return extractFailures(this.diagnostics, source.catalog, this.shape)
	}
}
