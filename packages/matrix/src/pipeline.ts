import { PCINT001, type Stage } from '@primconv/diagnostics'
import { type Catalog, GO_PRIMITIVES } from './catalog.ts'
import { getErrorMessage, isPipelineError, PipelineError } from './errors.ts'
import type { Extraction } from './extract/index.ts'
import type { ConversionProbe } from './harvest/probe.ts'
import { ConversionMatrix } from './matrix.ts'
import {
	DEFAULT_TEMPLATE_PATH,
	loadTemplate,
	type SynthesizedSource,
	synthesizeSource,
} from './synthesize/index.ts'

export interface PipelineOptions {
	probe: ConversionProbe
	catalog?: Catalog
	templatePath?: string
	/** Name written into the generated source header */
	app?: string
	/** Cancels a running compiler; synthesis and extraction are not interruptible */
	signal?: AbortSignal
}

export interface PipelineResult {
	readonly source: SynthesizedSource
	readonly extraction: Extraction
	readonly matrix: ConversionMatrix
}

/**
 * Run `task` as `stage`, tagging any error that is not already a
 * {@link PipelineError} with that stage.
 */
async function runStage<T>(stage: Stage, task: () => Promise<T> | T): Promise<T> {
	try {
		return await task()
	} catch (error: unknown) {
		if (isPipelineError(error)) throw error
		throw new PipelineError(PCINT001, { reason: getErrorMessage(error), stage }, { cause: error, stage })
	}
}

/**
 * Synthesize the probe program, have the probe compile it, and classify every
 * pair. Strictly sequential; the first failure aborts the run.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
	const catalog = options.catalog ?? GO_PRIMITIVES
	const templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH

	const source = await runStage('synthesize', async () => {
		const template = await loadTemplate(templatePath)
		return synthesizeSource(catalog, template, { app: options.app })
	})

	const extraction = await runStage('harvest', () =>
		options.probe.probe(source, { signal: options.signal })
	)

	const matrix = await runStage('report', () => new ConversionMatrix(catalog, extraction.failures))

	return {
		extraction,
		matrix,
		source,
	}
}
