import { readFile } from 'node:fs/promises'
import { BaseCommand, flags } from '@adonisjs/ace'
import {
	type ConversionProbe,
	DEFAULT_TIMEOUT_MS,
	DIAGNOSTIC_SHAPES,
	type DiagnosticShape,
	EMOJI_MARKERS,
	type Extraction,
	GoToolchainProbe,
	getReporter,
	isReportFormat,
	isShapeId,
	type PipelineResult,
	REPORT_FORMATS,
	RecordedDiagnosticsProbe,
	type ReportFormat,
	renderMatrix,
	runPipeline,
	WORD_MARKERS,
} from '@primconv/matrix'
import {
	DEFAULT_OUTPUT_PATH,
	formatChoiceError,
	formatDuration,
	formatNumberError,
	formatReadError,
	formatRunError,
	getSuggestion,
	isValidExitCode,
	isValidTimeout,
} from '../utils.ts'

interface MatrixConfig {
	format: ReportFormat
	shape: DiagnosticShape
}

const CANCEL_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

export default class MatrixCommand extends BaseCommand {
	static override commandName = 'matrix'
	static override description = 'Compile every primitive conversion and report which ones Go accepts'

	@flags.string({ description: 'Go source template (defaults to the bundled one)' })
	declare template?: string

	@flags.string({
		alias: 'o',
		default: DEFAULT_OUTPUT_PATH,
		description: 'Where to write the generated Go source',
	})
	declare output: string

	@flags.string({ default: 'go', description: 'Go binary to compile with' })
	declare compiler: string

	@flags.number({
		description: 'Exit status the compiler uses for reported errors; defaults to the one for --shape',
	})
	declare expectedExitCode?: number

	@flags.number({ default: DEFAULT_TIMEOUT_MS, description: 'Kill the compiler after this many milliseconds' })
	declare timeout: number

	@flags.string({ default: 'types2', description: 'Diagnostic wording: types2 (go >= 1.18) or gc-legacy' })
	declare shape: string

	@flags.string({ alias: 'f', default: 'text', description: 'Report format: text or json' })
	declare format: string

	@flags.boolean({ description: 'Print yes/no instead of emoji' })
	declare ascii: boolean

	@flags.string({ description: 'Read compiler output from this file instead of running the compiler' })
	declare replay?: string

	private resolveConfig(): MatrixConfig | null {
		if (!isReportFormat(this.format)) {
			this.logger.error(formatChoiceError('format', this.format, REPORT_FORMATS))
			return null
		}
		if (!isShapeId(this.shape)) {
			this.logger.error(formatChoiceError('shape', this.shape, Object.keys(DIAGNOSTIC_SHAPES)))
			return null
		}
		if (this.expectedExitCode !== undefined && !isValidExitCode(this.expectedExitCode)) {
			this.logger.error(
				formatNumberError('expected-exit-code', this.expectedExitCode, 'an integer between 1 and 255')
			)
			return null
		}
		if (!isValidTimeout(this.timeout)) {
			this.logger.error(formatNumberError('timeout', this.timeout, 'a positive number of milliseconds'))
			return null
		}
		return { format: this.format, shape: DIAGNOSTIC_SHAPES[this.shape] }
	}

	private async readReplay(path: string): Promise<string | null> {
		try {
			return await readFile(path, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(path, error))
			return null
		}
	}

	private async createProbe(config: MatrixConfig): Promise<ConversionProbe | null> {
		if (this.replay !== undefined) {
			const diagnostics = await this.readReplay(this.replay)
			return diagnostics === null ? null : new RecordedDiagnosticsProbe(diagnostics, config.shape)
		}
		return new GoToolchainProbe({
			compiler: this.compiler,
			expectedExitCode: this.expectedExitCode,
			shape: config.shape,
			sourcePath: this.output,
			timeoutMs: this.timeout,
		})
	}

	private async runCancellable(probe: ConversionProbe): Promise<PipelineResult> {
		const controller = new AbortController()
		const cancel = (): void => controller.abort()
		for (const signal of CANCEL_SIGNALS) {
			process.once(signal, cancel)
		}
		try {
			return await runPipeline({
				app: 'primconv',
				probe,
				signal: controller.signal,
				templatePath: this.template,
			})
		} finally {
			for (const signal of CANCEL_SIGNALS) {
				process.off(signal, cancel)
			}
		}
	}

	private displayWarnings(extraction: Extraction, config: MatrixConfig): void {
		for (const warning of extraction.warnings) {
			const message = `[${warning.def.code}] ${warning.message}`
			// stdout carries only the JSON document
			if (config.format === 'json') {
				this.logger.logError(`warning: ${message}`)
			} else {
				this.logger.warning(message)
			}
		}
	}

	private displayError(error: unknown): void {
		this.logger.error(formatRunError(error))
		const suggestion = getSuggestion(error)
		if (suggestion !== undefined) {
			this.logger.error(`hint: ${suggestion}`)
		}
	}

	private report(result: PipelineResult, config: MatrixConfig): void {
		const markers = this.ascii ? WORD_MARKERS : EMOJI_MARKERS
		const reporter = getReporter(config.format, (line) => this.logger.log(line), markers)
		renderMatrix(result.matrix, reporter)
	}

	private reportDuration(started: number, config: MatrixConfig): void {
		const message = `execution took ${formatDuration(performance.now() - started)}`
		if (config.format === 'json') {
			this.logger.logError(message)
		} else {
			this.logger.info(message)
		}
	}

	override async run(): Promise<void> {
		const started = performance.now()

		const config = this.resolveConfig()
		if (config === null) {
			this.exitCode = 1
			return
		}

		const probe = await this.createProbe(config)
		if (probe === null) {
			this.exitCode = 1
			return
		}

		try {
			const result = await this.runCancellable(probe)
			this.displayWarnings(result.extraction, config)
			this.report(result, config)
		} catch (error: unknown) {
			this.displayError(error)
			this.exitCode = 1
		} finally {
			this.reportDuration(started, config)
		}
	}
}
