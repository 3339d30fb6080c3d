/**
 * @primconv/matrix
 *
 * Three stages, run once per invocation:
 * 1. Synthesis (catalog → Go program with one conversion per ordered pair)
 * 2. Harvest (`go build` → diagnostic text, expecting a failed build)
 * 3. Extraction (diagnostic text → failure set → conversion matrix)
 */

export {
	type Catalog,
	type ConversionPair,
	conversionPairs,
	defineCatalog,
	GO_PRIMITIVES,
	hasType,
	type TypeName,
	underlyingType,
} from './catalog.ts'
export { getErrorMessage, isNodeError, isPipelineError, PipelineError } from './errors.ts'
export {
	ConversionDiagnosticGrammar,
	DEFAULT_SHAPE,
	DIAGNOSTIC_SHAPES,
	type DiagnosticShape,
	type Extraction,
	type ExtractionWarning,
	extractFailures,
	extractPair,
	FailureSet,
	isShapeId,
	parseDiagnosticLine,
	type ShapeId,
} from './extract/index.ts'
export {
	type CompilerInvocation,
	classifyExit,
	DEFAULT_EXPECTED_EXIT_CODE,
	DEFAULT_TIMEOUT_MS,
	describeInvocation,
	type ExitStatus,
	type GoBuildOptions,
	goBuildInvocation,
	type HarvestOptions,
	harvestDiagnostics,
	nullDevice,
} from './harvest/index.ts'
export {
	type ConversionProbe,
	GoToolchainProbe,
	type GoToolchainOptions,
	type ProbeOptions,
	RecordedDiagnosticsProbe,
} from './harvest/probe.ts'
export { ConversionMatrix, type MatrixRow, type MatrixSummary, type Verdict } from './matrix.ts'
export { type PipelineOptions, type PipelineResult, runPipeline } from './pipeline.ts'
export {
	createJsonReporter,
	createTextReporter,
	EMOJI_MARKERS,
	formatSectionHeader,
	formatSummary,
	formatVerdictLine,
	getReporter,
	isReportFormat,
	type JsonMatrix,
	JsonReporter,
	type LineSink,
	type MatrixReporter,
	REPORT_FORMATS,
	type ReportFormat,
	renderMatrix,
	TextReporter,
	type VerdictMarkers,
	WORD_MARKERS,
} from './report/index.ts'
export {
	DEFAULT_TEMPLATE_PATH,
	loadTemplate,
	PROBE_RECEIVER,
	type SynthesisOptions,
	type SynthesizedSource,
	synthesizeSource,
	writeSource,
} from './synthesize/index.ts'
