import type { ConversionMatrix } from '../matrix.ts'
import { createJsonReporter } from './json.ts'
import { createTextReporter, type VerdictMarkers } from './text.ts'
import type { LineSink, MatrixReporter, ReportFormat } from './types.ts'

export { createJsonReporter, type JsonMatrix, JsonReporter } from './json.ts'
export {
	createTextReporter,
	EMOJI_MARKERS,
	formatSectionHeader,
	formatSummary,
	formatVerdictLine,
	TextReporter,
	type VerdictMarkers,
	WORD_MARKERS,
} from './text.ts'
export {
	isReportFormat,
	type LineSink,
	type MatrixReporter,
	REPORT_FORMATS,
	type ReportFormat,
} from './types.ts'

export function getReporter(format: ReportFormat, sink: LineSink, markers?: VerdictMarkers): MatrixReporter {
	if (format === 'json') return createJsonReporter(sink)
	return createTextReporter(sink, markers)
}

/**
 * Walk the matrix in catalog order, outer loop over the source type.
 */
export function renderMatrix(matrix: ConversionMatrix, reporter: MatrixReporter): void {
	for (const row of matrix.rows()) {
		reporter.onSectionStart(row.from)
		for (const verdict of row.verdicts) {
			reporter.onVerdict(verdict)
		}
	}
	reporter.onEnd(matrix.summary())
}
