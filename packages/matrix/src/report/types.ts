import type { TypeName } from '../catalog.ts'
import type { MatrixSummary, Verdict } from '../matrix.ts'

/**
 * Receives each line of output as soon as it is ready.
 */
export type LineSink = (line: string) => void

export interface MatrixReporter {
	onSectionStart(from: TypeName): void
	onVerdict(verdict: Verdict): void
	onEnd(summary: MatrixSummary): void
}

export type ReportFormat = 'text' | 'json'

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json']

export function isReportFormat(value: string): value is ReportFormat {
	return value === 'text' || value === 'json'
}
