import type { TypeName } from '../catalog.ts'
import type { MatrixSummary, Verdict } from '../matrix.ts'
import type { LineSink, MatrixReporter } from './types.ts'

export interface VerdictMarkers {
	readonly convertible: string
	readonly rejected: string
}

export const EMOJI_MARKERS: VerdictMarkers = { convertible: '✅', rejected: '❌' }
export const WORD_MARKERS: VerdictMarkers = { convertible: 'yes', rejected: 'no' }

const COLUMN_WIDTH = 10

export function formatSectionHeader(from: TypeName): string {
	return `---------- converting ${from} values ----------`
}

export function formatVerdictLine(verdict: Verdict, markers: VerdictMarkers = EMOJI_MARKERS): string {
	const marker = verdict.convertible ? markers.convertible : markers.rejected
	return `${verdict.from.padStart(COLUMN_WIDTH)} -> ${verdict.to.padEnd(COLUMN_WIDTH)} ${marker}`
}

export function formatSummary(summary: MatrixSummary): string {
	return `${summary.convertible} convertible, ${summary.rejected} not convertible`
}

/**
 * One header per source type, one line per pair, then the totals.
 */
export class TextReporter implements MatrixReporter {
	private readonly sink: LineSink
	private readonly markers: VerdictMarkers

	constructor(sink: LineSink, markers: VerdictMarkers = EMOJI_MARKERS) {
		this.sink = sink
		this.markers = markers
	}

	onSectionStart(from: TypeName): void {
		this.sink(formatSectionHeader(from))
	}

	onVerdict(verdict: Verdict): void {
		this.sink(formatVerdictLine(verdict, this.markers))
	}

	onEnd(summary: MatrixSummary): void {
		this.sink(formatSummary(summary))
	}
}

export function createTextReporter(sink: LineSink, markers?: VerdictMarkers): TextReporter {
	return new TextReporter(sink, markers)
}
