import type { ConversionPair, TypeName } from '../catalog.ts'
import type { MatrixSummary, Verdict } from '../matrix.ts'
import type { LineSink, MatrixReporter } from './types.ts'

export interface JsonMatrix {
	types: TypeName[]
	failures: ConversionPair[]
	matrix: Record<TypeName, Record<TypeName, boolean>>
	summary: MatrixSummary
}

/**
 * Collects the whole matrix and writes it as one JSON document at the end.
 */
export class JsonReporter implements MatrixReporter {
	private readonly sink: LineSink
	private readonly document: Omit<JsonMatrix, 'summary'> = { failures: [], matrix: {}, types: [] }
	private current: Record<TypeName, boolean> | undefined

	constructor(sink: LineSink) {
		this.sink = sink
	}

	onSectionStart(from: TypeName): void {
		this.current = {}
		this.document.types.push(from)
		this.document.matrix[from] = this.current
	}

	onVerdict(verdict: Verdict): void {
		if (this.current === undefined) return
		this.current[verdict.to] = verdict.convertible
		if (!verdict.convertible) {
			this.document.failures.push({ from: verdict.from, to: verdict.to })
		}
	}

	onEnd(summary: MatrixSummary): void {
		const output: JsonMatrix = { ...this.document, summary }
		this.sink(JSON.stringify(output, null, 2))
	}
}

export function createJsonReporter(sink: LineSink): JsonReporter {
	return new JsonReporter(sink)
}
