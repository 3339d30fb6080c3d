import {
	type DiagnosticDef,
	interpolateMessage,
	PCSCAN001,
	PCSCAN002,
	PCSCAN050,
} from '@primconv/diagnostics'
import { type Catalog, type ConversionPair, hasType } from '../catalog.ts'
import { PipelineError } from '../errors.ts'
import { FailureSet } from './failure-set.ts'
import { DEFAULT_SHAPE, type DiagnosticShape, parseDiagnosticLine } from './grammar.ts'

export { FailureSet } from './failure-set.ts'
export {
	ConversionDiagnosticGrammar,
	DEFAULT_SHAPE,
	DIAGNOSTIC_SHAPES,
	type DiagnosticShape,
	isShapeId,
	parseDiagnosticLine,
	type ShapeId,
} from './grammar.ts'

/**
 * Non-fatal finding about the compiler output.
 */
export interface ExtractionWarning {
	readonly def: DiagnosticDef
	readonly message: string
}

export interface Extraction {
	readonly failures: FailureSet
	/** Non-blank lines of compiler output */
	readonly scannedLines: number
	/** Lines carrying the shape's marker */
	readonly matchedLines: number
	readonly warnings: readonly ExtractionWarning[]
}

function splitLines(text: string): string[] {
	return text.split(/\r?\n/).filter((line) => line.trim().length > 0)
}

function checkKnown(catalog: Catalog, pair: ConversionPair, line: string): void {
	for (const name of [pair.from, pair.to]) {
		if (!hasType(catalog, name)) {
			throw new PipelineError(PCSCAN002, { line, name })
		}
	}
}

/**
 * Parse one marked line, failing loudly when its wording has drifted.
 *
 * @throws {PipelineError} PCSCAN001 when the line does not match the shape
 */
export function extractPair(line: string, shape: DiagnosticShape = DEFAULT_SHAPE): ConversionPair {
	const trimmed = line.trim()
	const pair = parseDiagnosticLine(trimmed, shape)
	if (pair === undefined) {
		throw new PipelineError(PCSCAN001, { line: trimmed, shape: shape.id })
	}
	return pair
}

/**
 * Build the failure set from raw compiler diagnostics. Lines without the
 * shape's marker are ignored; every marked line must parse.
 *
 * @throws {PipelineError} PCSCAN001, PCSCAN002
 */
export function extractFailures(
	diagnostics: string,
	catalog: Catalog,
	shape: DiagnosticShape = DEFAULT_SHAPE
): Extraction {
	const lines = splitLines(diagnostics)
	const failures = new FailureSet()
	let matchedLines = 0

	for (const line of lines) {
		if (!line.includes(shape.marker)) continue
		matchedLines++
		const pair = extractPair(line, shape)
		checkKnown(catalog, pair, line.trim())
		failures.add(pair)
	}

	const warnings: ExtractionWarning[] = []
	if (failures.size === 0) {
		warnings.push({
			def: PCSCAN050,
			message: interpolateMessage(PCSCAN050.message, { lines: lines.length }),
		})
	}

	return { failures, matchedLines, scannedLines: lines.length, warnings }
}
