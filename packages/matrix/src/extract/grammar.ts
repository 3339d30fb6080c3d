import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import type { ConversionPair } from '../catalog.ts'

/**
 * A pinned wording of the compiler's invalid-conversion error. Scraping is
 * only trusted for shapes listed here; anything else is a hard failure.
 */
export interface DiagnosticShape {
	readonly id: string
	/** Substring that flags a line as a conversion diagnostic */
	readonly marker: string
	/** Grammar rule matching one whole line */
	readonly startRule: 'types2' | 'legacy'
	/** Status `go build` exits with after reporting compile errors */
	readonly exitCode: number
	readonly description: string
}

export const DIAGNOSTIC_SHAPES = {
	'gc-legacy': {
		description: 'go <1.18: cannot convert p.T (type T) to type U',
		exitCode: 2,
		id: 'gc-legacy',
		marker: 'cannot convert',
		startRule: 'legacy',
	},
	types2: {
		description: 'go >=1.18: cannot convert p.T (variable of type T) to type U',
		exitCode: 1,
		id: 'types2',
		marker: 'cannot convert',
		startRule: 'types2',
	},
} as const satisfies Record<string, DiagnosticShape>

export type ShapeId = keyof typeof DIAGNOSTIC_SHAPES

export const DEFAULT_SHAPE: DiagnosticShape = DIAGNOSTIC_SHAPES.types2

export function isShapeId(value: string): value is ShapeId {
	return Object.hasOwn(DIAGNOSTIC_SHAPES, value)
}

/**
 * Conversion diagnostic grammar.
 *
 * One line of compiler output, optionally prefixed by `file:line:col: `.
 * The operand is always `<receiver>.<field>` because the generated source
 * names every field after its type; the field is the source type.
 * A trailing `: <cause>` after the destination type is accepted and ignored.
 */
const grammarSource = String.raw`
ConversionDiagnostic {
  types2 = location? conversion types2Operand destination trailing
  legacy = location? conversion legacyOperand destination trailing

  conversion = "cannot convert "
  types2Operand = operand " (" mode " of type " staticType ")"
  legacyOperand = operand " (type " staticType ")"
  destination = " to type " identifier cause?

  location = (~": " ~conversion any)+ ": "
  operand = identifier "." identifier
  mode = (~" of type " ~")" any)+
  staticType = (~")" any)+
  cause = ": " any*
  trailing = space* end

  identifier = identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_"
}
`

/**
 * The compiled conversion diagnostic grammar.
 */
export const ConversionDiagnosticGrammar = ohm.grammar(grammarSource)

function createSemantics(): ohm.Semantics {
	const semantics = ConversionDiagnosticGrammar.createSemantics()

	semantics.addOperation<string>('fromType', {
		legacyOperand(operand: Node, _open: Node, _staticType: Node, _close: Node) {
			return operand['fromType']()
		},
		operand(_receiver: Node, _dot: Node, field: Node) {
			return field.sourceString
		},
		types2Operand(
			operand: Node,
			_open: Node,
			_mode: Node,
			_ofType: Node,
			_staticType: Node,
			_close: Node
		) {
			return operand['fromType']()
		},
	})

	semantics.addOperation<string>('toType', {
		destination(_toType: Node, name: Node, _cause: Node) {
			return name.sourceString
		},
	})

	semantics.addOperation<ConversionPair>('toPair', {
		legacy(_location: Node, _conversion: Node, operand: Node, destination: Node, _trailing: Node) {
			return { from: operand['fromType'](), to: destination['toType']() }
		},
		types2(_location: Node, _conversion: Node, operand: Node, destination: Node, _trailing: Node) {
			return { from: operand['fromType'](), to: destination['toType']() }
		},
	})

	return semantics
}

const semantics = createSemantics()

/**
 * Recover the (from, to) pair from one diagnostic line.
 *
 * @returns undefined when the line does not have the given shape
 */
export function parseDiagnosticLine(
	line: string,
	shape: DiagnosticShape = DEFAULT_SHAPE
): ConversionPair | undefined {
	const result = ConversionDiagnosticGrammar.match(line, shape.startRule)
	if (result.failed()) return undefined
	return semantics(result)['toPair']()
}
