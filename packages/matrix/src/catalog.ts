import { PCCFG001 } from '@primconv/diagnostics'
import { PipelineError } from './errors.ts'

/**
 * Name of a Go primitive type, as written in source.
 */
export type TypeName = string

/**
 * Ordered (from, to) combination under test.
 */
export interface ConversionPair {
	readonly from: TypeName
	readonly to: TypeName
}

/**
 * Fixed, ordered set of types to probe. Order only affects report layout.
 */
export interface Catalog {
	readonly types: readonly TypeName[]
	/** alias name -> aliased type, both members of `types` */
	readonly aliases: ReadonlyMap<TypeName, TypeName>
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

function invalid(reason: string): PipelineError {
	return new PipelineError(PCCFG001, { reason })
}

function checkTypes(types: readonly TypeName[]): void {
	if (types.length === 0) throw invalid('no types')
	const seen = new Set<TypeName>()
	for (const name of types) {
		if (!IDENTIFIER.test(name)) throw invalid(`"${name}" is not an identifier`)
		if (seen.has(name)) throw invalid(`duplicate type "${name}"`)
		seen.add(name)
	}
}

function checkAliases(types: readonly TypeName[], aliases: Iterable<[TypeName, TypeName]>): void {
	const members = new Set(types)
	for (const [alias, target] of aliases) {
		if (!members.has(alias)) throw invalid(`alias "${alias}" is not in the catalog`)
		if (!members.has(target)) throw invalid(`alias target "${target}" is not in the catalog`)
		if (alias === target) throw invalid(`"${alias}" aliases itself`)
	}
}

/**
 * Build a validated, frozen catalog.
 *
 * @throws {PipelineError} PCCFG001 when the names are empty, duplicated or not identifiers
 */
export function defineCatalog(
	types: readonly TypeName[],
	aliases: Readonly<Record<TypeName, TypeName>> = {}
): Catalog {
	const entries = Object.entries(aliases)
	checkTypes(types)
	checkAliases(types, entries)
	return Object.freeze({
		aliases: new Map(entries),
		types: Object.freeze([...types]),
	})
}

/**
 * Every predeclared Go scalar type. `byte` and `rune` are aliases, listed
 * separately because the compiler accepts them as distinct conversion targets.
 */
export const GO_PRIMITIVES: Catalog = defineCatalog(
	[
		'bool',
		'uint8',
		'uint16',
		'uint32',
		'uint64',
		'int8',
		'int16',
		'int32',
		'int64',
		'float32',
		'float64',
		'complex64',
		'complex128',
		'string',
		'int',
		'uint',
		'uintptr',
		'byte',
		'rune',
	],
	{ byte: 'uint8', rune: 'int32' }
)

/**
 * The catalog's self-product, outer loop over `from`, inner over `to`.
 */
export function* conversionPairs(catalog: Catalog): Generator<ConversionPair> {
	for (const from of catalog.types) {
		for (const to of catalog.types) {
			yield { from, to }
		}
	}
}

export function hasType(catalog: Catalog, name: TypeName): boolean {
	return catalog.types.includes(name)
}

/**
 * The type an alias stands for, or the name itself.
 */
export function underlyingType(catalog: Catalog, name: TypeName): TypeName {
	return catalog.aliases.get(name) ?? name
}
