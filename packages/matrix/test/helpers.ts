import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

/**
 * `go build` output for the default catalog and template, as printed by a
 * types2-era compiler.
 */
export const GO_BUILD_FIXTURE = fileURLToPath(new URL('./fixtures/go-build.types2.stderr', import.meta.url))

export function readGoBuildFixture(): string {
	return readFileSync(GO_BUILD_FIXTURE, 'utf-8')
}

/** Rejections in {@link GO_BUILD_FIXTURE}. */
export const FIXTURE_REJECTED = 117

export const NUMERIC_TYPES = [
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
	'int',
	'uint',
	'uintptr',
	'byte',
	'rune',
] as const

export const INTEGER_TYPES = [
	'uint8',
	'uint16',
	'uint32',
	'uint64',
	'int8',
	'int16',
	'int32',
	'int64',
	'int',
	'uint',
	'uintptr',
	'byte',
	'rune',
] as const

/**
 * A types2-style diagnostic line as `go build` prints it.
 */
export function conversionLine(from: string, to: string, line = 1): string {
	return `output/conversions.go:${line}:12: cannot convert p.${from} (variable of type ${from}) to type ${to}`
}
