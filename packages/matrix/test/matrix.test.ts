import assert from 'node:assert'
import { describe, it } from 'node:test'
import { defineCatalog, GO_PRIMITIVES, underlyingType } from '../src/catalog.ts'
import { extractFailures, FailureSet } from '../src/extract/index.ts'
import { ConversionMatrix } from '../src/matrix.ts'
import { FIXTURE_REJECTED, INTEGER_TYPES, NUMERIC_TYPES, readGoBuildFixture } from './helpers.ts'

describe('ConversionMatrix', () => {
	const catalog = defineCatalog(['bool', 'int', 'string'])

	it('should call a pair convertible exactly when it did not fail', () => {
		const matrix = new ConversionMatrix(catalog, FailureSet.of([{ from: 'string', to: 'int' }]))
		assert.strictEqual(matrix.isConvertible('string', 'int'), false)
		assert.strictEqual(matrix.isConvertible('int', 'string'), true)
	})

	it('should lay rows out in catalog order', () => {
		const matrix = new ConversionMatrix(catalog, FailureSet.of([{ from: 'bool', to: 'int' }]))
		const rows = matrix.rows()
		assert.deepStrictEqual(
			rows.map((row) => row.from),
			['bool', 'int', 'string']
		)
		assert.deepStrictEqual(rows[0]?.verdicts, [
			{ convertible: true, from: 'bool', to: 'bool' },
			{ convertible: false, from: 'bool', to: 'int' },
			{ convertible: true, from: 'bool', to: 'string' },
		])
	})

	it('should summarise the totals', () => {
		const failures = FailureSet.of([
			{ from: 'bool', to: 'int' },
			{ from: 'int', to: 'bool' },
		])
		assert.deepStrictEqual(new ConversionMatrix(catalog, failures).summary(), {
			convertible: 7,
			pairs: 9,
			rejected: 2,
			types: 3,
		})
	})

	it('should call everything convertible when nothing failed', () => {
		const summary = new ConversionMatrix(GO_PRIMITIVES, new FailureSet()).summary()
		assert.strictEqual(summary.convertible, 361)
		assert.strictEqual(summary.rejected, 0)
	})
})

describe('Go conversion rules from recorded compiler output', () => {
	const { failures } = extractFailures(readGoBuildFixture(), GO_PRIMITIVES)
	const matrix = new ConversionMatrix(GO_PRIMITIVES, failures)

	it('should reject exactly the recorded pairs', () => {
		assert.deepStrictEqual(matrix.summary(), {
			convertible: 361 - FIXTURE_REJECTED,
			pairs: 361,
			rejected: FIXTURE_REJECTED,
			types: 19,
		})
	})

	it('should convert every type to itself', () => {
		for (const name of GO_PRIMITIVES.types) {
			assert.strictEqual(matrix.isConvertible(name, name), true, name)
		}
	})

	it('should never convert string to a numeric type', () => {
		for (const name of NUMERIC_TYPES) {
			assert.strictEqual(matrix.isConvertible('string', name), false, name)
		}
	})

	it('should convert integers, but not floats or complex numbers, to string', () => {
		for (const name of INTEGER_TYPES) {
			assert.strictEqual(matrix.isConvertible(name, 'string'), true, name)
		}
		for (const name of ['float32', 'float64', 'complex64', 'complex128']) {
			assert.strictEqual(matrix.isConvertible(name, 'string'), false, name)
		}
	})

	it('should isolate bool from every other type', () => {
		for (const name of GO_PRIMITIVES.types) {
			if (name === 'bool') continue
			assert.strictEqual(matrix.isConvertible('bool', name), false, name)
			assert.strictEqual(matrix.isConvertible(name, 'bool'), false, name)
		}
	})

	it('should convert aliases and their targets both ways', () => {
		for (const alias of ['byte', 'rune']) {
			const target = underlyingType(GO_PRIMITIVES, alias)
			assert.strictEqual(matrix.isConvertible(alias, target), true, alias)
			assert.strictEqual(matrix.isConvertible(target, alias), true, alias)
		}
	})

	it('should not assume conversions are symmetric', () => {
		assert.strictEqual(matrix.isConvertible('rune', 'string'), true)
		assert.strictEqual(matrix.isConvertible('string', 'rune'), false)
	})

	it('should keep complex numbers apart from real numbers', () => {
		assert.strictEqual(matrix.isConvertible('complex64', 'complex128'), true)
		assert.strictEqual(matrix.isConvertible('complex128', 'float64'), false)
		assert.strictEqual(matrix.isConvertible('int', 'complex64'), false)
		assert.strictEqual(matrix.isConvertible('float32', 'uintptr'), true)
	})
})
