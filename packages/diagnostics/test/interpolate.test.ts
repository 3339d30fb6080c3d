import assert from 'node:assert'
import { describe, it } from 'node:test'
import { interpolateMessage } from '../src/interpolate.ts'

describe('interpolateMessage', () => {
	it('should return the template unchanged without args', () => {
		assert.strictEqual(interpolateMessage('template not found: {path}'), 'template not found: {path}')
	})

	it('should replace every known placeholder', () => {
		const result = interpolateMessage('`{command}` exited with status {code}, expected {expected}', {
			code: 1,
			command: 'go build',
			expected: 2,
		})
		assert.strictEqual(result, '`go build` exited with status 1, expected 2')
	})

	it('should leave unknown placeholders in place', () => {
		assert.strictEqual(interpolateMessage('{known} and {unknown}', { known: 'x' }), 'x and {unknown}')
	})

	it('should not touch braces that are not placeholders', () => {
		const source = 'func main() {\n\t_ = {fields}\n}\n'
		assert.strictEqual(interpolateMessage(source, { fields: 'p' }), 'func main() {\n\t_ = p\n}\n')
	})

	it('should replace repeated placeholders', () => {
		assert.strictEqual(interpolateMessage('{a}-{a}', { a: 'z' }), 'z-z')
	})
})
