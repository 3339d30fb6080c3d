import assert from 'node:assert'
import { chmod, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { defineCatalog, GO_PRIMITIVES } from '../../src/catalog.ts'
import { PipelineError } from '../../src/errors.ts'
import { DIAGNOSTIC_SHAPES } from '../../src/extract/grammar.ts'
import { GoToolchainProbe, RecordedDiagnosticsProbe } from '../../src/harvest/probe.ts'
import { DEFAULT_TEMPLATE_PATH, loadTemplate, synthesizeSource } from '../../src/synthesize/index.ts'
import { conversionLine, FIXTURE_REJECTED, GO_BUILD_FIXTURE } from '../helpers.ts'

/**
 * Executable that records its arguments, prints `stderrFile` and exits like
 * `go build` does on compile errors.
 */
function fakeGoScript(argvFile: string, stderrFile: string, exitCode: number): string {
	return [
		`#!${process.execPath}`,
		"const { readFileSync, writeFileSync } = require('node:fs')",
		`writeFileSync(${JSON.stringify(argvFile)}, process.argv.slice(2).join(' '))`,
		`process.stderr.write(readFileSync(${JSON.stringify(stderrFile)}, 'utf-8'))`,
		`process.exit(${exitCode})`,
		'',
	].join('\n')
}

async function writeExecutable(path: string, script: string): Promise<void> {
	await writeFile(path, script)
	await chmod(path, 0o755)
}

// The fake compilers rely on a shebang line, so these only run on POSIX.
describe('GoToolchainProbe', () => {
	let dir: string
	let goCompiler: string
	let legacyCompiler: string
	let argvFile: string

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), 'primconv-probe-'))
		argvFile = join(dir, 'argv.txt')
		goCompiler = join(dir, 'fake-go.cjs')
		legacyCompiler = join(dir, 'fake-go-legacy.cjs')
		const legacyOutput = join(dir, 'legacy.stderr')
		await writeFile(
			legacyOutput,
			'# command-line-arguments\n./output/conversions.go:31:12: cannot convert p.bool (type bool) to type uint8\n'
		)
		await writeExecutable(goCompiler, fakeGoScript(argvFile, GO_BUILD_FIXTURE, 1))
		await writeExecutable(legacyCompiler, fakeGoScript(argvFile, legacyOutput, 2))
	})

	after(async () => {
		await rm(dir, { force: true, recursive: true })
	})

	it('should write the source, run the compiler on it and extract failures', async () => {
		if (process.platform === 'win32') return
		const sourcePath = join(dir, 'output', 'conversions.go')
		const source = synthesizeSource(GO_PRIMITIVES, await loadTemplate(DEFAULT_TEMPLATE_PATH))
		const probe = new GoToolchainProbe({ compiler: goCompiler, sourcePath })

		const extraction = await probe.probe(source)

		assert.strictEqual(await readFile(sourcePath, 'utf-8'), source.text)
		assert.strictEqual(await readFile(argvFile, 'utf-8'), `build -gcflags=-e -o /dev/null ${sourcePath}`)
		assert.strictEqual(extraction.failures.size, FIXTURE_REJECTED)
		assert.strictEqual(extraction.failures.has('bool', 'uint8'), true)
		assert.strictEqual(extraction.failures.has('rune', 'string'), false)
	})

	it('should expect the exit status of the legacy shape', async () => {
		if (process.platform === 'win32') return
		const sourcePath = join(dir, 'legacy', 'conversions.go')
		const source = synthesizeSource(GO_PRIMITIVES, '{conversions}')
		const probe = new GoToolchainProbe({
			compiler: legacyCompiler,
			shape: DIAGNOSTIC_SHAPES['gc-legacy'],
			sourcePath,
		})

		const extraction = await probe.probe(source)

		assert.deepStrictEqual([...extraction.failures], [{ from: 'bool', to: 'uint8' }])
	})

	it('should reject the legacy exit status under the default shape', async () => {
		if (process.platform === 'win32') return
		const sourcePath = join(dir, 'conversions.go')
		const source = synthesizeSource(GO_PRIMITIVES, '{conversions}')
		const probe = new GoToolchainProbe({ compiler: legacyCompiler, sourcePath })

		await assert.rejects(probe.probe(source), (error: unknown) => {
			assert.ok(error instanceof PipelineError)
			assert.strictEqual(error.code, 'PCRUN004')
			assert.strictEqual(error.args?.['code'], '2')
			assert.strictEqual(error.args?.['expected'], 1)
			return true
		})
	})

	it('should let an explicit status override the shape', async () => {
		if (process.platform === 'win32') return
		const sourcePath = join(dir, 'conversions.go')
		const source = synthesizeSource(GO_PRIMITIVES, '{conversions}')
		const accepting = new GoToolchainProbe({ compiler: legacyCompiler, expectedExitCode: 2, sourcePath })
		const rejecting = new GoToolchainProbe({ compiler: goCompiler, expectedExitCode: 2, sourcePath })

		const extraction = await accepting.probe(source)
		assert.strictEqual(extraction.failures.size, 1)

		await assert.rejects(rejecting.probe(source), (error: unknown) => {
			assert.ok(error instanceof PipelineError)
			assert.strictEqual(error.code, 'PCRUN004')
			assert.strictEqual(error.args?.['detail'], '# command-line-arguments')
			return true
		})
	})
})

describe('RecordedDiagnosticsProbe', () => {
	const catalog = defineCatalog(['bool', 'int', 'string'])
	const source = synthesizeSource(catalog, '{conversions}')

	it('should extract failures from the recorded output', async () => {
		const probe = new RecordedDiagnosticsProbe(
			[conversionLine('bool', 'int', 3), conversionLine('string', 'int', 9)].join('\n')
		)
		const extraction = await probe.probe(source)
		assert.deepStrictEqual([...extraction.failures], [
			{ from: 'bool', to: 'int' },
			{ from: 'string', to: 'int' },
		])
		assert.deepStrictEqual(probe.received, [source])
	})

	it('should refuse to run once cancelled', async () => {
		const controller = new AbortController()
		controller.abort()
		const probe = new RecordedDiagnosticsProbe('')
		await assert.rejects(probe.probe(source, { signal: controller.signal }), (error: unknown) => {
			assert.ok(error instanceof PipelineError)
			assert.strictEqual(error.code, 'PCRUN007')
			return true
		})
		assert.strictEqual(probe.received.length, 0)
	})
})
