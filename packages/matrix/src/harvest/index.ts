import { spawn } from 'node:child_process'
import {
	PCRUN001,
	PCRUN002,
	PCRUN003,
	PCRUN004,
	PCRUN005,
	PCRUN006,
	PCRUN007,
} from '@primconv/diagnostics'
import { getErrorMessage, isNodeError, PipelineError } from '../errors.ts'
import { DEFAULT_SHAPE } from '../extract/grammar.ts'

/**
 * Status for reported compile errors when neither the caller nor a
 * diagnostic shape names one.
 */
export const DEFAULT_EXPECTED_EXIT_CODE = DEFAULT_SHAPE.exitCode

export const DEFAULT_TIMEOUT_MS = 120_000

/**
 * A single external command, never run through a shell.
 */
export interface CompilerInvocation {
	readonly command: string
	readonly args: readonly string[]
}

export interface HarvestOptions {
	/** The only exit status treated as "errors were reported" */
	expectedExitCode?: number
	timeoutMs?: number
	signal?: AbortSignal
	cwd?: string
}

export interface GoBuildOptions {
	/** Path or name of the go binary */
	compiler?: string
	platform?: NodeJS.Platform
}

/**
 * How the process ended, as reported by the `close` event.
 */
export interface ExitStatus {
	readonly code: number | null
	readonly signal: NodeJS.Signals | null
}

export function nullDevice(platform: NodeJS.Platform = process.platform): string {
	return platform === 'win32' ? 'NUL' : '/dev/null'
}

/**
 * `go build -gcflags=-e -o <null> <source>`: report every error instead of
 * stopping after ten, and throw away anything that does get built.
 */
export function goBuildInvocation(sourcePath: string, options: GoBuildOptions = {}): CompilerInvocation {
	return {
		args: ['build', '-gcflags=-e', '-o', nullDevice(options.platform), sourcePath],
		command: options.compiler ?? 'go',
	}
}

export function describeInvocation(invocation: CompilerInvocation): string {
	return [invocation.command, ...invocation.args].join(' ')
}

function firstLine(text: string): string {
	const line = text.split(/\r?\n/).find((candidate) => candidate.trim().length > 0)
	return line?.trim() ?? '(no output)'
}

/**
 * Decide whether an exit is the expected "compilation failed" outcome.
 *
 * @returns undefined for the expected status, otherwise the error to raise
 */
export function classifyExit(
	status: ExitStatus,
	expectedExitCode: number,
	command: string,
	stderr: string
): PipelineError | undefined {
	if (status.signal !== null) {
		return new PipelineError(PCRUN005, { command, signal: status.signal })
	}
	if (status.code === expectedExitCode) return undefined
	if (status.code === 0) {
		return new PipelineError(PCRUN003, { command })
	}
	return new PipelineError(PCRUN004, {
		code: String(status.code),
		command,
		detail: firstLine(stderr),
		expected: expectedExitCode,
	})
}

function launchError(error: unknown, invocation: CompilerInvocation): PipelineError {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return new PipelineError(PCRUN001, { command: invocation.command }, { cause: error })
	}
	return new PipelineError(
		PCRUN002,
		{ command: describeInvocation(invocation), reason: getErrorMessage(error) },
		{ cause: error }
	)
}

/**
 * Run the compiler once and return everything it wrote to stderr.
 *
 * Resolves only when the process exits with `expectedExitCode`. A launch
 * failure, any other exit, a signal, the timeout or `signal` being aborted
 * rejects with a {@link PipelineError}; timed out and cancelled processes
 * are killed.
 */
export function harvestDiagnostics(
	invocation: CompilerInvocation,
	options: HarvestOptions = {}
): Promise<string> {
	const command = describeInvocation(invocation)
	const expectedExitCode = options.expectedExitCode ?? DEFAULT_EXPECTED_EXIT_CODE
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
	const { signal } = options

	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new PipelineError(PCRUN007, { command }))
			return
		}

		const child = spawn(invocation.command, invocation.args, {
			cwd: options.cwd,
			stdio: ['ignore', 'ignore', 'pipe'],
		})

		let stderr = ''
		let interruption: PipelineError | undefined
		let settled = false

		const interrupt = (error: PipelineError): void => {
			if (interruption !== undefined) return
			interruption = error
			child.kill('SIGKILL')
		}
		const onAbort = (): void => interrupt(new PipelineError(PCRUN007, { command }))
		const timer = setTimeout(
			() => interrupt(new PipelineError(PCRUN006, { command, timeout: timeoutMs })),
			timeoutMs
		)
		signal?.addEventListener('abort', onAbort, { once: true })

		const settle = (error: PipelineError | undefined): void => {
			if (settled) return
			settled = true
			clearTimeout(timer)
			signal?.removeEventListener('abort', onAbort)
			if (error !== undefined) {
				reject(error)
			} else {
				resolve(stderr)
			}
		}

		child.stderr.setEncoding('utf-8')
		child.stderr.on('data', (chunk: string) => {
			stderr += chunk
		})

		child.once('error', (error: Error) => {
			settle(interruption ?? launchError(error, invocation))
		})

		child.once('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
			settle(interruption ?? classifyExit({ code, signal: exitSignal }, expectedExitCode, command, stderr))
		})
	})
}
