import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { interpolateMessage, PCGEN001, PCGEN002, PCGEN003 } from '@primconv/diagnostics'
import type { Catalog, TypeName } from '../catalog.ts'
import { getErrorMessage, isNodeError, PipelineError } from '../errors.ts'

/**
 * Template shipped with the package.
 */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
	new URL('../../template/conversions.go.tmpl', import.meta.url)
)

/**
 * Name of the struct variable whose fields hold one zero value per type.
 */
export const PROBE_RECEIVER = 'p'

export interface SynthesisOptions {
	/** Name written into the generated file's header */
	app?: string
}

/**
 * Generated Go program plus what it was generated from.
 */
export interface SynthesizedSource {
	readonly text: string
	readonly catalog: Catalog
	readonly statements: number
}

function fieldLine(name: TypeName): string {
	return `\t\t${name} ${name}`
}

function conversionLine(from: TypeName, to: TypeName): string {
	return `\t_ = ${to}(${PROBE_RECEIVER}.${from})`
}

function conversionBlock(catalog: Catalog, from: TypeName): string {
	const lines = [`\t// ${from}`]
	for (const to of catalog.types) {
		lines.push(conversionLine(from, to))
	}
	return lines.join('\n')
}

/**
 * Render the template with one field per catalog type and one conversion
 * statement per ordered pair. Output depends only on its inputs.
 *
 * Each field is named after its own type so the operand in a diagnostic
 * (`p.byte`) names the source type whatever the compiler prints as its
 * static type.
 */
export function synthesizeSource(
	catalog: Catalog,
	template: string,
	options: SynthesisOptions = {}
): SynthesizedSource {
	const fields = catalog.types.map(fieldLine).join('\n')
	const conversions = catalog.types.map((from) => conversionBlock(catalog, from)).join('\n\n')
	const text = interpolateMessage(template, {
		app: options.app ?? 'primconv',
		conversions,
		fields,
	})
	return {
		catalog,
		statements: catalog.types.length * catalog.types.length,
		text,
	}
}

/**
 * @throws {PipelineError} PCGEN001 if the file is missing, PCGEN002 for any other read failure
 */
export async function loadTemplate(path: string): Promise<string> {
	try {
		return await readFile(path, 'utf-8')
	} catch (error: unknown) {
		if (isNodeError(error) && error.code === 'ENOENT') {
			throw new PipelineError(PCGEN001, { path }, { cause: error })
		}
		throw new PipelineError(PCGEN002, { path, reason: getErrorMessage(error) }, { cause: error })
	}
}

/**
 * Write the generated source, replacing any previous file at `path`.
 *
 * @throws {PipelineError} PCGEN003
 */
export async function writeSource(path: string, text: string): Promise<void> {
	try {
		await mkdir(dirname(path), { recursive: true })
		await writeFile(path, text, 'utf-8')
	} catch (error: unknown) {
		throw new PipelineError(PCGEN003, { path, reason: getErrorMessage(error) }, { cause: error })
	}
}
