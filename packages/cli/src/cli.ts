import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import MatrixCommand from './commands/matrix.ts'
import TypesCommand from './commands/types.ts'

const version = '0.0.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'primconv')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([MatrixCommand, TypesCommand, HelpCommand]))

	kernel.on('finding:command', async (): Promise<boolean> => {
		console.log(`primconv v${version}`)
		console.log('')
		console.log('Usage: primconv <command> [options]')
		console.log('')
		console.log('Commands:')
		console.log('  matrix    Compile every primitive conversion and print the matrix')
		console.log('  types     List the primitive types under test')
		console.log('')
		console.log('Run "primconv --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
