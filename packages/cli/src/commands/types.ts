import { BaseCommand } from '@adonisjs/ace'
import { GO_PRIMITIVES } from '@primconv/matrix'

export default class TypesCommand extends BaseCommand {
	static override commandName = 'types'
	static override description = 'List the primitive types the matrix covers'

	override async run(): Promise<void> {
		for (const name of GO_PRIMITIVES.types) {
			const target = GO_PRIMITIVES.aliases.get(name)
			this.logger.log(target === undefined ? name : `${name} = ${target}`)
		}
	}
}
