import { args, BaseCommand } from '@adonisjs/ace'
import { explainDiagnostic, formatUnknownKindError } from '../utils.ts'

export default class ExplainCommand extends BaseCommand {
	static override commandName = 'explain'
	static override description = 'Describe a diagnostic kind or code'

	@args.string({ description: 'Kind (e.g. SyntaxError) or code (e.g. FRPARSE001)' })
	declare subject: string

	override async run(): Promise<void> {
		const explanation = explainDiagnostic(this.subject)
		if (explanation === null) {
			this.logger.error(formatUnknownKindError(this.subject))
			this.exitCode = 1
			return
		}
		this.logger.log(explanation)
	}
}
