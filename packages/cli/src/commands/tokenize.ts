import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	FileRegistry,
	formatLexError,
	type SourceFile,
	type TokenizeOutput,
	tokenizeFile,
} from '@vmasm/assembler'
import {
	formatAbortError,
	formatInvalidModeError,
	formatReadError,
	formatToken,
	isNumericMode,
	tokenToJson,
} from '../utils.ts'

export default class TokenizeCommand extends BaseCommand {
	static override commandName = 'tokenize'
	static override description = 'Tokenize an assembler source file and print its tokens'

	@args.string({ description: 'Input source file' })
	declare input: string

	@flags.string({
		alias: 'n',
		default: 'unsigned',
		description: 'How unprefixed number literals are read: unsigned, signed or float',
	})
	declare numeric: string

	@flags.boolean({ description: 'Print tokens as a JSON array' })
	declare json: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private tokenizeSource(files: FileRegistry, source: SourceFile): TokenizeOutput | null {
		const numericMode = this.numeric
		if (!isNumericMode(numericMode)) {
			this.logger.error(formatInvalidModeError(numericMode))
			this.exitCode = 1
			return null
		}

		try {
			return tokenizeFile(files, source.id, { numericMode })
		} catch (error: unknown) {
			this.logger.error(formatAbortError(error))
			this.exitCode = 1
			return null
		}
	}

	private printTokens(output: TokenizeOutput, source: SourceFile): void {
		if (!output.succeeded) {
			this.logger.logError(formatLexError(output.error, source))
			this.exitCode = 1
			return
		}

		if (this.json) {
			const tokens = output.tokens.map((token) => tokenToJson(token, source))
			this.logger.log(JSON.stringify(tokens, null, 2))
			return
		}

		for (const token of output.tokens) {
			this.logger.log(formatToken(token, source))
		}
	}

	override async run(): Promise<void> {
		const text = await this.readSourceFile()
		if (text === null) return

		const files = new FileRegistry()
		const source = files.get(files.register(this.input, text))

		const output = this.tokenizeSource(files, source)
		if (output === null) return

		this.printTokens(output, source)
	}
}
