/**
 * Command-line argument parsing
 */

export type Command = 'info' | 'extract'

export interface CliOptions {
	// Output
	out?: string
	overwrite?: boolean

	// Selection
	mipmap?: number
	all?: boolean

	// Post-processing
	swizzle?: boolean
	flip?: boolean
	rle?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	command: Command | null
	inputs: string[]
	options: CliOptions
}

export class CliUsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CliUsageError'
	}
}

const COMMANDS: readonly string[] = ['info', 'extract']

function isCommand(value: string): value is Command {
	return COMMANDS.includes(value)
}

function parseIndex(flag: string, value: string | undefined): number {
	if (value === undefined || !/^\d+$/.test(value)) {
		throw new CliUsageError(`${flag} expects a non-negative integer`)
	}
	return Number.parseInt(value, 10)
}

export function parseArgs(args: readonly string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}
	let command: Command | null = null

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg === '--all' || arg === '-a') {
			options.all = true
		} else if (arg === '--swizzle') {
			options.swizzle = true
		} else if (arg === '--flip') {
			options.flip = true
		} else if (arg === '--rle') {
			options.rle = true
		} else if (arg === '--mipmap' || arg === '-m') {
			options.mipmap = parseIndex(arg, args[++i])
		} else if (arg === '--out' || arg === '-o') {
			const value = args[++i]
			if (!value) throw new CliUsageError(`${arg} expects a directory`)
			options.out = value
		} else if (arg.startsWith('-')) {
			throw new CliUsageError(`Unknown option: ${arg}`)
		} else if (command === null && inputs.length === 0 && isCommand(arg)) {
			command = arg
		} else {
			inputs.push(arg)
		}

		i++
	}

	if (options.all && options.mipmap !== undefined) {
		throw new CliUsageError('--all and --mipmap cannot be combined')
	}

	return { command, inputs, options }
}
