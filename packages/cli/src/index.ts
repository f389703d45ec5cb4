#!/usr/bin/env tsx
/**
 * paa CLI - inspect PAA textures and export mipmaps as TGA
 */

import { readFileSync, statSync } from 'node:fs'
import { resolve } from 'node:path'
import { readPaa } from '@paakit/codecs'
import { detectFormat } from '@paakit/core'
import { CliUsageError, parseArgs, type CliOptions } from './args'
import { extract, planExtraction } from './extract'
import { formatInfo } from './info'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const HELP = `
paa - PAA texture inspector and extractor

USAGE:
  paa info <file>                     Show format, taggs and mipmaps
  paa extract <file> [output.tga]     Decode a mipmap to a 32-bit TGA

OPTIONS:
  -m, --mipmap <n>      Mipmap level to extract (default: 0)
  -a, --all             Extract every mipmap as <name>_mip<n>.tga
  --swizzle             Apply the file's channel swizzle
  --flip                Reverse row order
  --rle                 Write run-length encoded TGA
  -o, --out <dir>       Output directory
  --overwrite           Overwrite existing files
  -v, --verbose         Verbose output
  -q, --quiet           Suppress output
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  paa info texture_co.paa
  paa extract texture_co.paa                   # Writes texture_co.tga
  paa extract texture_nohq.paa --swizzle -m 1
  paa extract texture_co.paa --all -o mips/
`

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function loadFile(input: string): { path: string; data: Uint8Array; size: number } {
	const path = resolve(input)
	const size = statSync(path).size
	const data = new Uint8Array(readFileSync(path))

	const format = detectFormat(data)
	if (format !== 'paa') {
		throw new Error(`${input} is not a PAA texture${format ? ` (looks like ${format.toUpperCase()})` : ''}`)
	}

	return { path, data, size }
}

function runInfo(inputs: readonly string[], options: CliOptions): void {
	if (inputs.length === 0) {
		throw new CliUsageError('info requires a file path')
	}

	for (const input of inputs) {
		const { path, data, size } = loadFile(input)
		const file = readPaa(data)
		for (const line of formatInfo(file, path, size, options.verbose)) {
			console.log(line)
		}
		if (inputs.length > 1) console.log('')
	}
}

function runExtract(inputs: readonly string[], options: CliOptions): number {
	const [input, output, ...rest] = inputs
	if (input === undefined) {
		throw new CliUsageError('extract requires a file path')
	}
	if (rest.length > 0) {
		throw new CliUsageError(`Unexpected argument: ${rest[0]}`)
	}

	const { path, data } = loadFile(input)
	const file = readPaa(data)
	const jobs = planExtraction(file, path, output, options)
	const result = extract(file, jobs, options)

	if (!options.quiet && jobs.length > 1) {
		console.log(`\nDone: ${result.written} written, ${result.skipped} skipped, ${result.failed} failed`)
	}

	return result.failed > 0 ? 1 : 0
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function main(): number {
	const { command, inputs, options } = parseArgs(process.argv.slice(2))

	if (options.version) {
		console.log(`paa v${VERSION}`)
		return 0
	}

	if (options.help || command === null) {
		console.log(HELP)
		return command === null && !options.help ? 1 : 0
	}

	if (command === 'info') {
		runInfo(inputs, options)
		return 0
	}

	return runExtract(inputs, options)
}

try {
	process.exitCode = main()
} catch (err) {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
	process.exitCode = 1
}
