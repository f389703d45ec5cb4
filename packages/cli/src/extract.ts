import { existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join, resolve } from 'node:path'
import { type PaaFile, PaaError, decodeMipmap, encodeTga, getTagg, swizzleChannels, swizzleFromTagg } from '@paakit/codecs'
import type { ImageData } from '@paakit/core'
import { flipVertical } from '@paakit/transform'
import type { CliOptions } from './args'

export interface ExtractJob {
	level: number
	output: string
}

export interface ExtractResult {
	written: number
	skipped: number
	failed: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────────────────────────────────────

function selectLevels(file: PaaFile, options: CliOptions): number[] {
	if (options.all) return file.mipmaps.map((_, level) => level)

	const level = options.mipmap ?? 0
	if (level >= file.mipmaps.length) {
		throw new RangeError(`Mipmap ${level} requested, file has ${file.mipmaps.length}`)
	}
	return [level]
}

/**
 * Output paths per mipmap. With --all each level gets a _mipN suffix.
 */
export function planExtraction(file: PaaFile, input: string, output: string | undefined, options: CliOptions): ExtractJob[] {
	const levels = selectLevels(file, options)
	const stem = basename(input, extname(input))
	const dir = options.out ?? dirname(input)

	if (output !== undefined && !options.all) {
		return [{ level: levels[0]!, output: resolve(options.out ? join(options.out, output) : output) }]
	}

	if (options.all) {
		const base = output !== undefined ? basename(output, extname(output)) : stem
		const outDir = output !== undefined && !options.out ? dirname(output) : dir
		return levels.map((level) => ({ level, output: resolve(join(outDir, `${base}_mip${level}.tga`)) }))
	}

	return levels.map((level) => ({ level, output: resolve(join(dir, `${stem}.tga`)) }))
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decode one mipmap and apply the requested post-processing
 */
export function renderMipmap(file: PaaFile, level: number, options: CliOptions): ImageData {
	const mipmap = file.mipmaps[level]
	if (!mipmap) {
		throw new RangeError(`Mipmap ${level} requested, file has ${file.mipmaps.length}`)
	}

	let image = decodeMipmap(mipmap, file.format)

	if (options.swizzle) {
		image = { ...image, data: swizzleChannels(image.data, swizzleFromTagg(getTagg(file, 'swizzle'))) }
	}
	if (options.flip) {
		image = flipVertical(image)
	}

	return image
}

export function extract(file: PaaFile, jobs: readonly ExtractJob[], options: CliOptions): ExtractResult {
	const result: ExtractResult = { written: 0, skipped: 0, failed: 0 }
	const log = (message: string): void => {
		if (!options.quiet) console.log(message)
	}

	for (const job of jobs) {
		if (existsSync(job.output) && !options.overwrite) {
			log(`Skip (exists): ${job.output}`)
			result.skipped++
			continue
		}

		let image: ImageData
		try {
			image = renderMipmap(file, job.level, options)
		} catch (err) {
			// One bad mipmap does not stop the others
			if (!(err instanceof PaaError)) throw err
			console.error(`Mipmap ${job.level}: ${err.message}`)
			result.failed++
			continue
		}

		const tga = encodeTga(image, { rle: options.rle ?? false })
		mkdirSync(dirname(job.output), { recursive: true })
		writeFileSync(job.output, tga)
		result.written++

		if (options.verbose) {
			log(`#${job.level} ${image.width} x ${image.height} -> ${job.output} (${tga.length} bytes)`)
		} else {
			log(`-> ${job.output}`)
		}
	}

	return result
}
