/**
 * Mipmap chain model and per-level decoding
 */

import type { ImageData } from '@paakit/core'
import { DXT1_BLOCK_SIZE, DXT5_BLOCK_SIZE, decodeDxt1, decodeDxt5 } from './dxt'
import { DecompressionError } from './errors'
import { decodeAi88, decodeArgb1555, decodeArgb4444, decodeArgb8888 } from './pixels'
import type { MipmapDecodeOptions, PaaMipmap } from './types'
import { PaaFormat, formatName } from './types'

/**
 * Dimensions of a chain level: both halve per level, never below 1
 */
export function mipmapSize(width: number, height: number, level: number): { width: number; height: number } {
	return {
		width: Math.max(1, Math.floor(width / 2 ** level)),
		height: Math.max(1, Math.floor(height / 2 ** level)),
	}
}

/**
 * Index of the first level whose dimensions break the halving rule, or -1
 */
export function findChainBreak(mipmaps: readonly PaaMipmap[]): number {
	const top = mipmaps[0]
	if (!top) return -1

	for (let level = 1; level < mipmaps.length; level++) {
		const mip = mipmaps[level]!
		const expected = mipmapSize(top.width, top.height, level)
		if (mip.width !== expected.width || mip.height !== expected.height) {
			return level
		}
	}
	return -1
}

/**
 * Number of encoded bytes a level of the given size occupies
 */
export function encodedSize(format: PaaFormat, width: number, height: number): number {
	const blocks = Math.ceil(width / 4) * Math.ceil(height / 4)
	switch (format) {
		case PaaFormat.DXT1:
			return blocks * DXT1_BLOCK_SIZE
		case PaaFormat.DXT5:
			return blocks * DXT5_BLOCK_SIZE
		case PaaFormat.ARGB8888:
			return width * height * 4
		case PaaFormat.ARGB4444:
		case PaaFormat.ARGB1555:
		case PaaFormat.AI88:
			return width * height * 2
	}
}

function decodePixels(format: PaaFormat, data: Uint8Array, width: number, height: number): Uint8Array {
	switch (format) {
		case PaaFormat.DXT1:
			return decodeDxt1(data, width, height)
		case PaaFormat.DXT5:
			return decodeDxt5(data, width, height)
		case PaaFormat.ARGB8888:
			return decodeArgb8888(data, width, height)
		case PaaFormat.ARGB4444:
			return decodeArgb4444(data, width, height)
		case PaaFormat.ARGB1555:
			return decodeArgb1555(data, width, height)
		case PaaFormat.AI88:
			return decodeAi88(data, width, height)
	}
}

function decompressMipmap(mipmap: PaaMipmap, format: PaaFormat, options: MipmapDecodeOptions): Uint8Array {
	const decompress = options.decompress
	if (!decompress) {
		throw new DecompressionError(
			`Mipmap ${mipmap.width}x${mipmap.height} (${formatName(format)}) is compressed and no decompressor is configured`
		)
	}

	const expected = encodedSize(format, mipmap.width, mipmap.height)
	const data = decompress(mipmap.data, expected)
	if (data.length !== expected) {
		throw new DecompressionError(`Decompressor produced ${data.length} bytes, expected ${expected}`)
	}
	return data
}

/**
 * Decode one mipmap to RGBA. Results are not cached; callers that decode the
 * same level repeatedly should memoize.
 */
export function decodeMipmap(mipmap: PaaMipmap, format: PaaFormat, options: MipmapDecodeOptions = {}): ImageData {
	const { width, height } = mipmap
	const encoded = mipmap.compressed ? decompressMipmap(mipmap, format, options) : mipmap.data

	return { width, height, data: decodePixels(format, encoded, width, height) }
}
