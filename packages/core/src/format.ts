import type { ImageFormat } from './types'

/**
 * PAA format codes, the first little-endian word of a texture file
 */
const PAA_FORMAT_CODES: ReadonlySet<number> = new Set([0xff01, 0xff05, 0x4444, 0x1555, 0x8888, 0x8080])

// "GGAT", the prefix every tagg signature starts with
const TAGG_PREFIX = [0x47, 0x47, 0x41, 0x54]

/**
 * Check if bytes match a signature at an offset
 */
function matchMagic(data: Uint8Array, bytes: readonly number[], offset = 0): boolean {
	if (data.length < offset + bytes.length) return false

	for (let i = 0; i < bytes.length; i++) {
		if (data[offset + i] !== bytes[i]) return false
	}
	return true
}

/**
 * Check whether data starts like a PAA texture: a known format code followed
 * either by a tagg or by a palette (3 bytes per entry) that fits in the data
 */
export function isPaa(data: Uint8Array): boolean {
	if (data.length < 4) return false

	const code = data[0]! | (data[1]! << 8)
	if (!PAA_FORMAT_CODES.has(code)) return false
	if (matchMagic(data, TAGG_PREFIX, 2)) return true

	const paletteEntries = data[2]! | (data[3]! << 8)
	return data.length >= 4 + paletteEntries * 3
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (isPaa(data)) return 'paa'

	// TGA has no magic bytes - check header plausibility instead
	if (data.length >= 18) {
		const colorMapType = data[1]
		const imageType = data[2]!
		const pixelDepth = data[16]!
		const validImageTypes = [1, 2, 3, 9, 10, 11]
		const validPixelDepths = [8, 15, 16, 24, 32]
		if (
			validImageTypes.includes(imageType) &&
			validPixelDepths.includes(pixelDepth) &&
			(colorMapType === 0 || colorMapType === 1)
		) {
			const width = data[12]! | (data[13]! << 8)
			const height = data[14]! | (data[15]! << 8)
			if (width > 0 && height > 0) {
				return 'tga'
			}
		}
	}

	return null
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: ImageFormat): string {
	return format === 'tga' ? 'image/x-tga' : 'image/x-paa'
}
