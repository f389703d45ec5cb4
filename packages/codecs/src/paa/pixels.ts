/**
 * Bit-packed pixel decoders. Words are little-endian.
 */

import { DecodeError } from './errors'

/**
 * Expand n-bit value to 8-bit by replicating its high bits
 */
export function expandBits(value: number, bits: number): number {
	if (bits >= 8) return value
	let result = 0
	let filled = 0
	while (filled < 8) {
		result = (result << bits) | value
		filled += bits
	}
	return result >> (filled - 8)
}

function checkLength(data: Uint8Array, width: number, height: number, wordSize: number, label: string): void {
	const expected = width * height * wordSize
	if (data.length !== expected) {
		throw new DecodeError(
			`${label} data for ${width}x${height} must be ${expected} bytes, got ${data.length}`,
			'packed'
		)
	}
}

/**
 * 0xAARRGGBB words, stored as bytes B, G, R, A
 */
export function decodeArgb8888(data: Uint8Array, width: number, height: number): Uint8Array {
	checkLength(data, width, height, 4, 'ARGB8888')
	const pixels = new Uint8Array(width * height * 4)

	for (let i = 0; i < width * height; i++) {
		const src = i * 4
		pixels[src] = data[src + 2]!
		pixels[src + 1] = data[src + 1]!
		pixels[src + 2] = data[src]!
		pixels[src + 3] = data[src + 3]!
	}

	return pixels
}

/**
 * 0xARGB nibbles
 */
export function decodeArgb4444(data: Uint8Array, width: number, height: number): Uint8Array {
	checkLength(data, width, height, 2, 'ARGB4444')
	const pixels = new Uint8Array(width * height * 4)

	for (let i = 0; i < width * height; i++) {
		const word = data[i * 2]! | (data[i * 2 + 1]! << 8)
		const dst = i * 4
		pixels[dst] = ((word >> 8) & 0xf) * 0x11
		pixels[dst + 1] = ((word >> 4) & 0xf) * 0x11
		pixels[dst + 2] = (word & 0xf) * 0x11
		pixels[dst + 3] = ((word >> 12) & 0xf) * 0x11
	}

	return pixels
}

/**
 * Bit 15 alpha, then 5 bits each of red, green, blue
 */
export function decodeArgb1555(data: Uint8Array, width: number, height: number): Uint8Array {
	checkLength(data, width, height, 2, 'ARGB1555')
	const pixels = new Uint8Array(width * height * 4)

	for (let i = 0; i < width * height; i++) {
		const word = data[i * 2]! | (data[i * 2 + 1]! << 8)
		const dst = i * 4
		pixels[dst] = expandBits((word >> 10) & 0x1f, 5)
		pixels[dst + 1] = expandBits((word >> 5) & 0x1f, 5)
		pixels[dst + 2] = expandBits(word & 0x1f, 5)
		pixels[dst + 3] = word & 0x8000 ? 255 : 0
	}

	return pixels
}

/**
 * Intensity in the low byte, alpha in the high byte
 */
export function decodeAi88(data: Uint8Array, width: number, height: number): Uint8Array {
	checkLength(data, width, height, 2, 'AI88')
	const pixels = new Uint8Array(width * height * 4)

	for (let i = 0; i < width * height; i++) {
		const intensity = data[i * 2]!
		const dst = i * 4
		pixels[dst] = intensity
		pixels[dst + 1] = intensity
		pixels[dst + 2] = intensity
		pixels[dst + 3] = data[i * 2 + 1]!
	}

	return pixels
}
