/**
 * Scanline order operations
 */

import type { ImageData } from '@paakit/core'

/**
 * Reverse the scanline order of a packed RGBA buffer (top-to-bottom becomes
 * bottom-to-top). Returns a new buffer; applying it twice yields the input.
 */
export function reverseRowOrder(data: Uint8Array, width: number, height: number): Uint8Array {
	const stride = width * 4
	if (data.length !== stride * height) {
		throw new RangeError(`Buffer of ${data.length} bytes does not hold ${width}x${height} RGBA pixels`)
	}

	const output = new Uint8Array(data.length)
	for (let y = 0; y < height; y++) {
		const srcOffset = y * stride
		const dstOffset = (height - 1 - y) * stride
		output.set(data.subarray(srcOffset, srcOffset + stride), dstOffset)
	}

	return output
}

/**
 * Flip image vertically
 */
export function flipVertical(image: ImageData): ImageData {
	const { width, height, data } = image
	return { width, height, data: reverseRowOrder(data, width, height) }
}
