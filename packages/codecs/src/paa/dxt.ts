/**
 * S3TC block decompression (DXT1 / BC1 and DXT5 / BC3)
 *
 * Interpolated palette entries round to nearest on 8-bit expanded endpoints.
 * Blocks are laid out left to right, top to bottom; the decoded buffer is
 * RGBA with the top row first.
 */

import { DecodeError } from './errors'

export const DXT1_BLOCK_SIZE = 8
export const DXT5_BLOCK_SIZE = 16

// 4x4 texels, RGBA
const BLOCK_TEXELS_SIZE = 64

/**
 * Expand a 5:6:5 colour to 8 bits per channel by bit replication
 */
export function expand565(c: number): [number, number, number] {
	const r = (c >> 11) & 0x1f
	const g = (c >> 5) & 0x3f
	const b = c & 0x1f
	return [(r << 3) | (r >> 2), (g << 2) | (g >> 4), (b << 3) | (b >> 2)]
}

/**
 * Build the 4-entry RGBA colour table of a colour block.
 * With allowTransparent, c0 <= c1 selects the 3-colour + transparent-black mode.
 */
export function colorPalette(c0: number, c1: number, allowTransparent: boolean): Uint8Array {
	const [r0, g0, b0] = expand565(c0)
	const [r1, g1, b1] = expand565(c1)
	const palette = new Uint8Array(16)

	palette.set([r0, g0, b0, 255, r1, g1, b1, 255])

	if (c0 > c1 || !allowTransparent) {
		palette.set(
			[
				Math.round((2 * r0 + r1) / 3),
				Math.round((2 * g0 + g1) / 3),
				Math.round((2 * b0 + b1) / 3),
				255,
				Math.round((r0 + 2 * r1) / 3),
				Math.round((g0 + 2 * g1) / 3),
				Math.round((b0 + 2 * b1) / 3),
				255,
			],
			8
		)
	} else {
		palette.set([Math.round((r0 + r1) / 2), Math.round((g0 + g1) / 2), Math.round((b0 + b1) / 2), 255], 8)
		// Entry 3 stays transparent black
	}

	return palette
}

/**
 * Build the 8-entry alpha table of a DXT5 alpha block
 */
export function alphaPalette(a0: number, a1: number): number[] {
	const alphas = [a0, a1, 0, 0, 0, 0, 0, 0]

	if (a0 > a1) {
		for (let i = 2; i < 8; i++) {
			alphas[i] = Math.round(((8 - i) * a0 + (i - 1) * a1) / 7)
		}
	} else {
		for (let i = 2; i < 6; i++) {
			alphas[i] = Math.round(((6 - i) * a0 + (i - 1) * a1) / 5)
		}
		alphas[6] = 0
		alphas[7] = 255
	}

	return alphas
}

function requireBlock(data: Uint8Array, offset: number, size: number): void {
	if (offset < 0 || data.length - offset < size) {
		throw new DecodeError(`Block at offset ${offset} needs ${size} bytes, ${Math.max(0, data.length - offset)} available`, 'block')
	}
}

function readColorBlock(data: Uint8Array, offset: number, allowTransparent: boolean, out: Uint8Array): void {
	const c0 = data[offset]! | (data[offset + 1]! << 8)
	const c1 = data[offset + 2]! | (data[offset + 3]! << 8)
	const palette = colorPalette(c0, c1, allowTransparent)

	for (let row = 0; row < 4; row++) {
		// One byte of indices per row, texel 0 in the low bits
		const bits = data[offset + 4 + row]!
		for (let col = 0; col < 4; col++) {
			const code = (bits >> (col * 2)) & 0x3
			out.set(palette.subarray(code * 4, code * 4 + 4), (row * 4 + col) * 4)
		}
	}
}

/**
 * Decode one 8-byte DXT1 block into a 4x4 RGBA grid
 */
export function decodeDxt1Block(data: Uint8Array, offset = 0, out: Uint8Array = new Uint8Array(BLOCK_TEXELS_SIZE)): Uint8Array {
	requireBlock(data, offset, DXT1_BLOCK_SIZE)
	readColorBlock(data, offset, true, out)
	return out
}

/**
 * Decode one 16-byte DXT5 block into a 4x4 RGBA grid
 */
export function decodeDxt5Block(data: Uint8Array, offset = 0, out: Uint8Array = new Uint8Array(BLOCK_TEXELS_SIZE)): Uint8Array {
	requireBlock(data, offset, DXT5_BLOCK_SIZE)
	readColorBlock(data, offset + 8, false, out)

	const alphas = alphaPalette(data[offset]!, data[offset + 1]!)

	// 48 bits of 3-bit codes: each 3-byte half holds 8 codes
	for (let half = 0; half < 2; half++) {
		const pos = offset + 2 + half * 3
		const bits = data[pos]! | (data[pos + 1]! << 8) | (data[pos + 2]! << 16)
		for (let i = 0; i < 8; i++) {
			const texel = half * 8 + i
			out[texel * 4 + 3] = alphas[(bits >> (i * 3)) & 0x7]!
		}
	}

	return out
}

type BlockDecoder = (data: Uint8Array, offset: number, out: Uint8Array) => Uint8Array

function decodeBlocks(
	data: Uint8Array,
	width: number,
	height: number,
	blockSize: number,
	decodeBlock: BlockDecoder,
	label: string
): Uint8Array {
	const blocksX = Math.ceil(width / 4)
	const blocksY = Math.ceil(height / 4)
	const expected = blocksX * blocksY * blockSize

	if (data.length !== expected) {
		throw new DecodeError(
			`${label} data for ${width}x${height} must be ${expected} bytes, got ${data.length}`,
			'block'
		)
	}

	const pixels = new Uint8Array(width * height * 4)
	const texels = new Uint8Array(BLOCK_TEXELS_SIZE)

	let srcPos = 0
	for (let by = 0; by < blocksY; by++) {
		for (let bx = 0; bx < blocksX; bx++) {
			decodeBlock(data, srcPos, texels)
			srcPos += blockSize

			// Edge blocks are clipped to the image
			const rows = Math.min(4, height - by * 4)
			const cols = Math.min(4, width - bx * 4)
			for (let py = 0; py < rows; py++) {
				const dstPos = ((by * 4 + py) * width + bx * 4) * 4
				pixels.set(texels.subarray(py * 16, py * 16 + cols * 4), dstPos)
			}
		}
	}

	return pixels
}

/**
 * Decode DXT1 compressed data (BC1) to RGBA
 */
export function decodeDxt1(data: Uint8Array, width: number, height: number): Uint8Array {
	return decodeBlocks(data, width, height, DXT1_BLOCK_SIZE, decodeDxt1Block, 'DXT1')
}

/**
 * Decode DXT5 compressed data (BC3) to RGBA
 */
export function decodeDxt5(data: Uint8Array, width: number, height: number): Uint8Array {
	return decodeBlocks(data, width, height, DXT5_BLOCK_SIZE, decodeDxt5Block, 'DXT5')
}
