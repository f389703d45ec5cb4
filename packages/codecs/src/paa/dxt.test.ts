import { describe, expect, it } from 'vitest'
import { alphaPalette, decodeDxt1, decodeDxt1Block, decodeDxt5, decodeDxt5Block, expand565 } from './dxt'
import { DecodeError } from './errors'
import { captureError, dxt1Block, dxt5AlphaBlock } from './testing'

const WHITE = 0xffff
const BLACK = 0x0000

function texel(grid: Uint8Array, index: number): number[] {
	return Array.from(grid.subarray(index * 4, index * 4 + 4))
}

describe('DXT', () => {
	describe('expand565', () => {
		it('should expand full-intensity channels to 255', () => {
			expect(expand565(0xf800)).toEqual([255, 0, 0])
			expect(expand565(0x07e0)).toEqual([0, 255, 0])
			expect(expand565(0x001f)).toEqual([0, 0, 255])
		})

		it('should replicate high bits into low bits', () => {
			// r = 16, g = 32, b = 16
			expect(expand565(0x8410)).toEqual([132, 130, 132])
		})
	})

	describe('decodeDxt1Block', () => {
		it('should interpolate thirds when color0 > color1', () => {
			const block = new Uint8Array(dxt1Block(WHITE, BLACK, [0, 1, 2, 3]))
			const grid = decodeDxt1Block(block)

			expect(texel(grid, 0)).toEqual([255, 255, 255, 255])
			expect(texel(grid, 1)).toEqual([0, 0, 0, 255])
			expect(texel(grid, 2)).toEqual([170, 170, 170, 255])
			expect(texel(grid, 3)).toEqual([85, 85, 85, 255])
			for (let i = 0; i < 16; i++) {
				expect(grid[i * 4 + 3]).toBe(255)
			}
		})

		it('should use one-bit alpha when color0 <= color1', () => {
			const block = new Uint8Array(dxt1Block(BLACK, WHITE, [0, 1, 2, 3, 3, 3]))
			const grid = decodeDxt1Block(block)

			expect(texel(grid, 0)).toEqual([0, 0, 0, 255])
			expect(texel(grid, 1)).toEqual([255, 255, 255, 255])
			expect(texel(grid, 2)).toEqual([128, 128, 128, 255])
			expect(texel(grid, 3)).toEqual([0, 0, 0, 0])
			expect(texel(grid, 5)).toEqual([0, 0, 0, 0])
		})

		it('should treat equal endpoints as the transparent mode', () => {
			const red = 0xf800
			const grid = decodeDxt1Block(new Uint8Array(dxt1Block(red, red, [2, 3])))

			expect(texel(grid, 0)).toEqual([255, 0, 0, 255])
			expect(texel(grid, 1)).toEqual([0, 0, 0, 0])
		})

		it('should read from an offset', () => {
			const data = new Uint8Array([0xaa, ...dxt1Block(WHITE, BLACK, [1])])
			const grid = decodeDxt1Block(data, 1)

			expect(texel(grid, 0)).toEqual([0, 0, 0, 255])
		})

		it('should write into a caller-supplied view of any buffer', () => {
			const data = new Uint8Array(dxt1Block(WHITE, BLACK, [1]))
			const out = new Uint8Array(new SharedArrayBuffer(64))
			const grid = decodeDxt1Block(data, 0, out)

			expect(grid).toBe(out)
			expect(texel(out, 0)).toEqual([0, 0, 0, 255])
		})

		it('should reject a short block', () => {
			expect(() => decodeDxt1Block(new Uint8Array(7))).toThrow(DecodeError)
		})
	})

	describe('alphaPalette', () => {
		it('should build the 8-value table when a0 > a1', () => {
			const alphas = alphaPalette(255, 0)

			expect(alphas).toEqual([255, 0, 219, 182, 146, 109, 73, 36])
			// a0, then codes 2..7, then a1 descend strictly
			const ordered = [alphas[0]!, ...alphas.slice(2), alphas[1]!]
			for (let i = 1; i < ordered.length; i++) {
				expect(ordered[i]).toBeLessThan(ordered[i - 1]!)
			}
		})

		it('should build the 6-value table with fixed 0 and 255 when a0 <= a1', () => {
			const alphas = alphaPalette(0, 255)

			expect(alphas).toEqual([0, 255, 51, 102, 153, 204, 0, 255])
			for (const value of alphas.slice(2, 6)) {
				expect(value).toBeGreaterThan(0)
				expect(value).toBeLessThan(255)
			}
		})

		it('should keep codes 6 and 7 fixed regardless of endpoints', () => {
			const alphas = alphaPalette(40, 90)

			expect(alphas[6]).toBe(0)
			expect(alphas[7]).toBe(255)
		})
	})

	describe('decodeDxt5Block', () => {
		const alphaCodes = [0, 1, 2, 3, 4, 5, 6, 7, 7, 6, 5, 4, 3, 2, 1, 0]

		it('should decode interpolated alpha per texel', () => {
			const block = new Uint8Array([...dxt5AlphaBlock(200, 100, alphaCodes), ...dxt1Block(WHITE, BLACK, [])])
			const grid = decodeDxt5Block(block)

			const alphas = Array.from({ length: 16 }, (_, i) => grid[i * 4 + 3])
			expect(alphas).toEqual([200, 100, 186, 171, 157, 143, 129, 114, 114, 129, 143, 157, 171, 186, 100, 200])
		})

		it('should always use the 4-colour table for the colour block', () => {
			// color0 < color1 would select transparent black in DXT1
			const blue = 0x001f
			const red = 0xf800
			const block = new Uint8Array([...dxt5AlphaBlock(255, 0, []), ...dxt1Block(blue, red, [2, 3])])
			const grid = decodeDxt5Block(block)

			expect(texel(grid, 0)).toEqual([85, 0, 170, 255])
			expect(texel(grid, 1)).toEqual([170, 0, 85, 255])
		})

		it('should reject a short block', () => {
			expect(() => decodeDxt5Block(new Uint8Array(15))).toThrow(DecodeError)
		})
	})

	describe('decodeDxt1', () => {
		it('should tile blocks left to right', () => {
			const data = new Uint8Array([
				...dxt1Block(WHITE, BLACK, new Array(16).fill(0)),
				...dxt1Block(WHITE, BLACK, new Array(16).fill(1)),
			])
			const pixels = decodeDxt1(data, 8, 4)

			expect(pixels.length).toBe(8 * 4 * 4)
			expect(Array.from(pixels.subarray(0, 4))).toEqual([255, 255, 255, 255])
			expect(Array.from(pixels.subarray(4 * 4, 4 * 4 + 4))).toEqual([0, 0, 0, 255])
			// (3, 3) is in the first block
			const idx = (3 * 8 + 3) * 4
			expect(Array.from(pixels.subarray(idx, idx + 4))).toEqual([255, 255, 255, 255])
		})

		it('should clip a block to a smaller image', () => {
			const codes = new Array(16).fill(0)
			codes[5] = 1
			const pixels = decodeDxt1(new Uint8Array(dxt1Block(WHITE, BLACK, codes)), 2, 2)

			expect(pixels.length).toBe(16)
			expect(Array.from(pixels.subarray(12, 16))).toEqual([0, 0, 0, 255])
			expect(Array.from(pixels.subarray(8, 12))).toEqual([255, 255, 255, 255])
		})

		it('should reject data of the wrong size', () => {
			expect(() => decodeDxt1(new Uint8Array(16), 4, 4)).toThrow(DecodeError)

			const error = captureError(() => decodeDxt1(new Uint8Array(7), 4, 4))
			expect(error).toBeInstanceOf(DecodeError)
			expect(error).toMatchObject({ encoding: 'block', message: 'DXT1 data for 4x4 must be 8 bytes, got 7' })
		})
	})

	describe('decodeDxt5', () => {
		it('should decode a full image', () => {
			const block = [...dxt5AlphaBlock(255, 0, new Array(16).fill(1)), ...dxt1Block(WHITE, BLACK, [])]
			const pixels = decodeDxt5(new Uint8Array([...block, ...block]), 4, 8)

			expect(pixels.length).toBe(4 * 8 * 4)
			expect(Array.from(pixels.subarray(pixels.length - 4))).toEqual([255, 255, 255, 0])
		})

		it('should reject data of the wrong size', () => {
			expect(() => decodeDxt5(new Uint8Array(8), 4, 4)).toThrow(DecodeError)
		})
	})
})
