import { describe, expect, it } from 'vitest'
import { DecodeError } from './errors'
import { decodeAi88, decodeArgb1555, decodeArgb4444, decodeArgb8888, expandBits } from './pixels'
import { captureError } from './testing'

describe('Bit-packed pixels', () => {
	describe('expandBits', () => {
		it('should map the extremes to 0 and 255', () => {
			expect(expandBits(0, 5)).toBe(0)
			expect(expandBits(31, 5)).toBe(255)
			expect(expandBits(0xf, 4)).toBe(255)
			expect(expandBits(1, 1)).toBe(255)
		})

		it('should replicate high bits', () => {
			expect(expandBits(0x8, 4)).toBe(0x88)
			expect(expandBits(16, 5)).toBe(132)
			expect(expandBits(200, 8)).toBe(200)
		})
	})

	describe('decodeArgb8888', () => {
		it('should reorder BGRA bytes to RGBA', () => {
			expect(Array.from(decodeArgb8888(new Uint8Array([1, 2, 3, 4]), 1, 1))).toEqual([3, 2, 1, 4])
		})
	})

	describe('decodeArgb4444', () => {
		it('should expand nibbles', () => {
			// A=F R=8 G=0 B=F
			const pixels = decodeArgb4444(new Uint8Array([0x0f, 0xf8]), 1, 1)

			expect(Array.from(pixels)).toEqual([136, 0, 255, 255])
		})

		it('should decode every pixel in order', () => {
			const pixels = decodeArgb4444(new Uint8Array([0x00, 0x00, 0x21, 0x43]), 2, 1)

			expect(Array.from(pixels)).toEqual([0, 0, 0, 0, 0x33, 0x22, 0x11, 0x44])
		})
	})

	describe('decodeArgb1555', () => {
		it('should decode the alpha bit and 5-bit channels', () => {
			// 0xFC10: alpha 1, red 31, green 0, blue 16; 0x03E0: alpha 0, green 31
			const pixels = decodeArgb1555(new Uint8Array([0x10, 0xfc, 0xe0, 0x03]), 2, 1)

			expect(Array.from(pixels)).toEqual([255, 0, 132, 255, 0, 255, 0, 0])
		})
	})

	describe('decodeAi88', () => {
		it('should produce greyscale with alpha', () => {
			expect(Array.from(decodeAi88(new Uint8Array([205, 127]), 1, 1))).toEqual([205, 205, 205, 127])
		})
	})

	it('should reject data that does not match the dimensions', () => {
		const error = captureError(() => decodeArgb8888(new Uint8Array(7), 1, 2))

		expect(error).toBeInstanceOf(DecodeError)
		expect(error).toMatchObject({ encoding: 'packed', message: 'ARGB8888 data for 1x2 must be 8 bytes, got 7' })
		expect(() => decodeArgb4444(new Uint8Array(6), 2, 2)).toThrow(DecodeError)
		expect(() => decodeArgb1555(new Uint8Array(10), 2, 2)).toThrow(DecodeError)
		expect(() => decodeAi88(new Uint8Array(3), 1, 1)).toThrow(DecodeError)
	})
})
