import { describe, expect, it } from 'vitest'
import { ChunkFormatError } from './errors'
import { getTagg, getUnknownTagg, isAlpha, parseTagg } from './taggs'
import { captureError, u32 } from './testing'
import type { PaaFile, PaaTagg } from './types'
import { AlphaFlag, PaaFormat } from './types'

function fileWith(...taggs: PaaTagg[]): PaaFile {
	return { format: PaaFormat.DXT1, taggs, palette: new Uint8Array(0), mipmaps: [] }
}

describe('Taggs', () => {
	describe('parseTagg', () => {
		it('should read the average colour as a BGRA word', () => {
			expect(parseTagg('CGVA', new Uint8Array([70, 137, 175, 127]))).toEqual({
				kind: 'averageColor',
				signature: 'CGVA',
				color: [175, 137, 70, 127],
			})
		})

		it('should read the max colour', () => {
			const tagg = parseTagg('CXAM', new Uint8Array([255, 255, 255, 255]))

			expect(tagg.kind).toBe('maxColor')
			expect(tagg).toMatchObject({ color: [255, 255, 255, 255] })
		})

		it('should read the alpha flag', () => {
			expect(parseTagg('GALF', new Uint8Array(u32(AlphaFlag.BINARY)))).toEqual({
				kind: 'flag',
				signature: 'GALF',
				value: 2,
			})
		})

		it('should read swizzle commands stored alpha first', () => {
			const tagg = parseTagg('ZIWS', new Uint8Array([4, 1, 2, 9]))

			expect(tagg).toEqual({
				kind: 'swizzle',
				signature: 'ZIWS',
				selectors: {
					red: { source: 'red', invert: false },
					green: { source: 'green', invert: false },
					blue: { source: 'zero', invert: false },
					alpha: { source: 'alpha', invert: true },
				},
			})
		})

		it('should read sixteen mipmap offsets', () => {
			const payload = new Uint8Array(64)
			payload.set(u32(128), 0)
			payload.set(u32(0x01020304), 4)
			const tagg = parseTagg('SFFO', payload)

			expect(tagg.kind).toBe('offset')
			if (tagg.kind !== 'offset') return
			expect(tagg.offsets.length).toBe(16)
			expect(tagg.offsets[0]).toBe(128)
			expect(tagg.offsets[1]).toBe(0x01020304)
			expect(tagg.offsets[15]).toBe(0)
		})

		it('should keep unknown signatures as raw data', () => {
			const payload = new Uint8Array([9, 8, 7])
			const tagg = parseTagg('ZZZZ', payload)

			expect(tagg).toEqual({ kind: 'unknown', signature: 'ZZZZ', data: new Uint8Array([9, 8, 7]) })
			payload[0] = 0
			expect(tagg).toMatchObject({ data: new Uint8Array([9, 8, 7]) })
		})

		it('should accept any payload size for unknown signatures', () => {
			expect(parseTagg('ZZZZ', new Uint8Array(0)).kind).toBe('unknown')
		})

		it('should reject a known signature with the wrong payload size', () => {
			const error = captureError(() => parseTagg('CGVA', new Uint8Array(3)))

			expect(error).toBeInstanceOf(ChunkFormatError)
			expect(error).toMatchObject({
				signature: 'CGVA',
				message: 'Invalid data length (3) for average color tagg, expected 4',
			})
			expect(() => parseTagg('SFFO', new Uint8Array(4))).toThrow(ChunkFormatError)
			expect(() => parseTagg('GALF', new Uint8Array(8))).toThrow(ChunkFormatError)
		})

		it('should reject an invalid swizzle command', () => {
			expect(() => parseTagg('ZIWS', new Uint8Array([0, 1, 2, 12]))).toThrow(ChunkFormatError)
		})
	})

	describe('lookup', () => {
		const first = parseTagg('CGVA', new Uint8Array([1, 2, 3, 4]))
		const second = parseTagg('CGVA', new Uint8Array([5, 6, 7, 8]))
		const unknown = parseTagg('ZZZZ', new Uint8Array([1]))

		it('should return the first tagg of a kind', () => {
			expect(getTagg(fileWith(first, unknown, second), 'averageColor')).toBe(first)
		})

		it('should return undefined for a missing kind', () => {
			expect(getTagg(fileWith(first), 'offset')).toBeUndefined()
		})

		it('should reach unknown taggs by signature', () => {
			const file = fileWith(first, unknown)

			expect(getUnknownTagg(file, 'ZZZZ')).toBe(unknown)
			expect(getUnknownTagg(file, 'CGVA')).toBeUndefined()
			expect(getTagg(file, 'unknown')).toBe(unknown)
		})

		it('should report alpha from the flag tagg', () => {
			expect(isAlpha(fileWith(parseTagg('GALF', new Uint8Array(u32(AlphaFlag.INTERPOLATED)))))).toBe(true)
			expect(isAlpha(fileWith(parseTagg('GALF', new Uint8Array(4))))).toBe(false)
			expect(isAlpha(fileWith())).toBe(false)
		})
	})
})
