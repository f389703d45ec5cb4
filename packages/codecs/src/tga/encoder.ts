import type { ImageData } from '@paakit/core'
import { ORIGIN_TOP_LEFT, TGA_HEADER_SIZE, TgaImageType, type TgaEncodeOptions } from './types'

/**
 * Encode RGBA ImageData as a 32-bit top-left-origin TGA
 */
export function encodeTga(image: ImageData, options: TgaEncodeOptions = {}): Uint8Array {
	const { width, height, data } = image
	const useRLE = options.rle ?? false

	if (width < 1 || height < 1 || width > 0xffff || height > 0xffff) {
		throw new RangeError(`TGA cannot store ${width}x${height} images`)
	}

	const header = new Uint8Array(TGA_HEADER_SIZE)
	header[2] = useRLE ? TgaImageType.TrueColorRLE : TgaImageType.TrueColor
	header[12] = width & 0xff
	header[13] = (width >> 8) & 0xff
	header[14] = height & 0xff
	header[15] = (height >> 8) & 0xff
	header[16] = 32
	header[17] = ORIGIN_TOP_LEFT | 8 // 8 alpha bits

	// RGBA -> BGRA
	const rawPixels = new Uint8Array(width * height * 4)
	for (let i = 0; i < width * height; i++) {
		const idx = i * 4
		rawPixels[idx] = data[idx + 2]!
		rawPixels[idx + 1] = data[idx + 1]!
		rawPixels[idx + 2] = data[idx]!
		rawPixels[idx + 3] = data[idx + 3]!
	}

	const pixelData = useRLE ? encodeRLE(rawPixels) : rawPixels

	const output = new Uint8Array(header.length + pixelData.length)
	output.set(header, 0)
	output.set(pixelData, header.length)

	return output
}

function pixelsEqual(data: Uint8Array, a: number, b: number): boolean {
	const offsetA = a * 4
	const offsetB = b * 4
	return (
		data[offsetA] === data[offsetB] &&
		data[offsetA + 1] === data[offsetB + 1] &&
		data[offsetA + 2] === data[offsetB + 2] &&
		data[offsetA + 3] === data[offsetB + 3]
	)
}

/**
 * Packets of at most 128 pixels: 0x80|n-1 + one pixel for runs, n-1 + n pixels for raw spans
 */
function encodeRLE(data: Uint8Array): Uint8Array {
	const output: number[] = []
	const numPixels = data.length / 4
	let pos = 0

	while (pos < numPixels) {
		let runLength = 1
		while (runLength < 128 && pos + runLength < numPixels && pixelsEqual(data, pos, pos + runLength)) {
			runLength++
		}

		if (runLength > 1) {
			output.push(0x80 | (runLength - 1), ...data.subarray(pos * 4, pos * 4 + 4))
			pos += runLength
			continue
		}

		let rawLength = 1
		while (
			rawLength < 128 &&
			pos + rawLength < numPixels &&
			!(pos + rawLength + 1 < numPixels && pixelsEqual(data, pos + rawLength, pos + rawLength + 1))
		) {
			rawLength++
		}

		output.push(rawLength - 1, ...data.subarray(pos * 4, (pos + rawLength) * 4))
		pos += rawLength
	}

	return new Uint8Array(output)
}
