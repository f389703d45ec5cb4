/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * RGBA sample, each channel 0-255
 */
export type Rgba = readonly [r: number, g: number, b: number, a: number]

/**
 * Formats this toolkit can recognise
 */
export type ImageFormat = 'paa' | 'tga'

/**
 * Read-only image codec (texture containers are decoded, never written back)
 */
export interface ImageDecoder {
	readonly name: string
	readonly extensions: readonly string[]
	readonly mimeTypes: readonly string[]
	canDecode(data: Uint8Array): boolean
	decode(data: Uint8Array): ImageData
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): [number, number, number, number] {
	const idx = (y * image.width + x) * 4
	return [image.data[idx]!, image.data[idx + 1]!, image.data[idx + 2]!, image.data[idx + 3]!]
}
