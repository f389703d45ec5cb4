/**
 * PAA Codec implementation
 */

import type { ImageData, ImageDecoder } from '@paakit/core'
import { isPaa } from '@paakit/core'
import { reverseRowOrder } from '@paakit/transform'
import { readPaa } from './decoder'
import { decodeMipmap } from './mipmap'
import { swizzleChannels, swizzleFromTagg } from './swizzle'
import { getTagg } from './taggs'
import type { PaaDecodeOptions } from './types'

export class PaaCodec implements ImageDecoder {
	readonly name = 'PAA'
	readonly mimeTypes = ['image/x-paa']
	readonly extensions = ['.paa', '.pac']

	private options: PaaDecodeOptions

	constructor(options: PaaDecodeOptions = {}) {
		this.options = options
	}

	canDecode(data: Uint8Array): boolean {
		return isPaa(data)
	}

	decode(data: Uint8Array): ImageData {
		const { mipmap: level = 0, swizzle = false, flipRows = false } = this.options
		const file = readPaa(data, this.options)

		const mipmap = file.mipmaps[level]
		if (!mipmap) {
			throw new RangeError(`Mipmap ${level} requested, file has ${file.mipmaps.length}`)
		}

		const image = decodeMipmap(mipmap, file.format, this.options)
		let pixels = image.data

		if (swizzle) {
			pixels = swizzleChannels(pixels, swizzleFromTagg(getTagg(file, 'swizzle')))
		}
		if (flipRows) {
			pixels = reverseRowOrder(pixels, image.width, image.height)
		}

		return { width: image.width, height: image.height, data: pixels }
	}
}
