/**
 * Channel swizzling for decoded RGBA buffers
 */

import { ChunkFormatError } from './errors'
import type { ChannelSelector, SwizzleSelectors, SwizzleSource, SwizzleTagg } from './types'
import { TAGG_SIGNATURE } from './types'

export const IDENTITY_SWIZZLE: SwizzleSelectors = {
	red: { source: 'red', invert: false },
	green: { source: 'green', invert: false },
	blue: { source: 'blue', invert: false },
	alpha: { source: 'alpha', invert: false },
}

// Low two bits of a stored command pick the channel, bit 2 inverts
const COMMAND_CHANNELS: readonly SwizzleSource[] = ['alpha', 'red', 'green', 'blue']
const COMMAND_ONE = 8
const COMMAND_ZERO = 9

const SOURCE_OFFSETS: Record<SwizzleSource, number> = {
	red: 0,
	green: 1,
	blue: 2,
	alpha: 3,
	zero: -1,
	one: -1,
}

/**
 * Translate one stored swizzle command byte
 */
export function selectorFromCommand(command: number): ChannelSelector {
	if (command === COMMAND_ONE) return { source: 'one', invert: false }
	if (command === COMMAND_ZERO) return { source: 'zero', invert: false }
	if (command > COMMAND_ZERO) {
		throw new ChunkFormatError(`Invalid swizzle command: ${command}`, TAGG_SIGNATURE.SWIZZLE)
	}

	return { source: COMMAND_CHANNELS[command & 0x3]!, invert: (command & 0x4) !== 0 }
}

export function isIdentitySwizzle(selectors: SwizzleSelectors): boolean {
	return (
		selectors.red.source === 'red' &&
		selectors.green.source === 'green' &&
		selectors.blue.source === 'blue' &&
		selectors.alpha.source === 'alpha' &&
		!selectors.red.invert &&
		!selectors.green.invert &&
		!selectors.blue.invert &&
		!selectors.alpha.invert
	)
}

export function swizzleFromTagg(tagg: SwizzleTagg | undefined): SwizzleSelectors {
	return tagg?.selectors ?? IDENTITY_SWIZZLE
}

function resolve(data: Uint8Array, pixel: number, selector: ChannelSelector): number {
	let value: number
	if (selector.source === 'zero') {
		value = 0
	} else if (selector.source === 'one') {
		value = 255
	} else {
		value = data[pixel + SOURCE_OFFSETS[selector.source]]!
	}
	return selector.invert ? 255 - value : value
}

/**
 * Remap the channels of an RGBA buffer. Each output channel reads the
 * channel (or constant) its selector names; the input is left untouched.
 */
export function swizzleChannels(data: Uint8Array, selectors: SwizzleSelectors): Uint8Array {
	if (data.length % 4 !== 0) {
		throw new RangeError(`RGBA buffer length must be a multiple of 4, got ${data.length}`)
	}

	const output = new Uint8Array(data.length)
	const { red, green, blue, alpha } = selectors

	for (let i = 0; i < data.length; i += 4) {
		output[i] = resolve(data, i, red)
		output[i + 1] = resolve(data, i, green)
		output[i + 2] = resolve(data, i, blue)
		output[i + 3] = resolve(data, i, alpha)
	}

	return output
}
