/**
 * PAA (game engine texture) types
 * Little-endian container: format code, GGAT tagg stream, palette, mipmap chain
 */

import type { Rgba } from '@paakit/core'

/**
 * Pixel encoding codes, stored as the first uint16 of the file
 */
export const PaaFormat = {
	DXT1: 0xff01,
	DXT5: 0xff05,
	ARGB4444: 0x4444,
	ARGB1555: 0x1555,
	ARGB8888: 0x8888,
	AI88: 0x8080,
} as const

export type PaaFormat = (typeof PaaFormat)[keyof typeof PaaFormat]

const FORMAT_NAMES = new Map<number, string>(Object.entries(PaaFormat).map(([name, code]) => [code, name]))

export function isPaaFormat(code: number): code is PaaFormat {
	return FORMAT_NAMES.has(code)
}

export function formatName(code: number): string {
	return FORMAT_NAMES.get(code) ?? `0x${code.toString(16).padStart(4, '0')}`
}

// Every tagg signature on disk is "GGAT" followed by a reversed 4-char name
export const TAGG_PREFIX = 'GGAT'

export const TAGG_SIGNATURE = {
	AVERAGE_COLOR: 'CGVA',
	MAX_COLOR: 'CXAM',
	FLAG: 'GALF',
	SWIZZLE: 'ZIWS',
	OFFSET: 'SFFO',
} as const

// Offset tagg always lists 16 slots
export const MAX_MIPMAPS = 16

// Bit 15 of a mipmap's stored width marks compressed data
export const MIPMAP_COMPRESSED_FLAG = 0x8000

/** Alpha hints carried by the flag tagg */
export const AlphaFlag = {
	NONE: 0,
	INTERPOLATED: 1,
	BINARY: 2,
} as const

export type SwizzleSource = 'red' | 'green' | 'blue' | 'alpha' | 'zero' | 'one'

/**
 * Where one output channel takes its value from
 */
export interface ChannelSelector {
	readonly source: SwizzleSource
	/** Output 255 - value */
	readonly invert: boolean
}

export interface SwizzleSelectors {
	readonly red: ChannelSelector
	readonly green: ChannelSelector
	readonly blue: ChannelSelector
	readonly alpha: ChannelSelector
}

export interface UnknownTagg {
	readonly kind: 'unknown'
	readonly signature: string
	readonly data: Uint8Array
}

export interface AverageColorTagg {
	readonly kind: 'averageColor'
	readonly signature: typeof TAGG_SIGNATURE.AVERAGE_COLOR
	readonly color: Rgba
}

/**
 * Usually (255, 255, 255, 255) regardless of the texture contents
 */
export interface MaxColorTagg {
	readonly kind: 'maxColor'
	readonly signature: typeof TAGG_SIGNATURE.MAX_COLOR
	readonly color: Rgba
}

export interface FlagTagg {
	readonly kind: 'flag'
	readonly signature: typeof TAGG_SIGNATURE.FLAG
	/** Bit mask of AlphaFlag values */
	readonly value: number
}

export interface SwizzleTagg {
	readonly kind: 'swizzle'
	readonly signature: typeof TAGG_SIGNATURE.SWIZZLE
	readonly selectors: SwizzleSelectors
}

export interface OffsetTagg {
	readonly kind: 'offset'
	readonly signature: typeof TAGG_SIGNATURE.OFFSET
	/** Absolute file offsets, one slot per mipmap, unused slots are 0 */
	readonly offsets: readonly number[]
}

export type PaaTagg = UnknownTagg | AverageColorTagg | MaxColorTagg | FlagTagg | SwizzleTagg | OffsetTagg

export type PaaTaggKind = PaaTagg['kind']

export interface PaaMipmap {
	readonly width: number
	readonly height: number
	/** Encoded pixel data, owned copy */
	readonly data: Uint8Array
	/** Data must be decompressed before decoding */
	readonly compressed: boolean
}

export interface PaaFile {
	readonly format: PaaFormat
	readonly taggs: readonly PaaTagg[]
	/** Raw palette entries (3 bytes each), empty in practice */
	readonly palette: Uint8Array
	readonly mipmaps: readonly PaaMipmap[]
}

/**
 * Expands compressed mipmap data to exactly expectedLength bytes.
 * Implementations report failure by throwing DecompressionError.
 */
export type Decompressor = (data: Uint8Array, expectedLength: number) => Uint8Array

export interface PaaReadOptions {
	/** Reject chains whose levels do not halve (default: false) */
	validateChain?: boolean
}

export interface MipmapDecodeOptions {
	/** Used for mipmaps flagged as compressed */
	decompress?: Decompressor
}

export interface PaaDecodeOptions extends PaaReadOptions, MipmapDecodeOptions {
	/** Mipmap level to decode (default: 0) */
	mipmap?: number
	/** Apply the file's swizzle tagg (default: false) */
	swizzle?: boolean
	/** Reverse scanline order after decoding (default: false) */
	flipRows?: boolean
}
