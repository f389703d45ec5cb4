/**
 * Tagg registry: typed records for known signatures, raw passthrough for the rest
 */

import type { Rgba } from '@paakit/core'
import { ChunkFormatError } from './errors'
import { selectorFromCommand } from './swizzle'
import type { PaaFile, PaaTagg, PaaTaggKind, UnknownTagg } from './types'
import { MAX_MIPMAPS, TAGG_SIGNATURE } from './types'

function expectLength(signature: string, payload: Uint8Array, length: number, label: string): void {
	if (payload.length !== length) {
		throw new ChunkFormatError(
			`Invalid data length (${payload.length}) for ${label} tagg, expected ${length}`,
			signature
		)
	}
}

function readU32(data: Uint8Array, pos: number): number {
	return (data[pos]! | (data[pos + 1]! << 8) | (data[pos + 2]! << 16) | (data[pos + 3]! << 24)) >>> 0
}

// Colours are stored as one ARGB8888 word: bytes B, G, R, A
function readColor(payload: Uint8Array): Rgba {
	return [payload[2]!, payload[1]!, payload[0]!, payload[3]!]
}

/**
 * Build the typed record for a tagg. Unrecognised signatures are returned as
 * UnknownTagg with a copy of the payload.
 */
export function parseTagg(signature: string, payload: Uint8Array): PaaTagg {
	switch (signature) {
		case TAGG_SIGNATURE.AVERAGE_COLOR:
			expectLength(signature, payload, 4, 'average color')
			return { kind: 'averageColor', signature, color: readColor(payload) }

		case TAGG_SIGNATURE.MAX_COLOR:
			expectLength(signature, payload, 4, 'max color')
			return { kind: 'maxColor', signature, color: readColor(payload) }

		case TAGG_SIGNATURE.FLAG:
			expectLength(signature, payload, 4, 'flag')
			return { kind: 'flag', signature, value: readU32(payload, 0) }

		case TAGG_SIGNATURE.SWIZZLE:
			expectLength(signature, payload, 4, 'swizzle')
			// Stored in alpha, red, green, blue order
			return {
				kind: 'swizzle',
				signature,
				selectors: {
					red: selectorFromCommand(payload[1]!),
					green: selectorFromCommand(payload[2]!),
					blue: selectorFromCommand(payload[3]!),
					alpha: selectorFromCommand(payload[0]!),
				},
			}

		case TAGG_SIGNATURE.OFFSET: {
			expectLength(signature, payload, MAX_MIPMAPS * 4, 'offset')
			const offsets: number[] = []
			for (let i = 0; i < MAX_MIPMAPS; i++) {
				offsets.push(readU32(payload, i * 4))
			}
			return { kind: 'offset', signature, offsets }
		}

		default:
			return { kind: 'unknown', signature, data: payload.slice() }
	}
}

/**
 * First tagg of a kind. Duplicates do not normally occur; the first one wins.
 */
export function getTagg<K extends PaaTaggKind>(file: PaaFile, kind: K): Extract<PaaTagg, { kind: K }> | undefined {
	return file.taggs.find((tagg): tagg is Extract<PaaTagg, { kind: K }> => tagg.kind === kind)
}

/**
 * First unrecognised tagg with the given signature
 */
export function getUnknownTagg(file: PaaFile, signature: string): UnknownTagg | undefined {
	return file.taggs.find((tagg): tagg is UnknownTagg => tagg.kind === 'unknown' && tagg.signature === signature)
}

/**
 * Whether the flag tagg marks the texture as using alpha
 */
export function isAlpha(file: PaaFile): boolean {
	const flag = getTagg(file, 'flag')
	return flag !== undefined && flag.value !== 0
}
