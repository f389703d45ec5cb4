/**
 * Builders for in-memory PAA files used by the tests
 */

import { TAGG_PREFIX } from './types'

export interface TaggSpec {
	signature: string
	payload: ArrayLike<number>
}

export interface MipmapSpec {
	width: number
	height: number
	data: ArrayLike<number>
	compressed?: boolean
}

export interface PaaSpec {
	format: number
	taggs?: TaggSpec[]
	palette?: ArrayLike<number>
	mipmaps?: MipmapSpec[]
	/** Omit the sentinel and end marker */
	unterminated?: boolean
}

function u16(value: number): number[] {
	return [value & 0xff, (value >> 8) & 0xff]
}

function u24(value: number): number[] {
	return [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff]
}

export function u32(value: number): number[] {
	return [value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff, (value >>> 24) & 0xff]
}

function ascii(text: string): number[] {
	return Array.from(text, (ch) => ch.charCodeAt(0))
}

export function buildTagg(signature: string, payload: ArrayLike<number>): number[] {
	return [...ascii(TAGG_PREFIX), ...ascii(signature), ...u32(payload.length), ...Array.from(payload)]
}

export function buildMipmap(mip: MipmapSpec): number[] {
	const width = mip.compressed ? mip.width | 0x8000 : mip.width
	return [...u16(width), ...u16(mip.height), ...u24(mip.data.length), ...Array.from(mip.data)]
}

export function buildPaa(spec: PaaSpec): Uint8Array {
	const palette = Array.from(spec.palette ?? [])
	const bytes: number[] = [...u16(spec.format)]

	for (const tagg of spec.taggs ?? []) {
		bytes.push(...buildTagg(tagg.signature, tagg.payload))
	}

	bytes.push(...u16(palette.length / 3), ...palette)

	for (const mip of spec.mipmaps ?? []) {
		bytes.push(...buildMipmap(mip))
	}

	if (!spec.unterminated) {
		bytes.push(0, 0, 0, 0, 0, 0)
	}

	return new Uint8Array(bytes)
}

/**
 * One DXT1 block: two 565 endpoints and sixteen 2-bit codes (texel 0 first)
 */
export function dxt1Block(c0: number, c1: number, codes: readonly number[]): number[] {
	const rows = [0, 1, 2, 3].map((row) =>
		[0, 1, 2, 3].reduce((bits, col) => bits | ((codes[row * 4 + col] ?? 0) << (col * 2)), 0)
	)
	return [...u16(c0), ...u16(c1), ...rows]
}

/**
 * One DXT5 alpha half-block: two endpoints and sixteen 3-bit codes
 */
export function dxt5AlphaBlock(a0: number, a1: number, codes: readonly number[]): number[] {
	const bytes = [a0, a1]
	for (let half = 0; half < 2; half++) {
		let bits = 0
		for (let i = 0; i < 8; i++) {
			bits |= (codes[half * 8 + i] ?? 0) << (i * 3)
		}
		bytes.push(...u24(bits))
	}
	return bytes
}

/**
 * Run fn and return what it throws, or undefined
 */
export function captureError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (error) {
		return error
	}
	return undefined
}
