/**
 * PAA container reader
 * Parses structure only; pixel data is kept encoded until decodeMipmap
 */

import { ContainerFormatError } from './errors'
import { findChainBreak, mipmapSize } from './mipmap'
import { parseTagg } from './taggs'
import type { PaaFile, PaaMipmap, PaaReadOptions, PaaTagg } from './types'
import { MIPMAP_COMPRESSED_FLAG, TAGG_PREFIX, formatName, isPaaFormat } from './types'

/**
 * Bounds-checked little-endian reader
 */
class PaaReader {
	private offset: number

	constructor(
		private data: Uint8Array,
		offset = 0
	) {
		this.offset = offset
	}

	private require(length: number, what: string): void {
		if (this.data.length - this.offset < length) {
			throw new ContainerFormatError(
				`Unexpected end of data reading ${what} at offset ${this.offset} (need ${length} bytes, ${this.remaining()} left)`
			)
		}
	}

	remaining(): number {
		return Math.max(0, this.data.length - this.offset)
	}

	getOffset(): number {
		return this.offset
	}

	readU16(what: string): number {
		this.require(2, what)
		const val = this.data[this.offset]! | (this.data[this.offset + 1]! << 8)
		this.offset += 2
		return val
	}

	readU24(what: string): number {
		this.require(3, what)
		const val = this.data[this.offset]! | (this.data[this.offset + 1]! << 8) | (this.data[this.offset + 2]! << 16)
		this.offset += 3
		return val
	}

	readU32(what: string): number {
		this.require(4, what)
		const val =
			(this.data[this.offset]! |
				(this.data[this.offset + 1]! << 8) |
				(this.data[this.offset + 2]! << 16) |
				(this.data[this.offset + 3]! << 24)) >>>
			0
		this.offset += 4
		return val
	}

	readAscii(length: number, what: string): string {
		return String.fromCharCode(...this.readBytes(length, what))
	}

	peekAscii(length: number): string | null {
		if (this.remaining() < length) return null
		return String.fromCharCode(...this.data.subarray(this.offset, this.offset + length))
	}

	/**
	 * Copy of the next length bytes
	 */
	readBytes(length: number, what: string): Uint8Array {
		this.require(length, what)
		const bytes = this.data.slice(this.offset, this.offset + length)
		this.offset += length
		return bytes
	}
}

function readTaggs(reader: PaaReader): PaaTagg[] {
	const taggs: PaaTagg[] = []

	for (;;) {
		const prefix = reader.peekAscii(TAGG_PREFIX.length)
		if (prefix === null) {
			throw new ContainerFormatError('Unexpected end of data in tagg stream')
		}
		if (prefix !== TAGG_PREFIX) break

		reader.readAscii(TAGG_PREFIX.length, 'tagg prefix')
		const signature = reader.readAscii(4, 'tagg signature')
		const length = reader.readU32('tagg length')
		if (length > reader.remaining()) {
			throw new ContainerFormatError(
				`Tagg ${signature} declares ${length} bytes but only ${reader.remaining()} remain`
			)
		}
		taggs.push(parseTagg(signature, reader.readBytes(length, `tagg ${signature}`)))
	}

	return taggs
}

/**
 * Read one mipmap record; null for the zero-dimension sentinel
 */
function readMipmap(reader: PaaReader): PaaMipmap | null {
	const start = reader.getOffset()
	const storedWidth = reader.readU16('mipmap width')
	const height = reader.readU16('mipmap height')

	if (storedWidth === 0 && height === 0) return null

	const compressed = (storedWidth & MIPMAP_COMPRESSED_FLAG) !== 0
	const width = storedWidth & ~MIPMAP_COMPRESSED_FLAG
	if (width === 0 || height === 0) {
		throw new ContainerFormatError(`Invalid mipmap dimensions ${width}x${height} at offset ${start}`)
	}

	const length = reader.readU24('mipmap data length')
	if (length > reader.remaining()) {
		throw new ContainerFormatError(
			`Mipmap ${width}x${height} at offset ${start} declares ${length} bytes but only ${reader.remaining()} remain`
		)
	}

	return { width, height, compressed, data: reader.readBytes(length, 'mipmap data') }
}

/**
 * Parse a PAA texture container
 */
export function readPaa(data: Uint8Array, options: PaaReadOptions = {}): PaaFile {
	const validateChain = options.validateChain ?? false
	const reader = new PaaReader(data)

	const code = reader.readU16('format code')
	if (!isPaaFormat(code)) {
		throw new ContainerFormatError(`Unknown format type: ${formatName(code)}`)
	}

	const taggs = readTaggs(reader)

	const paletteEntries = reader.readU16('palette size')
	const palette = reader.readBytes(paletteEntries * 3, 'palette')

	const mipmaps: PaaMipmap[] = []
	for (;;) {
		const mip = readMipmap(reader)
		if (!mip) break
		mipmaps.push(mip)
	}

	const end = reader.readU16('end marker')
	if (end !== 0) {
		throw new ContainerFormatError(`Unexpected end marker value: ${end}`)
	}

	if (validateChain) {
		const level = findChainBreak(mipmaps)
		if (level !== -1) {
			const top = mipmaps[0]!
			const mip = mipmaps[level]!
			const expected = mipmapSize(top.width, top.height, level)
			throw new ContainerFormatError(
				`Mipmap ${level} is ${mip.width}x${mip.height}, expected ${expected.width}x${expected.height}`
			)
		}
	}

	return { format: code, taggs, palette, mipmaps }
}

/**
 * Read a single mipmap record at an absolute offset, as listed by the offset
 * tagg. Returns null when the offset points at the chain's sentinel.
 */
export function readMipmapAt(data: Uint8Array, offset: number): PaaMipmap | null {
	if (!Number.isInteger(offset) || offset < 0 || offset > data.length) {
		throw new ContainerFormatError(`Mipmap offset ${offset} is outside the data`)
	}
	return readMipmap(new PaaReader(data, offset))
}
