/**
 * PAA error taxonomy
 */

export class PaaError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'PaaError'
	}
}

/**
 * Structural problem in the container: bad format code, truncated chunk or
 * record, missing terminator. The whole read fails.
 */
export class ContainerFormatError extends PaaError {
	constructor(message: string) {
		super(message)
		this.name = 'ContainerFormatError'
	}
}

/**
 * Known tagg signature with a payload of the wrong shape
 */
export class ChunkFormatError extends PaaError {
	constructor(
		message: string,
		public readonly signature: string
	) {
		super(message)
		this.name = 'ChunkFormatError'
	}
}

/**
 * Pixel data of one mipmap does not match its dimensions
 */
export class DecodeError extends PaaError {
	constructor(
		message: string,
		public readonly encoding: 'block' | 'packed'
	) {
		super(message)
		this.name = 'DecodeError'
	}
}

/**
 * Raised by (or on behalf of) a Decompressor
 */
export class DecompressionError extends PaaError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'DecompressionError'
	}
}
