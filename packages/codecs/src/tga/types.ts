/**
 * TGA (Targa) format types and constants
 */

// Image types
export enum TgaImageType {
	TrueColor = 2,
	TrueColorRLE = 10,
}

// Image descriptor flags
export const ORIGIN_TOP_LEFT = 0x20

export const TGA_HEADER_SIZE = 18

export interface TgaEncodeOptions {
	/** Run-length encode pixel data (default: false) */
	rle?: boolean
}
