/**
 * TGA (Targa) format types and constants
 */

// Image types this codec reads; color-mapped and grayscale types are rejected
export enum TgaImageType {
	TrueColor = 2,
	TrueColorRLE = 10,
}

// Image descriptor flags
export const ORIGIN_MASK = 0x30
export const ORIGIN_BOTTOM_LEFT = 0x00
export const ORIGIN_BOTTOM_RIGHT = 0x10
export const ORIGIN_TOP_LEFT = 0x20
export const ORIGIN_TOP_RIGHT = 0x30

export const TGA_HEADER_LENGTH = 18
export const TGA_FOOTER_LENGTH = 26

/** The only pixel depth this codec reads or writes */
export const TGA_PIXEL_DEPTH = 24
export const TGA_BYTES_PER_PIXEL = 3

/**
 * TGA header structure (18 bytes)
 */
export interface TgaHeader {
	readonly idLength: number // Length of image ID field
	readonly colorMapType: number // 0 = no color map, 1 = has color map
	readonly imageType: number // See TgaImageType; only TrueColor and TrueColorRLE decode

	// Color map specification
	readonly colorMapOrigin: number // First entry index
	readonly colorMapLength: number // Number of entries
	readonly colorMapDepth: number // Bits per entry (16, 24, 32)

	// Image specification
	readonly xOrigin: number
	readonly yOrigin: number
	readonly width: number
	readonly height: number
	readonly pixelDepth: number // Bits per pixel
	readonly imageDescriptor: number // Alpha bits + origin
}

export const TGA_FOOTER_SIGNATURE = 'TRUEVISION-XFILE.'

/**
 * One stored pixel, in file order (blue, green, red)
 */
export type TgaPixel = readonly [number, number, number]
