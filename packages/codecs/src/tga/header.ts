import { IncompleteTgaError, UnsupportedTgaError } from './errors'
import { TGA_HEADER_LENGTH, TGA_PIXEL_DEPTH, type TgaHeader, type TgaImageType } from './types'

/** Header fields in file order */
export const TGA_HEADER_FIELDS = [
	'idLength',
	'colorMapType',
	'imageType',
	'colorMapOrigin',
	'colorMapLength',
	'colorMapDepth',
	'xOrigin',
	'yOrigin',
	'width',
	'height',
	'pixelDepth',
	'imageDescriptor',
] as const satisfies readonly (keyof TgaHeader)[]

/**
 * Read TGA header
 *
 * Only the layout is checked here; image type and depth are left to the decoders.
 */
export function readTgaHeader(data: Uint8Array): TgaHeader {
	if (data.length < TGA_HEADER_LENGTH) {
		throw new IncompleteTgaError('header', data.length, TGA_HEADER_LENGTH)
	}

	return {
		idLength: data[0],
		colorMapType: data[1],
		imageType: data[2],
		colorMapOrigin: data[3] | (data[4] << 8),
		colorMapLength: data[5] | (data[6] << 8),
		colorMapDepth: data[7],
		xOrigin: data[8] | (data[9] << 8),
		yOrigin: data[10] | (data[11] << 8),
		width: data[12] | (data[13] << 8),
		height: data[14] | (data[15] << 8),
		pixelDepth: data[16],
		imageDescriptor: data[17],
	}
}

/**
 * Write TGA header
 */
export function writeTgaHeader(header: TgaHeader): Uint8Array {
	const out = new Uint8Array(TGA_HEADER_LENGTH)
	out[0] = header.idLength
	out[1] = header.colorMapType
	out[2] = header.imageType
	writeU16LE(out, 3, header.colorMapOrigin)
	writeU16LE(out, 5, header.colorMapLength)
	out[7] = header.colorMapDepth
	writeU16LE(out, 8, header.xOrigin)
	writeU16LE(out, 10, header.yOrigin)
	writeU16LE(out, 12, header.width)
	writeU16LE(out, 14, header.height)
	out[16] = header.pixelDepth
	out[17] = header.imageDescriptor
	return out
}

function writeU16LE(out: Uint8Array, offset: number, value: number): void {
	out[offset] = value & 0xff
	out[offset + 1] = (value >> 8) & 0xff
}

export function bytesPerPixel(header: TgaHeader): number {
	return header.pixelDepth >> 3
}

/**
 * Color map size in bytes. Entry depth is a whole number of bytes in 24-bit files.
 */
export function colorMapSize(header: TgaHeader): number {
	return header.colorMapLength * (header.colorMapDepth >> 3)
}

/**
 * Uncompressed pixel data size in bytes
 */
export function imageDataSize(header: TgaHeader): number {
	return header.width * header.height * bytesPerPixel(header)
}

/**
 * Reject anything but 24-bit pixels of the given image type
 */
export function assertSupported(header: TgaHeader, imageType: TgaImageType): void {
	if (header.imageType !== imageType) {
		throw new UnsupportedTgaError('imageType', header.imageType)
	}
	if (header.pixelDepth !== TGA_PIXEL_DEPTH) {
		throw new UnsupportedTgaError('pixelDepth', header.pixelDepth)
	}
}
