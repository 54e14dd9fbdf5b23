import type { ByteSource } from '@truecolor/codec-core'
import { UnsupportedTgaError } from './errors'
import { assertSupported, imageDataSize, readTgaHeader } from './header'
import { RawTgaImage } from './image'
import {
	createFieldReader,
	type FieldReader,
	readExtendedIdentification,
	readField,
	readLeadingFields,
} from './reader'
import { decodeRunLength } from './rle'
import { TGA_HEADER_LENGTH, type TgaHeader, TgaImageType } from './types'

export interface UncompressedTga {
	readonly imageType: TgaImageType.TrueColor
	readonly raw: RawTgaImage
}

export interface RunLengthTga {
	readonly imageType: TgaImageType.TrueColorRLE
	readonly raw: RawTgaImage
}

/**
 * Decoded TGA, tagged with the encoding it was stored in
 */
export type TgaImage = UncompressedTga | RunLengthTga

/**
 * Decode a 24-bit TGA from a whole buffer or an incremental source
 *
 * Both input modes give identical results.
 */
export function decodeTga(input: Uint8Array | ByteSource): TgaImage {
	const reader = createFieldReader(input)
	const header = readTgaHeader(reader.take('header', TGA_HEADER_LENGTH))

	switch (header.imageType) {
		case TgaImageType.TrueColor:
			return { imageType: TgaImageType.TrueColor, raw: decodeUncompressed(reader, header) }
		case TgaImageType.TrueColorRLE:
			return { imageType: TgaImageType.TrueColorRLE, raw: decodeRunLength(reader, header) }
		default:
			throw new UnsupportedTgaError('imageType', header.imageType)
	}
}

/**
 * Decode an uncompressed 24-bit image (type 2)
 */
export function decodeUncompressed(reader: FieldReader, header: TgaHeader): RawTgaImage {
	assertSupported(header, TgaImageType.TrueColor)

	const { identification, colorMap } = readLeadingFields(reader, header)
	const pixelData = readField(reader, 'imageData', imageDataSize(header))
	const extendedIdentification = readExtendedIdentification(reader)

	return new RawTgaImage(header, identification, colorMap, pixelData, extendedIdentification)
}
