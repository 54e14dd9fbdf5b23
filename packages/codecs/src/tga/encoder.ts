import type { EncodeOptions } from '@truecolor/codec-core'
import type { TgaImage } from './decoder'
import { TGA_FOOTER } from './footer'
import { writeTgaHeader } from './header'
import { RawTgaImage } from './image'
import { compressRunLength } from './rle'
import { TgaImageType } from './types'
import { TgaWriter } from './writer'

/**
 * Encode a decoded image to TGA bytes
 *
 * Uncompressed output is exactly what `image.writer()` produces. With
 * `compression: 'rle'` the pixels are stored as run-length packets (type 10).
 */
export function encodeTga(image: TgaImage | RawTgaImage, options?: EncodeOptions): Uint8Array {
	const raw = image instanceof RawTgaImage ? image : image.raw
	const writer = options?.compression === 'rle' ? runLengthWriter(raw) : raw.writer()
	return drain(writer)
}

function runLengthWriter(image: RawTgaImage): TgaWriter {
	return new TgaWriter([
		writeTgaHeader({ ...image.header, imageType: TgaImageType.TrueColorRLE }),
		image.imageIdentification(),
		image.colorMapData(),
		compressRunLength(image.imageData()),
		image.extendedImageIdentification(),
		TGA_FOOTER,
	])
}

function drain(writer: TgaWriter): Uint8Array {
	const output = new Uint8Array(writer.byteLength)
	let offset = 0
	while (!writer.done) {
		offset += writer.read(output.subarray(offset))
	}
	return output
}
