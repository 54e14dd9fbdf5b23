import type { EncodeOptions, ImageCodec, ImageData } from '@truecolor/codec-core'
import { fromImageData, toImageData } from './convert'
import { decodeTga } from './decoder'
import { encodeTga } from './encoder'

/**
 * TGA (Targa) codec, 24-bit RGB only
 */
export const TgaCodec: ImageCodec = {
	format: 'tga',

	decode(data: Uint8Array): ImageData {
		return toImageData(decodeTga(data).raw)
	},

	encode(image: ImageData, options?: EncodeOptions): Uint8Array {
		return encodeTga(fromImageData(image), options)
	},
}
