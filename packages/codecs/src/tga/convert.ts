import type { ImageData } from '@truecolor/codec-core'
import { RawTgaImage } from './image'
import {
	ORIGIN_BOTTOM_RIGHT,
	ORIGIN_MASK,
	ORIGIN_TOP_LEFT,
	ORIGIN_TOP_RIGHT,
	TGA_BYTES_PER_PIXEL,
	TGA_PIXEL_DEPTH,
	TgaImageType,
} from './types'

const MAX_DIMENSION = 0xffff

/**
 * Convert stored BGR pixels to top-down RGBA
 */
export function toImageData(image: RawTgaImage): ImageData {
	const { width, height } = image
	const pixelData = image.imageData()
	const output = new Uint8Array(width * height * 4)

	const origin = image.header.imageDescriptor & ORIGIN_MASK
	const flipY = origin === ORIGIN_TOP_LEFT || origin === ORIGIN_TOP_RIGHT
	const flipX = origin === ORIGIN_TOP_RIGHT || origin === ORIGIN_BOTTOM_RIGHT

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const srcY = flipY ? y : height - 1 - y
			const srcX = flipX ? width - 1 - x : x
			const srcIdx = (srcY * width + srcX) * TGA_BYTES_PER_PIXEL
			const dstIdx = (y * width + x) * 4

			output[dstIdx] = pixelData[srcIdx + 2] // R
			output[dstIdx + 1] = pixelData[srcIdx + 1] // G
			output[dstIdx + 2] = pixelData[srcIdx] // B
			output[dstIdx + 3] = 255
		}
	}

	return { width, height, data: output }
}

function isDimension(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= MAX_DIMENSION
}

/**
 * Build an uncompressed, top-left origin image from RGBA. Alpha is dropped.
 */
export function fromImageData(image: ImageData): RawTgaImage {
	const { width, height, data } = image

	if (!isDimension(width) || !isDimension(height)) {
		throw new Error('Invalid TGA dimensions')
	}
	if (data.length !== width * height * 4) {
		throw new Error('Invalid image data length')
	}

	const pixelData = new Uint8Array(width * height * TGA_BYTES_PER_PIXEL)
	for (let i = 0, j = 0; i < data.length; i += 4, j += TGA_BYTES_PER_PIXEL) {
		pixelData[j] = data[i + 2] // B
		pixelData[j + 1] = data[i + 1] // G
		pixelData[j + 2] = data[i] // R
	}

	const header = {
		idLength: 0,
		colorMapType: 0,
		imageType: TgaImageType.TrueColor,
		colorMapOrigin: 0,
		colorMapLength: 0,
		colorMapDepth: 0,
		xOrigin: 0,
		yOrigin: 0,
		width,
		height,
		pixelDepth: TGA_PIXEL_DEPTH,
		imageDescriptor: ORIGIN_TOP_LEFT,
	}

	return new RawTgaImage(header, new Uint8Array(0), new Uint8Array(0), pixelData, new Uint8Array(0))
}
