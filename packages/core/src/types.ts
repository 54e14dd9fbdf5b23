/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Supported image formats
 */
export type ImageFormat = 'tga'

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T> {
	readonly format: ImageFormat
	decode(data: Uint8Array): T
	encode(input: T, options?: EncodeOptions): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec = Codec<ImageData>

/**
 * Encode options
 */
export interface EncodeOptions {
	compression?: 'none' | 'rle' // lossless formats only
}

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): [number, number, number, number] {
	const idx = (y * image.width + x) * 4
	return [image.data[idx], image.data[idx + 1], image.data[idx + 2], image.data[idx + 3]]
}
