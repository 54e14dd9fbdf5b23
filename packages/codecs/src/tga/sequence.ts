import { TGA_BYTES_PER_PIXEL, type TgaPixel } from './types'

/**
 * Pixels in storage order
 *
 * Rows are not reordered: most files store the bottom row first, and the
 * sequence reflects that literally. Every iteration starts from the first pixel.
 */
export class PixelSequence implements Iterable<TgaPixel> {
	constructor(private readonly data: Uint8Array) {}

	get length(): number {
		return Math.floor(this.data.length / TGA_BYTES_PER_PIXEL)
	}

	*[Symbol.iterator](): Iterator<TgaPixel> {
		const { data } = this
		const end = this.length * TGA_BYTES_PER_PIXEL
		for (let i = 0; i < end; i += TGA_BYTES_PER_PIXEL) {
			yield [data[i], data[i + 1], data[i + 2]]
		}
	}
}

/**
 * Rows of `width` pixels, `height` rows, in storage order
 */
export class ScanlineSequence implements Iterable<TgaPixel[]> {
	constructor(
		private readonly data: Uint8Array,
		private readonly width: number,
		private readonly height: number
	) {}

	get length(): number {
		return this.height
	}

	*[Symbol.iterator](): Iterator<TgaPixel[]> {
		const { data, width } = this
		const stride = width * TGA_BYTES_PER_PIXEL

		for (let y = 0; y < this.height; y++) {
			const row: TgaPixel[] = new Array(width)
			const start = y * stride
			for (let x = 0; x < width; x++) {
				const i = start + x * TGA_BYTES_PER_PIXEL
				row[x] = [data[i], data[i + 1], data[i + 2]]
			}
			yield row
		}
	}
}
