import { type ByteSource, concatBytes } from '@truecolor/codec-core'
import { TGA_FOOTER } from './footer'
import { writeTgaHeader } from './header'
import { compressRunLength } from './rle'
import { ORIGIN_BOTTOM_LEFT, TGA_PIXEL_DEPTH, type TgaHeader, TgaImageType } from './types'

/**
 * Builders for hand-made TGA files used by the tests
 */

export function makeHeader(fields: Partial<TgaHeader> = {}): TgaHeader {
	return {
		idLength: 0,
		colorMapType: 0,
		imageType: TgaImageType.TrueColor,
		colorMapOrigin: 0,
		colorMapLength: 0,
		colorMapDepth: 0,
		xOrigin: 0,
		yOrigin: 0,
		width: 1,
		height: 1,
		pixelDepth: TGA_PIXEL_DEPTH,
		imageDescriptor: ORIGIN_BOTTOM_LEFT,
		...fields,
	}
}

export interface TgaFileParts {
	header?: Partial<TgaHeader>
	identification?: Uint8Array
	colorMap?: Uint8Array
	/** Uncompressed pixels; packed as RLE when the header says type 10 and `packets` is absent */
	pixels?: Uint8Array
	/** Literal image data bytes, used as-is */
	packets?: Uint8Array
	trailing?: Uint8Array
	footer?: boolean
}

export function buildTga(parts: TgaFileParts = {}): Uint8Array {
	const identification = parts.identification ?? new Uint8Array(0)
	const header = makeHeader({ idLength: identification.length, ...parts.header })
	const pixels = parts.pixels ?? new Uint8Array(header.width * header.height * 3)
	const imageData =
		parts.packets ?? (header.imageType === TgaImageType.TrueColorRLE ? compressRunLength(pixels) : pixels)

	return concatBytes([
		writeTgaHeader(header),
		identification,
		parts.colorMap ?? new Uint8Array(0),
		imageData,
		parts.trailing ?? new Uint8Array(0),
		parts.footer ? TGA_FOOTER : new Uint8Array(0),
	])
}

/** Distinct, repeatable pixel bytes */
export function patternPixels(width: number, height: number): Uint8Array {
	return new Uint8Array(width * height * 3).map((_, i) => (i * 31 + 7) % 256)
}

export function uniformPixels(width: number, height: number, bgr: readonly [number, number, number]): Uint8Array {
	const out = new Uint8Array(width * height * 3)
	for (let i = 0; i < out.length; i += 3) {
		out.set(bgr, i)
	}
	return out
}

/**
 * Serves `data` in chunks and throws once `failAt` bytes have been delivered
 */
export function failingSource(data: Uint8Array, failAt: number, error = new Error('disk read failed')): ByteSource {
	let offset = 0
	return {
		read(target: Uint8Array): number {
			if (offset >= failAt) throw error
			const count = Math.min(target.length, failAt - offset, data.length - offset)
			target.set(data.subarray(offset, offset + count))
			offset += count
			return count
		},
	}
}

/**
 * Run `fn` and return what it threw
 */
export function catchError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (e) {
		return e
	}
	throw new Error('Expected function to throw')
}
