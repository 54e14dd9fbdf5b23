import { closeSync, mkdtempSync, openSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { bufferSource, fileSource } from '@truecolor/codec-core'
import { afterEach, describe, expect, test, vi } from 'vitest'
import { decodeTga } from './decoder'
import { CorruptTgaError, IncompleteTgaError, TgaError, UnsupportedTgaError } from './errors'
import { buildTga, catchError, failingSource, patternPixels, uniformPixels } from './testing'
import { TgaImageType } from './types'

describe('TGA decoder', () => {
	// 2x2 image with a 3-byte ID and a two-entry 24-bit color map
	const parts = {
		header: { width: 2, height: 2, colorMapType: 1, colorMapLength: 2, colorMapDepth: 24 },
		identification: new Uint8Array([1, 2, 3]),
		colorMap: new Uint8Array([10, 11, 12, 13, 14, 15]),
		pixels: patternPixels(2, 2),
		trailing: new Uint8Array([9, 9]),
	}
	const uncompressed = buildTga(parts)
	const runLength = buildTga({ ...parts, header: { ...parts.header, imageType: TgaImageType.TrueColorRLE } })

	afterEach(() => {
		vi.restoreAllMocks()
	})

	describe('uncompressed', () => {
		test('decodes a 256x256 image', () => {
			const file = buildTga({ header: { width: 256, height: 256 }, pixels: patternPixels(256, 256) })
			const image = decodeTga(file)

			expect(image.imageType).toBe(TgaImageType.TrueColor)
			expect(image.raw.width).toBe(256)
			expect(image.raw.height).toBe(256)
			expect(image.raw.pixelDepth).toBe(24)
			expect(image.raw.colorMapType).toBe(0)
			expect(image.raw.imageType).toBe(2)
			expect(image.raw.imageDataLength()).toBe(65536)
			expect(image.raw.pixels().length).toBe(65536)
		})

		test('decodes a 1x1 image', () => {
			const image = decodeTga(buildTga({ pixels: new Uint8Array([64, 128, 255]) }))

			expect(image.raw.imageDataLength()).toBe(1)
			expect(Array.from(image.raw.imageData())).toEqual([64, 128, 255])
		})

		test('decodes a uniform 640x480 image', () => {
			const file = buildTga({ header: { width: 640, height: 480 }, pixels: uniformPixels(640, 480, [10, 20, 30]) })
			const { raw } = decodeTga(file)

			let count = 0
			let mismatches = 0
			for (const [b, g, r] of raw.pixels()) {
				count++
				if (b !== 10 || g !== 20 || r !== 30) mismatches++
			}
			expect(count).toBe(640 * 480)
			expect(mismatches).toBe(0)
		})

		test('splits the file into its sections', () => {
			const { raw } = decodeTga(uncompressed)

			expect(Array.from(raw.imageIdentification())).toEqual([1, 2, 3])
			expect(Array.from(raw.colorMapData())).toEqual([10, 11, 12, 13, 14, 15])
			expect(raw.imageData()).toEqual(patternPixels(2, 2))
			expect(Array.from(raw.extendedImageIdentification())).toEqual([9, 9])
		})

		test('empty ID and color map are not errors', () => {
			const { raw } = decodeTga(buildTga({ header: { width: 2, height: 1 } }))

			expect(raw.imageIdentification().length).toBe(0)
			expect(raw.colorMapData().length).toBe(0)
			expect(raw.extendedImageIdentification().length).toBe(0)
		})

		test('accepts a zero-area image', () => {
			const { raw } = decodeTga(buildTga({ header: { width: 0, height: 5 }, trailing: new Uint8Array([4]) }))

			expect(raw.imageDataLength()).toBe(0)
			expect(Array.from(raw.extendedImageIdentification())).toEqual([4])
		})

		test('accepts a Node Buffer', () => {
			expect(decodeTga(Buffer.from(uncompressed)).raw.equals(decodeTga(uncompressed).raw)).toBe(true)
		})
	})

	describe('footer', () => {
		test('strips the footer from the extended identification', () => {
			const { raw } = decodeTga(buildTga({ ...parts, footer: true }))
			expect(Array.from(raw.extendedImageIdentification())).toEqual([9, 9])
		})

		test('strips a footer that is the whole trailing region', () => {
			const { raw } = decodeTga(buildTga({ pixels: new Uint8Array([1, 2, 3]), footer: true }))
			expect(raw.extendedImageIdentification().length).toBe(0)
		})

		test('keeps a TGA 2.0 footer that points at an extension area', () => {
			const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
			const footer = buildTga({ footer: true }).slice(-26)
			footer[0] = 100 // extension area offset
			const { raw } = decodeTga(buildTga({ trailing: footer }))

			expect(Array.from(raw.extendedImageIdentification())).toEqual(Array.from(footer))
			expect(warn).toHaveBeenCalledTimes(1)
			expect(warn).toHaveBeenCalledWith('TGA 2.0 footer with extension offsets kept in extended identification')
		})

		test('keeps trailing bytes that only partly match', () => {
			const trailing = buildTga({ footer: true }).slice(-26)
			trailing[25] = 0x21
			const { raw } = decodeTga(buildTga({ trailing }))

			expect(raw.extendedImageIdentification().length).toBe(26)
		})
	})

	describe('unsupported formats', () => {
		test.each([0, 1, 3, 9, 11, 32])('rejects image type %i', (imageType) => {
			const error = catchError(() => decodeTga(buildTga({ header: { imageType } })))

			expect(error).toBeInstanceOf(UnsupportedTgaError)
			expect(error).toMatchObject({ kind: 'UnsupportedFormat', property: 'imageType', value: imageType })
		})

		test.each([
			[TgaImageType.TrueColor, 32],
			[TgaImageType.TrueColor, 16],
			[TgaImageType.TrueColorRLE, 32],
			[TgaImageType.TrueColorRLE, 8],
		])('rejects image type %i at %i bits', (imageType, pixelDepth) => {
			const file = buildTga({ header: { imageType, pixelDepth }, packets: new Uint8Array(4) })
			const error = catchError(() => decodeTga(file))

			expect(error).toMatchObject({
				kind: 'UnsupportedFormat',
				property: 'pixelDepth',
				value: pixelDepth,
				message: `Unsupported TGA pixel depth: ${pixelDepth} bits`,
			})
		})
	})

	describe('truncated input', () => {
		test('reports which section ran out', () => {
			expect(catchError(() => decodeTga(uncompressed.subarray(0, 10)))).toMatchObject({
				kind: 'IncompleteHeader',
				have: 10,
				need: 18,
			})
			expect(catchError(() => decodeTga(uncompressed.subarray(0, 20)))).toMatchObject({
				kind: 'IncompleteIdString',
				have: 2,
				need: 3,
			})
			expect(catchError(() => decodeTga(uncompressed.subarray(0, 25)))).toMatchObject({
				kind: 'IncompleteColorMap',
				have: 4,
				need: 6,
			})
			expect(catchError(() => decodeTga(uncompressed.subarray(0, 30)))).toMatchObject({
				kind: 'IncompleteImageData',
				have: 3,
				need: 12,
			})
		})

		test('formats the counts into the message', () => {
			const error = catchError(() => decodeTga(uncompressed.subarray(0, 30)))
			expect(error).toBeInstanceOf(IncompleteTgaError)
			expect(error).toMatchObject({ message: 'Invalid TGA: incomplete image data (have 3, need 12)' })
		})

		test.each([
			['uncompressed', uncompressed, 39],
			['run-length', runLength, 40],
		])('%s: every cut before the end of image data is incomplete', (_name, file, end) => {
			for (let cut = 0; cut < end; cut++) {
				for (const input of [file.subarray(0, cut), bufferSource(file.subarray(0, cut), 3)]) {
					const error = catchError(() => decodeTga(input))
					expect(error).toBeInstanceOf(IncompleteTgaError)
				}
			}
			expect(decodeTga(file.subarray(0, end)).raw.extendedImageIdentification().length).toBe(0)
		})
	})

	describe('source failures', () => {
		test.each([
			[10, 'CorruptHeader'],
			[19, 'CorruptIdString'],
			[24, 'CorruptColorMap'],
			[30, 'CorruptImageData'],
			[39, 'CorruptExtension'],
		])('a read failing after %i bytes is %s', (failAt, kind) => {
			const cause = new Error('disk read failed')
			const error = catchError(() => decodeTga(failingSource(uncompressed, failAt, cause)))

			expect(error).toBeInstanceOf(CorruptTgaError)
			expect(error).toMatchObject({ kind, cause })
		})

		test('a source reporting an impossible count is corrupt', () => {
			const error = catchError(() => decodeTga({ read: () => -1 }))

			expect(error).toBeInstanceOf(TgaError)
			expect(error).toMatchObject({ kind: 'CorruptHeader', cause: expect.any(RangeError) })
		})
	})

	describe('input modes', () => {
		test.each([1, 2, 5, 18, 64, 100000])('chunks of %i bytes decode like the whole buffer', (chunkSize) => {
			for (const file of [uncompressed, runLength, buildTga({ ...parts, footer: true })]) {
				const whole = decodeTga(file)
				const chunked = decodeTga(bufferSource(file, chunkSize))

				expect(chunked).toEqual(whole)
				expect(chunked.raw.equals(whole.raw)).toBe(true)
			}
		})

		test('decodes from an open file', () => {
			const file = buildTga({
				header: { width: 50, height: 40, imageType: TgaImageType.TrueColorRLE },
				identification: new Uint8Array([5, 6]),
				pixels: patternPixels(50, 40),
				footer: true,
			})
			const dir = mkdtempSync(join(tmpdir(), 'codecs-tga-'))
			const path = join(dir, 'image.tga')
			writeFileSync(path, file)

			const fd = openSync(path, 'r')
			try {
				const decoded = decodeTga(fileSource(fd, 1000))
				expect(decoded).toEqual(decodeTga(file))
				expect(decoded.raw.imageData()).toEqual(patternPixels(50, 40))
			} finally {
				closeSync(fd)
				rmSync(dir, { recursive: true, force: true })
			}
		})

		test('reads ahead instead of once per run-length packet', () => {
			// Pairs of equal pixels: 32 run packets
			const pixels = new Uint8Array(64 * 3).map((_, i) => Math.floor(i / 6))
			const file = buildTga({ header: { width: 64, height: 1, imageType: TgaImageType.TrueColorRLE }, pixels })
			const source = bufferSource(file)
			const read = vi.spyOn(source, 'read')

			expect(decodeTga(source).raw.imageData()).toEqual(pixels)
			// One read for the whole file, one to see the end of input
			expect(read).toHaveBeenCalledTimes(2)
		})
	})
})
