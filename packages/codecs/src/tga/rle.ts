import { concatBytes } from '@truecolor/codec-core'
import { IncompleteTgaError, PacketOverrunError } from './errors'
import { assertSupported, imageDataSize } from './header'
import { RawTgaImage } from './image'
import { type FieldReader, readExtendedIdentification, readLeadingFields } from './reader'
import { TGA_BYTES_PER_PIXEL, type TgaHeader, TgaImageType } from './types'

const MAX_PACKET_PIXELS = 128

/**
 * Decode a run-length encoded 24-bit image (type 10)
 */
export function decodeRunLength(reader: FieldReader, header: TgaHeader): RawTgaImage {
	assertSupported(header, TgaImageType.TrueColorRLE)

	const { identification, colorMap } = readLeadingFields(reader, header)
	const size = imageDataSize(header)
	const span = scanPackets(reader, size)
	const pixelData = expandPackets(span, size)
	const extendedIdentification = readExtendedIdentification(reader)

	return new RawTgaImage(header, identification, colorMap, pixelData, extendedIdentification)
}

/**
 * First pass: read whole packets until they expand to exactly `size` bytes
 *
 * Returns the packet bytes consumed. The reader is left on the first byte
 * after the last packet.
 */
export function scanPackets(reader: FieldReader, size: number): Uint8Array {
	const chunks: Uint8Array[] = []
	let spanLength = 0
	let produced = 0

	while (produced < size) {
		const head = reader.take('imageData', 1)
		if (head.length === 0) {
			throw new IncompleteTgaError('imageData', produced, size)
		}

		const packet = head[0]
		const count = (packet & 0x7f) + 1
		const payloadLength = packet & 0x80 ? TGA_BYTES_PER_PIXEL : count * TGA_BYTES_PER_PIXEL

		const payload = reader.take('imageData', payloadLength)
		if (payload.length < payloadLength) {
			throw new IncompleteTgaError('imageData', produced, size)
		}

		const reach = produced + count * TGA_BYTES_PER_PIXEL
		if (reach > size) {
			throw new PacketOverrunError(reach, size)
		}

		chunks.push(head, payload)
		spanLength += 1 + payloadLength
		produced = reach
	}

	return concatBytes(chunks, spanLength)
}

/**
 * Second pass: expand a packet span into `size` bytes of pixel data
 */
export function expandPackets(span: Uint8Array, size: number): Uint8Array {
	const output = new Uint8Array(size)
	let srcPos = 0
	let dstPos = 0

	while (dstPos < size) {
		if (srcPos >= span.length) {
			throw new IncompleteTgaError('imageData', dstPos, size)
		}

		const packet = span[srcPos++]
		const count = (packet & 0x7f) + 1
		const bytes = count * TGA_BYTES_PER_PIXEL

		if (dstPos + bytes > size) {
			throw new PacketOverrunError(dstPos + bytes, size)
		}

		if (packet & 0x80) {
			// RLE packet: repeat single pixel
			if (srcPos + TGA_BYTES_PER_PIXEL > span.length) {
				throw new IncompleteTgaError('imageData', dstPos, size)
			}
			const pixel = span.subarray(srcPos, srcPos + TGA_BYTES_PER_PIXEL)
			srcPos += TGA_BYTES_PER_PIXEL

			for (let i = 0; i < count; i++) {
				output.set(pixel, dstPos)
				dstPos += TGA_BYTES_PER_PIXEL
			}
		} else {
			// Raw packet: copy pixels directly
			if (srcPos + bytes > span.length) {
				throw new IncompleteTgaError('imageData', dstPos, size)
			}
			output.set(span.subarray(srcPos, srcPos + bytes), dstPos)
			srcPos += bytes
			dstPos += bytes
		}
	}

	return output
}

/**
 * Encode 24-bit pixel data as run-length packets
 */
export function compressRunLength(data: Uint8Array): Uint8Array {
	const output: number[] = []
	const numPixels = Math.floor(data.length / TGA_BYTES_PER_PIXEL)
	let pos = 0

	while (pos < numPixels) {
		const startOffset = pos * TGA_BYTES_PER_PIXEL

		// Check for run of identical pixels
		let runLength = 1
		while (
			runLength < MAX_PACKET_PIXELS &&
			pos + runLength < numPixels &&
			pixelsEqual(data, startOffset, (pos + runLength) * TGA_BYTES_PER_PIXEL)
		) {
			runLength++
		}

		if (runLength > 1) {
			output.push(0x80 | (runLength - 1))
			for (let i = 0; i < TGA_BYTES_PER_PIXEL; i++) {
				output.push(data[startOffset + i])
			}
			pos += runLength
			continue
		}

		// Raw packet: extend while neighbours differ
		let rawLength = 1
		while (
			rawLength < MAX_PACKET_PIXELS &&
			pos + rawLength < numPixels &&
			!pixelsEqual(data, (pos + rawLength - 1) * TGA_BYTES_PER_PIXEL, (pos + rawLength) * TGA_BYTES_PER_PIXEL)
		) {
			rawLength++
		}

		// Leave the last pixel for the next packet when it starts a run
		if (
			rawLength > 1 &&
			pos + rawLength < numPixels &&
			pixelsEqual(data, (pos + rawLength - 1) * TGA_BYTES_PER_PIXEL, (pos + rawLength) * TGA_BYTES_PER_PIXEL)
		) {
			rawLength--
		}

		output.push(rawLength - 1)
		for (let i = 0; i < rawLength * TGA_BYTES_PER_PIXEL; i++) {
			output.push(data[startOffset + i])
		}
		pos += rawLength
	}

	return new Uint8Array(output)
}

function pixelsEqual(data: Uint8Array, offset1: number, offset2: number): boolean {
	for (let i = 0; i < TGA_BYTES_PER_PIXEL; i++) {
		if (data[offset1 + i] !== data[offset2 + i]) return false
	}
	return true
}
