import { type ByteSource, concatBytes } from '@truecolor/codec-core'
import { CorruptTgaError, IncompleteTgaError, type TgaField, type TgaSizedField } from './errors'
import { stripFooter } from './footer'
import { colorMapSize } from './header'
import type { TgaHeader } from './types'

const CHUNK_SIZE = 64 * 1024

/**
 * Sequential reader over a TGA byte stream
 *
 * Returned arrays are always owned copies, never views of the input.
 */
export interface FieldReader {
	/** Read up to `length` bytes; fewer only at end of input */
	take(field: TgaField, length: number): Uint8Array
	/** Read everything left in the input */
	rest(field: TgaField): Uint8Array
}

/**
 * Reader over a whole in-memory file
 */
export class BufferFieldReader implements FieldReader {
	private offset = 0

	constructor(private readonly data: Uint8Array) {}

	take(_field: TgaField, length: number): Uint8Array {
		const bytes = this.data.slice(this.offset, this.offset + length)
		this.offset += bytes.length
		return bytes
	}

	rest(_field: TgaField): Uint8Array {
		const bytes = this.data.slice(this.offset)
		this.offset = this.data.length
		return bytes
	}
}

/**
 * Reader over an incremental source
 *
 * Reads ahead in chunks, so small fields such as run-length packet headers do
 * not cost one source read each. The source is only read when the field in
 * progress needs bytes past the buffered ones, and a throwing `read` becomes a
 * CorruptTgaError for that field.
 */
export class SourceFieldReader implements FieldReader {
	private readonly chunk = new Uint8Array(CHUNK_SIZE)
	private buffered = new Uint8Array(0)
	private position = 0
	private ended = false

	constructor(private readonly source: ByteSource) {}

	take(field: TgaField, length: number): Uint8Array {
		const chunks: Uint8Array[] = []
		let total = 0

		while (total < length) {
			if (this.position === this.buffered.length && !this.fill(field)) break

			const count = Math.min(length - total, this.buffered.length - this.position)
			chunks.push(this.buffered.slice(this.position, this.position + count))
			this.position += count
			total += count
		}

		return chunks.length === 1 ? chunks[0] : concatBytes(chunks, total)
	}

	rest(field: TgaField): Uint8Array {
		const chunks = [this.buffered.slice(this.position)]
		this.position = this.buffered.length

		while (this.fill(field)) {
			chunks.push(this.buffered.slice())
			this.position = this.buffered.length
		}

		return concatBytes(chunks)
	}

	/** Replace the consumed buffer with the next chunk; false at end of input */
	private fill(field: TgaField): boolean {
		if (this.ended) return false

		const count = this.readChunk(field, this.chunk)
		if (count === 0) {
			this.ended = true
			return false
		}
		this.buffered = this.chunk.subarray(0, count)
		this.position = 0
		return true
	}

	private readChunk(field: TgaField, chunk: Uint8Array): number {
		let count: number
		try {
			count = this.source.read(chunk)
		} catch (e) {
			throw new CorruptTgaError(field, e)
		}
		if (!Number.isInteger(count) || count < 0 || count > chunk.length) {
			throw new CorruptTgaError(field, new RangeError(`Byte source returned invalid count: ${count}`))
		}
		return count
	}
}

/**
 * Read exactly `length` bytes or fail with the bytes actually available
 */
export function readField(reader: FieldReader, field: TgaSizedField, length: number): Uint8Array {
	const bytes = reader.take(field, length)
	if (bytes.length < length) {
		throw new IncompleteTgaError(field, bytes.length, length)
	}
	return bytes
}

export function createFieldReader(input: Uint8Array | ByteSource): FieldReader {
	return input instanceof Uint8Array ? new BufferFieldReader(input) : new SourceFieldReader(input)
}

/**
 * Image ID and color map, which precede the image data in both encodings
 */
export function readLeadingFields(
	reader: FieldReader,
	header: TgaHeader
): { identification: Uint8Array; colorMap: Uint8Array } {
	const identification = readField(reader, 'idString', header.idLength)
	const colorMap = readField(reader, 'colorMap', colorMapSize(header))
	return { identification, colorMap }
}

/**
 * Everything after the image data, minus a canonical footer
 */
export function readExtendedIdentification(reader: FieldReader): Uint8Array {
	return stripFooter(reader.rest('extension'))
}
