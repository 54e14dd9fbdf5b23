import { readSync } from 'node:fs'

/**
 * Incremental, synchronous byte source
 *
 * `read` copies up to `target.length` bytes into `target` and returns how many
 * it wrote. Returning 0 signals end of input; a failed read throws.
 */
export interface ByteSource {
	read(target: Uint8Array): number
}

const DEFAULT_CHUNK_SIZE = 64 * 1024

/**
 * Serve an in-memory buffer in chunks of at most `chunkSize` bytes
 */
export function bufferSource(data: Uint8Array, chunkSize = DEFAULT_CHUNK_SIZE): ByteSource {
	if (!Number.isInteger(chunkSize) || chunkSize < 1) {
		throw new RangeError(`Invalid chunk size: ${chunkSize}`)
	}

	let offset = 0

	return {
		read(target: Uint8Array): number {
			const count = Math.min(target.length, chunkSize, data.length - offset)
			if (count <= 0) return 0

			target.set(data.subarray(offset, offset + count))
			offset += count
			return count
		},
	}
}

/**
 * Read sequentially from an already open file descriptor
 */
export function fileSource(fd: number, chunkSize = DEFAULT_CHUNK_SIZE): ByteSource {
	if (!Number.isInteger(chunkSize) || chunkSize < 1) {
		throw new RangeError(`Invalid chunk size: ${chunkSize}`)
	}

	return {
		read(target: Uint8Array): number {
			const length = Math.min(target.length, chunkSize)
			if (length === 0) return 0
			return readSync(fd, target, 0, length, null)
		},
	}
}

/**
 * Drain a source into a single buffer
 */
export function readAll(source: ByteSource, chunkSize = DEFAULT_CHUNK_SIZE): Uint8Array {
	const chunks: Uint8Array[] = []
	let total = 0

	for (;;) {
		const chunk = new Uint8Array(chunkSize)
		const count = source.read(chunk)
		if (count === 0) break
		chunks.push(chunk.subarray(0, count))
		total += count
	}

	return concatBytes(chunks, total)
}

/**
 * Concatenate byte chunks
 */
export function concatBytes(chunks: readonly Uint8Array[], total?: number): Uint8Array {
	const length = total ?? chunks.reduce((sum, chunk) => sum + chunk.length, 0)
	const output = new Uint8Array(length)
	let offset = 0
	for (const chunk of chunks) {
		output.set(chunk, offset)
		offset += chunk.length
	}
	return output
}
