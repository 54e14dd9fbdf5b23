/**
 * Incremental TGA serializer
 *
 * Pulls bytes out of an ordered list of sections (header, image ID, color map,
 * pixel data, extended identification, footer) into caller-sized buffers.
 * The sections are read, never modified.
 */
export class TgaWriter {
	private sectionIndex = 0
	private offset = 0
	readonly byteLength: number

	constructor(private readonly sections: readonly Uint8Array[]) {
		this.byteLength = sections.reduce((sum, section) => sum + section.length, 0)
	}

	/** True once every byte has been produced */
	get done(): boolean {
		return this.sectionIndex >= this.sections.length
	}

	/**
	 * Fill as much of `target` as possible and return the number of bytes written.
	 * Returns 0 once the output is exhausted.
	 */
	read(target: Uint8Array): number {
		let written = 0

		while (written < target.length && this.sectionIndex < this.sections.length) {
			const section = this.sections[this.sectionIndex]
			const count = Math.min(section.length - this.offset, target.length - written)

			target.set(section.subarray(this.offset, this.offset + count), written)
			written += count
			this.offset += count

			if (this.offset === section.length) {
				this.sectionIndex++
				this.offset = 0
			}
		}

		return written
	}
}
