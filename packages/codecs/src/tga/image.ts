import { TGA_FOOTER } from './footer'
import { colorMapSize, TGA_HEADER_FIELDS, writeTgaHeader } from './header'
import { PixelSequence, ScanlineSequence } from './sequence'
import { TGA_BYTES_PER_PIXEL, type TgaHeader, TgaImageType } from './types'
import { TgaWriter } from './writer'

/**
 * Decoded 24-bit TGA image
 *
 * Holds frozen copies of the header and of the four byte buffers passed in.
 * Accessors return copies; sequences and writers created by the image read
 * the private buffers directly.
 */
export class RawTgaImage {
	readonly header: Readonly<TgaHeader>
	private readonly identification: Uint8Array
	private readonly colorMap: Uint8Array
	private readonly pixelData: Uint8Array
	private readonly extendedIdentification: Uint8Array

	constructor(
		header: TgaHeader,
		identification: Uint8Array,
		colorMap: Uint8Array,
		pixelData: Uint8Array,
		extendedIdentification: Uint8Array
	) {
		const expected = header.width * header.height * TGA_BYTES_PER_PIXEL
		if (pixelData.length !== expected) {
			throw new RangeError(`Pixel data holds ${pixelData.length} bytes, header declares ${expected}`)
		}
		if (identification.length !== header.idLength) {
			throw new RangeError(`Image ID holds ${identification.length} bytes, header declares ${header.idLength}`)
		}
		if (colorMap.length !== colorMapSize(header)) {
			throw new RangeError(`Color map holds ${colorMap.length} bytes, header declares ${colorMapSize(header)}`)
		}

		this.header = Object.freeze({ ...header })
		this.identification = identification.slice()
		this.colorMap = colorMap.slice()
		this.pixelData = pixelData.slice()
		this.extendedIdentification = extendedIdentification.slice()
	}

	get width(): number {
		return this.header.width
	}

	get height(): number {
		return this.header.height
	}

	get pixelDepth(): number {
		return this.header.pixelDepth
	}

	get colorMapType(): number {
		return this.header.colorMapType
	}

	get imageType(): number {
		return this.header.imageType
	}

	/** Number of pixels */
	imageDataLength(): number {
		return this.pixelData.length / TGA_BYTES_PER_PIXEL
	}

	imageDataLengthBytes(): number {
		return this.pixelData.length
	}

	imageIdentification(): Uint8Array {
		return this.identification.slice()
	}

	colorMapData(): Uint8Array {
		return this.colorMap.slice()
	}

	/** Pixel bytes as stored (blue, green, red per pixel) */
	imageData(): Uint8Array {
		return this.pixelData.slice()
	}

	extendedImageIdentification(): Uint8Array {
		return this.extendedIdentification.slice()
	}

	pixels(): PixelSequence {
		return new PixelSequence(this.pixelData)
	}

	scanlines(): ScanlineSequence {
		return new ScanlineSequence(this.pixelData, this.width, this.height)
	}

	/**
	 * Incremental writer producing the canonical uncompressed file:
	 * header (image type 2), image ID, color map, pixels, extended identification, footer
	 */
	writer(): TgaWriter {
		const header = writeTgaHeader({ ...this.header, imageType: TgaImageType.TrueColor })
		return new TgaWriter([
			header,
			this.identification,
			this.colorMap,
			this.pixelData,
			this.extendedIdentification,
			TGA_FOOTER,
		])
	}

	/**
	 * Structural equality: same header fields and byte-identical buffers
	 */
	equals(other: RawTgaImage): boolean {
		const headerEqual = TGA_HEADER_FIELDS.every((key) => this.header[key] === other.header[key])

		return (
			headerEqual &&
			bytesEqual(this.identification, other.identification) &&
			bytesEqual(this.colorMap, other.colorMap) &&
			bytesEqual(this.pixelData, other.pixelData) &&
			bytesEqual(this.extendedIdentification, other.extendedIdentification)
		)
	}
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false
	}
	return true
}
