/**
 * TGA decode failures
 *
 * Every failure is terminal for the decode call. `kind` names the failure
 * and the stage it happened in, so callers can branch without instanceof.
 */

/** Section of the file being read when a failure occurred */
export type TgaField = 'header' | 'idString' | 'colorMap' | 'imageData' | 'extension'

/** Sections with a size declared up front; only these can end early */
export type TgaSizedField = Exclude<TgaField, 'extension'>

export type TgaErrorKind =
	| 'IncompleteHeader'
	| 'IncompleteIdString'
	| 'IncompleteColorMap'
	| 'IncompleteImageData'
	| 'CorruptHeader'
	| 'CorruptIdString'
	| 'CorruptColorMap'
	| 'CorruptImageData'
	| 'CorruptExtension'
	| 'UnsupportedFormat'
	| 'PacketOverrun'

const INCOMPLETE_KINDS: Record<TgaSizedField, TgaErrorKind> = {
	header: 'IncompleteHeader',
	idString: 'IncompleteIdString',
	colorMap: 'IncompleteColorMap',
	imageData: 'IncompleteImageData',
}

const CORRUPT_KINDS: Record<TgaField, TgaErrorKind> = {
	header: 'CorruptHeader',
	idString: 'CorruptIdString',
	colorMap: 'CorruptColorMap',
	imageData: 'CorruptImageData',
	extension: 'CorruptExtension',
}

const FIELD_LABELS: Record<TgaField, string> = {
	header: 'header',
	idString: 'image ID',
	colorMap: 'color map',
	imageData: 'image data',
	extension: 'extended identification',
}

/**
 * Base class of every TGA decode failure
 */
export class TgaError extends Error {
	override name = 'TgaError'

	constructor(
		readonly kind: TgaErrorKind,
		message: string,
		options?: ErrorOptions
	) {
		super(message, options)
	}
}

/**
 * Input ended before a declared-size field was fully read
 */
export class IncompleteTgaError extends TgaError {
	override name = 'IncompleteTgaError'

	constructor(
		readonly field: TgaSizedField,
		readonly have: number,
		readonly need: number
	) {
		super(INCOMPLETE_KINDS[field], `Invalid TGA: incomplete ${FIELD_LABELS[field]} (have ${have}, need ${need})`)
	}
}

/**
 * The byte source failed while a field was being read
 */
export class CorruptTgaError extends TgaError {
	override name = 'CorruptTgaError'

	constructor(
		readonly field: TgaField,
		cause: unknown
	) {
		const detail = cause instanceof Error ? `: ${cause.message}` : ''
		super(CORRUPT_KINDS[field], `Invalid TGA: failed to read ${FIELD_LABELS[field]}${detail}`, { cause })
	}
}

/**
 * Image type or pixel depth outside 24-bit unmapped RGB
 */
export class UnsupportedTgaError extends TgaError {
	override name = 'UnsupportedTgaError'

	constructor(
		readonly property: 'imageType' | 'pixelDepth',
		readonly value: number
	) {
		super(
			'UnsupportedFormat',
			property === 'imageType'
				? `Unsupported TGA image type: ${value}`
				: `Unsupported TGA pixel depth: ${value} bits`
		)
	}
}

/**
 * A run-length packet expands past the size declared in the header
 */
export class PacketOverrunError extends TgaError {
	override name = 'PacketOverrunError'

	constructor(
		readonly have: number,
		readonly need: number
	) {
		super('PacketOverrun', `Invalid TGA: RLE packet overruns image data (reaches ${have}, need ${need})`)
	}
}
