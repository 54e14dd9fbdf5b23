import { TGA_FOOTER_LENGTH, TGA_FOOTER_SIGNATURE } from './types'

/**
 * Canonical footer: zero extension and developer offsets, signature, NUL
 */
export const TGA_FOOTER: Uint8Array = (() => {
	const footer = new Uint8Array(TGA_FOOTER_LENGTH)
	for (let i = 0; i < TGA_FOOTER_SIGNATURE.length; i++) {
		footer[8 + i] = TGA_FOOTER_SIGNATURE.charCodeAt(i)
	}
	return footer
})()

/**
 * Split the footer off the bytes that follow the image data
 *
 * Only an exact match of the canonical footer is removed. Anything else,
 * including a TGA 2.0 footer pointing at extension areas, stays in the
 * extended identification.
 */
export function stripFooter(trailing: Uint8Array): Uint8Array {
	if (trailing.length < TGA_FOOTER_LENGTH) return trailing

	const start = trailing.length - TGA_FOOTER_LENGTH
	if (matchesFrom(trailing, start, 0)) {
		return trailing.slice(0, start)
	}

	if (matchesFrom(trailing, start + 8, 8)) {
		console.warn('TGA 2.0 footer with extension offsets kept in extended identification')
	}
	return trailing
}

function matchesFrom(data: Uint8Array, offset: number, footerOffset: number): boolean {
	for (let i = footerOffset; i < TGA_FOOTER_LENGTH; i++) {
		if (data[offset + i - footerOffset] !== TGA_FOOTER[i]) return false
	}
	return true
}
