export { TgaCodec } from './codec'
export { fromImageData, toImageData } from './convert'
export { decodeTga, decodeUncompressed, type RunLengthTga, type TgaImage, type UncompressedTga } from './decoder'
export { encodeTga } from './encoder'
export {
	CorruptTgaError,
	IncompleteTgaError,
	PacketOverrunError,
	TgaError,
	type TgaErrorKind,
	type TgaField,
	type TgaSizedField,
	UnsupportedTgaError,
} from './errors'
export { stripFooter, TGA_FOOTER } from './footer'
export {
	bytesPerPixel,
	colorMapSize,
	imageDataSize,
	readTgaHeader,
	TGA_HEADER_FIELDS,
	writeTgaHeader,
} from './header'
export { RawTgaImage } from './image'
export { BufferFieldReader, createFieldReader, type FieldReader, SourceFieldReader } from './reader'
export { compressRunLength, decodeRunLength, expandPackets, scanPackets } from './rle'
export { PixelSequence, ScanlineSequence } from './sequence'
export * from './types'
export { TgaWriter } from './writer'
