export { bufferSource, type ByteSource, concatBytes, fileSource, readAll } from './source'
export {
	type Codec,
	createImageData,
	type EncodeOptions,
	getPixel,
	type ImageCodec,
	type ImageData,
	type ImageFormat,
} from './types'
