// src/core/pixelPlane/index.ts

export { createPixelPlane, decodePixelPlane, encodePixelPlane, withSamples } from './pixelPlane';
export type { IEncodeImageOptions } from './pixelPlane';
export { PNG_SIGNATURE, readPngChunks, writePngChunk, writePngChunks } from './pngChunks';
export { PIXEL_FORMATS, hasAlphaChannel } from './pixelFormats';
