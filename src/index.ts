// src/index.ts

export type * from './@types';
export { FRAME_HEADER_BYTES, config } from './config';
export * from './core/errors';
export { createPixelPlane, decodePixelPlane, encodePixelPlane, PIXEL_FORMATS } from './core/pixelPlane';
export { capacity, countEligibleSamples, ensureFits, rawCapacity } from './core/capacity';
export { frame, readFrameHeader, unframe } from './core/framing';
export {
    eligibleSampleIndices,
    embed,
    embedPlane,
    extract,
    extractPlane,
    inspectCapacity,
    resolveEmbedConfig,
    unwrapResult,
} from './core/engine';
export { embedFile } from './core/encoder';
export { extractFile } from './core/decoder';
export { SupportedObfuscationStrategies } from './utils/cryptography/obfuscationStrategies';
export { generateCoverImage } from './utils/imageProcessing/coverImage';
