// src/config/index.ts

import type { BitsPerChannel } from '../@types';
import { SupportedObfuscationStrategies } from '../utils/cryptography/obfuscationStrategies';

/** Size of the frame header: payload length (u32) followed by its CRC32 (u32). */
export const FRAME_HEADER_BYTES = 8;

export const SUPPORTED_BITS_PER_CHANNEL: readonly BitsPerChannel[] = [1, 2, 3, 4];

export const config = {
    imageCompression: {
        compressionLevel: 7,
        adaptiveFiltering: false,
        idatChunkSize: 65536, // Maximum payload of a single IDAT chunk
    },
    embedding: {
        bitsPerChannel: 1,
        useAlphaChannel: false,
        obfuscationScheme: SupportedObfuscationStrategies.RepeatingKeyXor,
    },
    coverImage: {
        width: 256,
        height: 256,
        noiseMean: 128,
        noiseSigma: 48,
    },
    defaultOutputFile: 'output.png',
};
