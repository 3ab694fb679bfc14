// src/core/pixelPlane/pngChunks.ts

import type { IPngChunk } from '../../@types';
import { CorruptImageError } from '../errors';
import { crc32, updateCrc32 } from '../../utils/checksum/crc32';
import { concatUint8Arrays, deserializeUInt32, writeUInt32 } from '../../utils/serialization/serializationHelpers';

export const PNG_SIGNATURE = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const MAX_CHUNK_LENGTH = 0x7fffffff;
const CHUNK_TYPE_PATTERN = /^[A-Za-z]{4}$/;

/**
 * Critical chunks have an upper-case first letter; decoders must understand them.
 */
export function isCriticalChunk(type: string): boolean {
    return type.charCodeAt(0) < 0x61;
}

export function hasPngSignature(bytes: Uint8Array): boolean {
    return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((value, index) => bytes[index] === value);
}

/**
 * Splits a PNG file into its chunks, verifying every length and CRC. Stops at IEND;
 * anything after it is ignored.
 *
 * @throws CorruptImageError on a bad signature, truncated chunk, CRC mismatch or missing IEND
 */
export function readPngChunks(bytes: Uint8Array): IPngChunk[] {
    if (!hasPngSignature(bytes)) {
        throw new CorruptImageError('Not a PNG file: signature mismatch');
    }

    const chunks: IPngChunk[] = [];
    let offset = PNG_SIGNATURE.length;

    while (offset < bytes.length) {
        if (offset + 8 > bytes.length) {
            throw new CorruptImageError(`Truncated chunk header at offset ${offset}`);
        }
        const { value: length } = deserializeUInt32(bytes, offset);
        const type = String.fromCharCode(...bytes.subarray(offset + 4, offset + 8));
        if (!CHUNK_TYPE_PATTERN.test(type)) {
            throw new CorruptImageError(`Invalid chunk type at offset ${offset}`);
        }
        if (length > MAX_CHUNK_LENGTH) {
            throw new CorruptImageError(`Chunk ${type} declares an invalid length of ${length} bytes`);
        }

        const dataStart = offset + 8;
        const dataEnd = dataStart + length;
        if (dataEnd + 4 > bytes.length) {
            throw new CorruptImageError(`Chunk ${type} at offset ${offset} is truncated`);
        }

        const { value: expectedCrc } = deserializeUInt32(bytes, dataEnd);
        const actualCrc = crc32(bytes.subarray(offset + 4, dataEnd));
        if (expectedCrc !== actualCrc) {
            throw new CorruptImageError(`CRC mismatch in chunk ${type}`);
        }

        chunks.push({ type, data: bytes.slice(dataStart, dataEnd) });
        offset = dataEnd + 4;

        if (type === 'IEND') {
            return chunks;
        }
    }

    throw new CorruptImageError('Missing IEND chunk');
}

/**
 * Serializes one chunk: length, type, data and the CRC over type and data.
 */
export function writePngChunk(chunk: IPngChunk): Uint8Array {
    const typeBytes = Uint8Array.from(chunk.type, (char) => char.charCodeAt(0));
    const out = new Uint8Array(12 + chunk.data.length);
    writeUInt32(out, 0, chunk.data.length);
    out.set(typeBytes, 4);
    out.set(chunk.data, 8);
    writeUInt32(out, 8 + chunk.data.length, updateCrc32(crc32(typeBytes), chunk.data));
    return out;
}

/**
 * Serializes a whole PNG file from an ordered chunk list.
 */
export function writePngChunks(chunks: readonly IPngChunk[]): Uint8Array {
    return concatUint8Arrays([PNG_SIGNATURE, ...chunks.map(writePngChunk)]);
}
