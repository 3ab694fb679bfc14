// src/core/framing/bitFramer.ts

import type { IBitStream, IEmbedConfig, IFrame, IFrameHeader } from '../../@types';
import { FRAME_HEADER_BYTES } from '../../config';
import { ChecksumMismatchError, FrameError, TruncatedStreamError } from '../errors';
import { crc32 } from '../../utils/checksum/crc32';
import { applyObfuscation } from '../../utils/cryptography/obfuscation';
import { concatUint8Arrays, deserializeUInt32, serializeUInt32 } from '../../utils/serialization/serializationHelpers';

type FramingConfig = Pick<IEmbedConfig, 'obfuscationKey' | 'obfuscationScheme'>;

const MAX_PAYLOAD_LENGTH = 0xffffffff;

/**
 * Builds the frame for a payload. The checksum is taken over the plain payload, so a
 * wrong obfuscation key on the reading side shows up as a checksum mismatch.
 */
export function buildFrame(payload: Uint8Array, framingConfig: FramingConfig): IFrame {
    if (payload.length > MAX_PAYLOAD_LENGTH) {
        throw new FrameError(`Payload of ${payload.length} bytes exceeds the 32-bit length field`);
    }
    return {
        payloadLength: payload.length,
        checksum: crc32(payload),
        payload: applyObfuscation(payload, framingConfig.obfuscationKey, framingConfig.obfuscationScheme),
    };
}

/**
 * Serializes a payload into the embedded bit stream:
 *
 * ```
 * | payloadLength u32 BE | crc32 u32 BE | payload (obfuscated when keyed) |
 * ```
 *
 * Bits are ordered most significant first within each byte, header first.
 */
export function frame(payload: Uint8Array, framingConfig: FramingConfig): IBitStream {
    const { payloadLength, checksum, payload: body } = buildFrame(payload, framingConfig);
    const bytes = concatUint8Arrays([serializeUInt32(payloadLength), serializeUInt32(checksum), body]);
    return { bytes, bitLength: bytes.length * 8 };
}

/**
 * Parses the fixed-size header at the start of a frame.
 *
 * @throws TruncatedStreamError when fewer than {@link FRAME_HEADER_BYTES} bytes are given
 */
export function readFrameHeader(bytes: Uint8Array): IFrameHeader {
    if (bytes.length < FRAME_HEADER_BYTES) {
        throw new TruncatedStreamError(
            FRAME_HEADER_BYTES,
            bytes.length,
            `Frame header needs ${FRAME_HEADER_BYTES} bytes but only ${bytes.length} are available`,
        );
    }
    const { value: payloadLength, newOffset } = deserializeUInt32(bytes, 0);
    const { value: checksum } = deserializeUInt32(bytes, newOffset);
    return { payloadLength, checksum };
}

/**
 * Inverse of {@link frame}: reads the header, takes exactly the declared number of
 * payload bytes, removes the obfuscation and verifies the checksum. Trailing bits
 * are ignored.
 *
 * @throws TruncatedStreamError when the stream is shorter than the frame it declares
 * @throws ChecksumMismatchError when the recovered payload does not match its checksum
 */
export function unframe(bits: IBitStream, framingConfig: FramingConfig): Uint8Array {
    const availableBytes = Math.min(Math.floor(bits.bitLength / 8), bits.bytes.length);
    const header = readFrameHeader(bits.bytes.subarray(0, availableBytes));

    const frameLength = FRAME_HEADER_BYTES + header.payloadLength;
    if (frameLength > availableBytes) {
        throw new TruncatedStreamError(header.payloadLength, availableBytes - FRAME_HEADER_BYTES);
    }

    const body = bits.bytes.slice(FRAME_HEADER_BYTES, frameLength);
    const payload = applyObfuscation(body, framingConfig.obfuscationKey, framingConfig.obfuscationScheme);
    const actual = crc32(payload);
    if (actual !== header.checksum) {
        throw new ChecksumMismatchError(header.checksum, actual, payload);
    }
    return payload;
}
