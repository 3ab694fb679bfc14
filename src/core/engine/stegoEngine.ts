// src/core/engine/stegoEngine.ts

import type { EmbedConfigInput, IBitStream, IEmbedConfig, IPixelPlane, StegoResult, StegoStage } from '../../@types';
import { FRAME_HEADER_BYTES } from '../../config';
import { extractBits, insertBits } from '../../utils/bitManipulation/bitUtils';
import { BitReader, BitWriter } from '../../utils/bitManipulation/bitStream';
import { capacity, countEligibleSamples, ensureFits, rawCapacity } from '../capacity';
import { isStegoError, TruncatedStreamError } from '../errors';
import { frame, readFrameHeader, unframe } from '../framing';
import { decodePixelPlane, encodePixelPlane, withSamples } from '../pixelPlane';
import { resolveEmbedConfig } from './embedConfig';
import { eligibleSampleIndices } from './traversal';

type StageListener = (stage: StegoStage) => void;

const noop: StageListener = () => {};

/**
 * Runs `operation`, turning any codec error into a failed result tagged with the
 * stage that was active when it was thrown. Anything else is a bug and propagates.
 */
function runStages<T>(operation: (enter: StageListener) => T): StegoResult<T> {
    let current: StegoStage = 'config';
    try {
        const value = operation((stage) => {
            current = stage;
        });
        return { ok: true, value };
    } catch (error) {
        if (isStegoError(error)) {
            return { ok: false, stage: current, error };
        }
        throw error;
    }
}

/**
 * Reads the low-order bits of eligible samples, in traversal order, until `bitCount`
 * bits are collected or the samples run out.
 */
function collectBits(plane: IPixelPlane, embedConfig: Readonly<IEmbedConfig>, bitCount: number): IBitStream {
    const { bitsPerChannel } = embedConfig;
    const writer = new BitWriter(bitCount + bitsPerChannel);
    for (const index of eligibleSampleIndices(plane, embedConfig)) {
        if (writer.bitLength >= bitCount) {
            break;
        }
        writer.write(extractBits(plane.samples[index], 0, bitsPerChannel), bitsPerChannel);
    }
    const stream = writer.toBitStream();
    return { bytes: stream.bytes, bitLength: Math.min(stream.bitLength, bitCount) };
}

/**
 * Embeds a payload into an already decoded plane and returns a new plane. The input
 * plane is left untouched, also when the payload does not fit.
 *
 * @throws CapacityError before any sample is written when the payload is too large
 */
export function embedPlane(
    plane: IPixelPlane,
    payload: Uint8Array,
    embedConfig: Readonly<IEmbedConfig>,
    enter: StageListener = noop,
): IPixelPlane {
    enter('capacity');
    ensureFits(rawCapacity(plane, embedConfig), payload.length);

    enter('frame');
    const stream = frame(payload, embedConfig);

    const { bitsPerChannel } = embedConfig;
    const samples = plane.samples.slice();
    const reader = new BitReader(stream.bytes, stream.bitLength);
    for (const index of eligibleSampleIndices(plane, embedConfig)) {
        if (reader.remaining === 0) {
            break;
        }
        // the last group is zero-padded by the reader
        samples[index] = insertBits(samples[index], reader.read(bitsPerChannel), 0, bitsPerChannel);
    }
    return withSamples(plane, samples);
}

/**
 * Recovers the payload embedded in a decoded plane.
 *
 * @throws TruncatedStreamError when the plane cannot hold the frame its header declares
 * @throws ChecksumMismatchError when the payload fails verification
 */
export function extractPlane(
    plane: IPixelPlane,
    embedConfig: Readonly<IEmbedConfig>,
    enter: StageListener = noop,
): Uint8Array {
    enter('frame');
    const availableBytes = rawCapacity(plane, embedConfig);

    const headerBits = collectBits(plane, embedConfig, FRAME_HEADER_BYTES * 8);
    const { payloadLength } = readFrameHeader(headerBits.bytes.subarray(0, Math.floor(headerBits.bitLength / 8)));
    if (FRAME_HEADER_BYTES + payloadLength > availableBytes) {
        throw new TruncatedStreamError(payloadLength, Math.max(0, availableBytes - FRAME_HEADER_BYTES));
    }

    return unframe(collectBits(plane, embedConfig, (FRAME_HEADER_BYTES + payloadLength) * 8), embedConfig);
}

/**
 * Hides `payload` in the cover PNG and returns the new PNG. The cover bytes are never
 * modified; on failure nothing is produced.
 */
export function embed(coverPng: Uint8Array, payload: Uint8Array, input?: EmbedConfigInput): StegoResult<Uint8Array> {
    return runStages((enter) => {
        const embedConfig = resolveEmbedConfig(input);
        enter('decode');
        const cover = decodePixelPlane(coverPng);
        const stego = embedPlane(cover, payload, embedConfig, enter);
        enter('encode');
        return encodePixelPlane(stego);
    });
}

/**
 * Recovers the payload from a PNG produced by {@link embed} with the same config.
 */
export function extract(stegoPng: Uint8Array, input?: EmbedConfigInput): StegoResult<Uint8Array> {
    return runStages((enter) => {
        const embedConfig = resolveEmbedConfig(input);
        enter('decode');
        const plane = decodePixelPlane(stegoPng);
        return extractPlane(plane, embedConfig, enter);
    });
}

/**
 * Payload capacity of a PNG under the given config, without embedding anything.
 */
export function inspectCapacity(
    pngBytes: Uint8Array,
    input?: EmbedConfigInput,
): StegoResult<{ eligibleSamples: number; frameBytes: number; payloadBytes: number }> {
    return runStages((enter) => {
        const embedConfig = resolveEmbedConfig(input);
        enter('decode');
        const plane = decodePixelPlane(pngBytes);
        enter('capacity');
        return {
            eligibleSamples: countEligibleSamples(plane, embedConfig),
            frameBytes: rawCapacity(plane, embedConfig),
            payloadBytes: capacity(plane, embedConfig),
        };
    });
}
