// src/core/capacity/capacityPlanner.ts

import type { IEmbedConfig, IPixelPlane } from '../../@types';
import { FRAME_HEADER_BYTES } from '../../config';
import { CapacityError } from '../errors';
import { hasAlphaChannel } from '../pixelPlane';

/**
 * Number of samples the traversal visits. Closed form of counting
 * `eligibleSampleIndices`.
 */
export function countEligibleSamples(
    plane: IPixelPlane,
    embedConfig: Pick<IEmbedConfig, 'useAlphaChannel'>,
): number {
    const pixels = plane.width * plane.height;
    const usableChannels = hasAlphaChannel(plane.format) && !embedConfig.useAlphaChannel
        ? plane.format.channels - 1
        : plane.format.channels;
    return pixels * usableChannels;
}

/**
 * Whole frame bytes (header included) the plane can hold.
 */
export function rawCapacity(
    plane: IPixelPlane,
    embedConfig: Pick<IEmbedConfig, 'useAlphaChannel' | 'bitsPerChannel'>,
): number {
    return Math.floor((countEligibleSamples(plane, embedConfig) * embedConfig.bitsPerChannel) / 8);
}

/**
 * Largest payload, in bytes, that fits into the plane under the given config.
 */
export function capacity(
    plane: IPixelPlane,
    embedConfig: Pick<IEmbedConfig, 'useAlphaChannel' | 'bitsPerChannel'>,
): number {
    return Math.max(0, rawCapacity(plane, embedConfig) - FRAME_HEADER_BYTES);
}

/**
 * Fails when a payload plus its frame header would not fit. Must run before any
 * sample is touched.
 *
 * @param availableFrameBytes - result of {@link rawCapacity}
 * @param payloadLength - payload size in bytes
 * @throws CapacityError carrying the frame bytes needed and available
 */
export function ensureFits(availableFrameBytes: number, payloadLength: number): void {
    const needed = payloadLength + FRAME_HEADER_BYTES;
    if (needed > availableFrameBytes) {
        throw new CapacityError(needed, availableFrameBytes);
    }
}
