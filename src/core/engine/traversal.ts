// src/core/engine/traversal.ts

import type { IEmbedConfig, IPixelPlane } from '../../@types';
import { hasAlphaChannel } from '../pixelPlane';

const ALPHA_OFFSET = 3;

/**
 * Yields the indices of the samples that carry payload bits, in the one order both
 * embedding and extraction use: row-major, then R, G, B[, A] within each pixel, with
 * alpha samples skipped unless `useAlphaChannel` is set.
 *
 * Changing this order breaks every image embedded before the change.
 */
export function* eligibleSampleIndices(
    plane: IPixelPlane,
    embedConfig: Pick<IEmbedConfig, 'useAlphaChannel'>,
): Generator<number, void, undefined> {
    const channels = plane.format.channels;
    const skipAlpha = hasAlphaChannel(plane.format) && !embedConfig.useAlphaChannel;
    for (let index = 0; index < plane.samples.length; index++) {
        if (skipAlpha && index % channels === ALPHA_OFFSET) {
            continue;
        }
        yield index;
    }
}
