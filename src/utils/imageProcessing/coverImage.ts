// src/utils/imageProcessing/coverImage.ts

import sharp from 'sharp';
import type { PixelFormatKind } from '../../@types';
import { config } from '../../config';

export interface ICoverImageOptions {
    width: number;
    height: number;
    format: PixelFormatKind;
}

/**
 * Renders a Gaussian-noise PNG to use as a cover image.
 */
export async function generateCoverImage(options: Partial<ICoverImageOptions> = {}): Promise<Uint8Array> {
    const width = options.width ?? config.coverImage.width;
    const height = options.height ?? config.coverImage.height;
    const { noiseMean, noiseSigma } = config.coverImage;

    let image = sharp({
        create: {
            width,
            height,
            channels: 3,
            background: { r: noiseMean, g: noiseMean, b: noiseMean },
            noise: { type: 'gaussian', mean: noiseMean, sigma: noiseSigma },
        },
    });
    if (options.format === 'rgba') {
        image = image.ensureAlpha(1);
    }

    const png = await image
        .png({
            compressionLevel: config.imageCompression.compressionLevel,
            adaptiveFiltering: config.imageCompression.adaptiveFiltering,
            palette: false,
        })
        .toBuffer();
    return new Uint8Array(png.buffer, png.byteOffset, png.byteLength);
}
