// src/core/pixelPlane/pixelFormats.ts

import type { PixelFormat, PixelFormatKind } from '../../@types';

export const PIXEL_FORMATS: { readonly [K in PixelFormatKind]: Extract<PixelFormat, { kind: K }> } = {
    rgb: { kind: 'rgb', colorType: 2, channels: 3 },
    rgba: { kind: 'rgba', colorType: 6, channels: 4 },
};

/**
 * Maps a PNG colour type to a supported pixel format, or undefined when the codec
 * cannot carry data in it.
 */
export function pixelFormatFromColorType(colorType: number): PixelFormat | undefined {
    switch (colorType) {
        case PIXEL_FORMATS.rgb.colorType:
            return PIXEL_FORMATS.rgb;
        case PIXEL_FORMATS.rgba.colorType:
            return PIXEL_FORMATS.rgba;
        default:
            return undefined;
    }
}

export function hasAlphaChannel(format: PixelFormat): boolean {
    return format.kind === 'rgba';
}
