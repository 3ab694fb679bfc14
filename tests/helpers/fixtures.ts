import seedrandom from 'seedrandom';
import type { IPixelPlane, PixelFormatKind } from '../../src/@types';
import { createPixelPlane, encodePixelPlane } from '../../src/core/pixelPlane';

/**
 * Deterministic pseudo-random bytes.
 */
export function seededBytes(length: number, seed: string): Uint8Array {
    const rng = seedrandom(seed);
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
        out[i] = Math.floor(rng() * 256);
    }
    return out;
}

export function noisePlane(width: number, height: number, kind: PixelFormatKind = 'rgb', seed = 'cover'): IPixelPlane {
    const plane = createPixelPlane(width, height, kind);
    plane.samples.set(seededBytes(plane.samples.length, seed));
    return plane;
}

export function noisePng(width: number, height: number, kind: PixelFormatKind = 'rgb', seed = 'cover'): Uint8Array {
    return encodePixelPlane(noisePlane(width, height, kind, seed));
}

/**
 * Raw 13-byte IHDR payload.
 */
export function imageHeader(
    width: number,
    height: number,
    { bitDepth = 8, colorType = 2, interlace = 0 }: { bitDepth?: number; colorType?: number; interlace?: number } = {},
): Uint8Array {
    const ihdr = new Uint8Array(13);
    const view = new DataView(ihdr.buffer);
    view.setUint32(0, width);
    view.setUint32(4, height);
    ihdr[8] = bitDepth;
    ihdr[9] = colorType;
    ihdr[12] = interlace;
    return ihdr;
}

export const textEncoder = new TextEncoder();

/**
 * Runs `fn` and returns what it threw; fails the test when it returns normally.
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}
