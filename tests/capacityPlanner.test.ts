// tests/capacityPlanner.test.ts

import { capacity, countEligibleSamples, ensureFits, rawCapacity } from '../src/core/capacity';
import { eligibleSampleIndices } from '../src/core/engine';
import { CapacityError } from '../src/core/errors';
import { createPixelPlane } from '../src/core/pixelPlane';
import { captureError } from './helpers/fixtures';

describe('Capacity planner', () => {
    const rgb = createPixelPlane(10, 10, 'rgb');
    const rgba = createPixelPlane(10, 10, 'rgba');

    it('counts every RGB channel', () => {
        const embedConfig = { bitsPerChannel: 1 as const, useAlphaChannel: false };
        expect(countEligibleSamples(rgb, embedConfig)).toBe(300);
        expect(rawCapacity(rgb, embedConfig)).toBe(37);
        expect(capacity(rgb, embedConfig)).toBe(29);
    });

    it('scales with bits per channel', () => {
        expect(capacity(rgb, { bitsPerChannel: 2, useAlphaChannel: false })).toBe(67);
        expect(capacity(rgb, { bitsPerChannel: 3, useAlphaChannel: false })).toBe(104);
        expect(capacity(rgb, { bitsPerChannel: 4, useAlphaChannel: false })).toBe(142);
    });

    it('skips alpha unless asked to use it', () => {
        expect(countEligibleSamples(rgba, { useAlphaChannel: false })).toBe(300);
        expect(countEligibleSamples(rgba, { useAlphaChannel: true })).toBe(400);
        expect(capacity(rgba, { bitsPerChannel: 1, useAlphaChannel: true })).toBe(42);
    });

    it('ignores useAlphaChannel for RGB images', () => {
        expect(countEligibleSamples(rgb, { useAlphaChannel: true })).toBe(300);
    });

    it('never reports negative capacity', () => {
        const tiny = createPixelPlane(2, 2, 'rgb');
        expect(rawCapacity(tiny, { bitsPerChannel: 1, useAlphaChannel: false })).toBe(1);
        expect(capacity(tiny, { bitsPerChannel: 1, useAlphaChannel: false })).toBe(0);
    });

    it('agrees with the traversal order', () => {
        const plane = createPixelPlane(2, 1, 'rgba');
        expect(Array.from(eligibleSampleIndices(plane, { useAlphaChannel: false }))).toEqual([0, 1, 2, 4, 5, 6]);
        expect(Array.from(eligibleSampleIndices(plane, { useAlphaChannel: true }))).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
        for (const useAlphaChannel of [false, true]) {
            expect(Array.from(eligibleSampleIndices(rgba, { useAlphaChannel })).length).toBe(
                countEligibleSamples(rgba, { useAlphaChannel }),
            );
        }
    });

    describe('ensureFits', () => {
        it('accepts a payload that exactly fills the image', () => {
            expect(() => ensureFits(37, 29)).not.toThrow();
        });

        it('reports frame bytes needed and available', () => {
            const error = captureError(() => ensureFits(37, 30));
            expect(error).toBeInstanceOf(CapacityError);
            expect(error).toMatchObject({ needed: 38, available: 37, code: 'CAPACITY' });
            expect(error).toHaveProperty('message', 'Payload needs 38 bytes but the cover image only holds 37 bytes');
        });
    });
});
