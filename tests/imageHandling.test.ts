// tests/imageHandling.test.ts

import sharp from 'sharp';
import { embed, extract, unwrapResult } from '../src/core/engine';
import { decodePixelPlane, encodePixelPlane } from '../src/core/pixelPlane';
import { generateCoverImage } from '../src/utils/imageProcessing/coverImage';
import { noisePlane, textEncoder } from './helpers/fixtures';

describe('Image handling with sharp', () => {
    it('writes PNGs that sharp reads back pixel for pixel', async () => {
        const plane = noisePlane(9, 7, 'rgba', 'sharp-read');
        const { data, info } = await sharp(Buffer.from(encodePixelPlane(plane))).raw().toBuffer({ resolveWithObject: true });
        expect(info).toMatchObject({ width: 9, height: 7, channels: 4 });
        expect(Array.from(data)).toEqual(Array.from(plane.samples));
    });

    it('decodes PNGs written by sharp', async () => {
        const plane = noisePlane(12, 10, 'rgb', 'sharp-write');
        const png = await sharp(Buffer.from(plane.samples), { raw: { width: 12, height: 10, channels: 3 } })
            .png({ compressionLevel: 9, adaptiveFiltering: true })
            .toBuffer();
        const decoded = decodePixelPlane(png);
        expect(decoded.format.kind).toBe('rgb');
        expect(Array.from(decoded.samples)).toEqual(Array.from(plane.samples));
    });

    it('generates RGB noise covers', async () => {
        const cover = decodePixelPlane(await generateCoverImage({ width: 20, height: 10 }));
        expect(cover).toMatchObject({ width: 20, height: 10, format: { kind: 'rgb', channels: 3 } });
        expect(new Set(cover.samples).size).toBeGreaterThan(16);
    });

    it('generates opaque RGBA covers', async () => {
        const cover = decodePixelPlane(await generateCoverImage({ width: 8, height: 8, format: 'rgba' }));
        expect(cover.format.kind).toBe('rgba');
        const alpha = cover.samples.filter((_, index) => index % 4 === 3);
        expect(alpha.every((value) => value === 255)).toBe(true);
    });

    it('embeds into a generated cover and leaves an image sharp understands', async () => {
        const cover = await generateCoverImage({ width: 40, height: 40 });
        const stego = unwrapResult(embed(cover, textEncoder.encode('HELLO WORLD'), { obfuscationKey: 'test-secret' }));
        const metadata = await sharp(Buffer.from(stego)).metadata();
        expect(metadata).toMatchObject({ format: 'png', width: 40, height: 40, channels: 3 });
        const recovered = unwrapResult(extract(stego, { obfuscationKey: 'test-secret' }));
        expect(new TextDecoder().decode(recovered)).toBe('HELLO WORLD');
    });
});
