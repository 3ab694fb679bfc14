// src/core/pixelPlane/pixelPlane.ts

import { deflateSync, inflateSync } from 'node:zlib';
import type { IAncillaryChunk, IImageHeader, IPixelPlane, IPngChunk, PixelFormat, PixelFormatKind } from '../../@types';
import { config } from '../../config';
import { CorruptImageError, InvalidConfigError, UnsupportedFormatError } from '../errors';
import { concatUint8Arrays, deserializeUInt32, writeUInt32 } from '../../utils/serialization/serializationHelpers';
import { isCriticalChunk, readPngChunks, writePngChunks } from './pngChunks';
import { PIXEL_FORMATS, pixelFormatFromColorType } from './pixelFormats';
import { filterScanlines, unfilterScanlines } from './scanlineFilters';

const MAX_DIMENSION = 0x7fffffff;

// Chunks the codec itself writes; everything else is carried through verbatim.
const STRUCTURAL_CHUNKS = new Set(['IHDR', 'IDAT', 'IEND']);

export interface IEncodeImageOptions {
    compressionLevel: number;
    adaptiveFiltering: boolean;
    idatChunkSize: number;
}

function parseImageHeader(chunk: IPngChunk | undefined): IImageHeader {
    if (!chunk || chunk.type !== 'IHDR') {
        throw new CorruptImageError('First chunk must be IHDR');
    }
    if (chunk.data.length !== 13) {
        throw new CorruptImageError(`IHDR must be 13 bytes long, found ${chunk.data.length}`);
    }
    const { data } = chunk;
    return {
        width: deserializeUInt32(data, 0).value,
        height: deserializeUInt32(data, 4).value,
        bitDepth: data[8],
        colorType: data[9],
        compressionMethod: data[10],
        filterMethod: data[11],
        interlaceMethod: data[12],
    };
}

/**
 * Checks that the header describes a layout the codec can carry data in.
 */
function resolvePixelFormat(header: IImageHeader): PixelFormat {
    if (header.width === 0 || header.height === 0 || header.width > MAX_DIMENSION || header.height > MAX_DIMENSION) {
        throw new CorruptImageError(`Invalid image dimensions ${header.width}x${header.height}`);
    }
    if (header.colorType === 3) {
        throw new UnsupportedFormatError('Palette images are not supported');
    }
    const format = pixelFormatFromColorType(header.colorType);
    if (!format) {
        throw new UnsupportedFormatError(
            `Colour type ${header.colorType} is not supported; only RGB (2) and RGBA (6) images can carry data`,
        );
    }
    if (header.bitDepth !== 8) {
        throw new UnsupportedFormatError(`Bit depth ${header.bitDepth} is not supported; only 8-bit images are`);
    }
    if (header.compressionMethod !== 0 || header.filterMethod !== 0) {
        throw new UnsupportedFormatError(
            `Unknown compression method ${header.compressionMethod} or filter method ${header.filterMethod}`,
        );
    }
    if (header.interlaceMethod !== 0) {
        throw new UnsupportedFormatError('Interlaced images are not supported');
    }
    return format;
}

/**
 * Decodes an 8-bit, non-interlaced RGB or RGBA PNG into a pixel plane.
 *
 * Every chunk CRC is verified. Ancillary chunks (and a suggested palette) are kept
 * with their position relative to the image data so that {@link encodePixelPlane}
 * can write them back unchanged.
 *
 * @throws UnsupportedFormatError for palette, grayscale, non-8-bit or interlaced images
 * @throws CorruptImageError for structural damage, CRC mismatches or inflate failures
 */
export function decodePixelPlane(pngBytes: Uint8Array): IPixelPlane {
    const chunks = readPngChunks(pngBytes);
    const header = parseImageHeader(chunks[0]);
    const format = resolvePixelFormat(header);

    const imageData: Uint8Array[] = [];
    const ancillaryChunks: IAncillaryChunk[] = [];
    let imageDataClosed = false;

    for (const chunk of chunks.slice(1)) {
        switch (chunk.type) {
            case 'IDAT':
                if (imageDataClosed) {
                    throw new CorruptImageError('IDAT chunks must be consecutive');
                }
                imageData.push(chunk.data);
                break;
            case 'IEND':
                break;
            case 'IHDR':
                throw new CorruptImageError('Duplicate IHDR chunk');
            default:
                if (isCriticalChunk(chunk.type) && chunk.type !== 'PLTE') {
                    throw new UnsupportedFormatError(`Unknown critical chunk ${chunk.type}`);
                }
                if (imageData.length > 0) {
                    imageDataClosed = true;
                }
                ancillaryChunks.push({
                    type: chunk.type,
                    data: chunk.data,
                    placement: imageData.length > 0 ? 'afterImageData' : 'beforeImageData',
                });
        }
    }

    if (imageData.length === 0) {
        throw new CorruptImageError('Missing IDAT chunk');
    }

    let inflated: Uint8Array;
    try {
        inflated = inflateSync(concatUint8Arrays(imageData));
    } catch (error) {
        throw new CorruptImageError(`Failed to inflate image data: ${(error as Error).message}`);
    }

    const rowBytes = header.width * format.channels;
    const expectedLength = (rowBytes + 1) * header.height;
    if (inflated.length < expectedLength) {
        throw new CorruptImageError(
            `Image data is truncated: expected ${expectedLength} bytes, inflated ${inflated.length}`,
        );
    }

    return {
        width: header.width,
        height: header.height,
        format,
        samples: unfilterScanlines(inflated, rowBytes, header.height, format.channels),
        ancillaryChunks,
    };
}

/**
 * Fails unless the plane's sample count matches its geometry and its extra chunks
 * can be written back without clashing with the ones the encoder produces.
 */
export function assertPixelPlane(plane: IPixelPlane): void {
    const { width, height, format, samples } = plane;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
        throw new InvalidConfigError(`Invalid image dimensions ${width}x${height}`);
    }
    if (width > MAX_DIMENSION || height > MAX_DIMENSION) {
        throw new InvalidConfigError(`Image dimensions ${width}x${height} exceed the PNG limit`);
    }
    const expected = width * height * format.channels;
    if (samples.length !== expected) {
        throw new InvalidConfigError(`Pixel plane holds ${samples.length} samples, expected ${expected}`);
    }
    for (const chunk of plane.ancillaryChunks) {
        if (STRUCTURAL_CHUNKS.has(chunk.type)) {
            throw new InvalidConfigError(`Chunk ${chunk.type} cannot be carried as an ancillary chunk`);
        }
    }
}

function buildImageHeader(plane: IPixelPlane): Uint8Array {
    const ihdr = new Uint8Array(13);
    writeUInt32(ihdr, 0, plane.width);
    writeUInt32(ihdr, 4, plane.height);
    ihdr[8] = 8;
    ihdr[9] = plane.format.colorType;
    // compression, filter and interlace methods stay 0
    return ihdr;
}

function splitImageData(compressed: Uint8Array, chunkSize: number): IPngChunk[] {
    const size = Math.max(1, Math.floor(chunkSize));
    const chunks: IPngChunk[] = [];
    for (let offset = 0; offset < compressed.length; offset += size) {
        chunks.push({ type: 'IDAT', data: compressed.subarray(offset, offset + size) });
    }
    return chunks;
}

/**
 * Encodes a pixel plane into PNG bytes. Samples are written exactly as given.
 *
 * @param plane - image to encode; not modified
 * @param options - zlib level, scanline filter selection and IDAT chunk size
 */
export function encodePixelPlane(
    plane: IPixelPlane,
    options: IEncodeImageOptions = config.imageCompression,
): Uint8Array {
    assertPixelPlane(plane);

    const rowBytes = plane.width * plane.format.channels;
    const filtered = filterScanlines(
        plane.samples,
        rowBytes,
        plane.height,
        plane.format.channels,
        options.adaptiveFiltering,
    );
    const compressed = deflateSync(filtered, { level: options.compressionLevel });

    const before = plane.ancillaryChunks.filter((chunk) => chunk.placement === 'beforeImageData');
    const after = plane.ancillaryChunks.filter((chunk) => chunk.placement === 'afterImageData');

    return writePngChunks([
        { type: 'IHDR', data: buildImageHeader(plane) },
        ...before,
        ...splitImageData(compressed, options.idatChunkSize),
        ...after,
        { type: 'IEND', data: new Uint8Array(0) },
    ]);
}

/**
 * Allocates a fresh canvas with every sample set to `fill`.
 */
export function createPixelPlane(width: number, height: number, kind: PixelFormatKind, fill = 0): IPixelPlane {
    const format = PIXEL_FORMATS[kind];
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
        throw new InvalidConfigError(`Invalid image dimensions ${width}x${height}`);
    }
    const plane: IPixelPlane = {
        width,
        height,
        format,
        samples: new Uint8Array(width * height * format.channels).fill(fill),
        ancillaryChunks: [],
    };
    assertPixelPlane(plane);
    return plane;
}

/**
 * Same image with a different sample buffer; ancillary chunks are shared.
 */
export function withSamples(plane: IPixelPlane, samples: Uint8Array): IPixelPlane {
    return { ...plane, samples };
}
