// src/core/pixelPlane/scanlineFilters.ts

import { CorruptImageError } from '../errors';

export enum FilterType {
    None = 0,
    Sub = 1,
    Up = 2,
    Average = 3,
    Paeth = 4,
}

function isFilterType(value: number): value is FilterType {
    return value >= FilterType.None && value <= FilterType.Paeth;
}

const ALL_FILTERS: readonly FilterType[] = [
    FilterType.None,
    FilterType.Sub,
    FilterType.Up,
    FilterType.Average,
    FilterType.Paeth,
];

function paethPredictor(a: number, b: number, c: number): number {
    const p = a + b - c;
    const pa = Math.abs(p - a);
    const pb = Math.abs(p - b);
    const pc = Math.abs(p - c);
    if (pa <= pb && pa <= pc) return a;
    if (pb <= pc) return b;
    return c;
}

/**
 * Predictor for byte `i` of a row. `row` is the reconstructed current row,
 * `previous` the reconstructed row above (all zeros for the first row).
 */
function predict(filter: FilterType, row: Uint8Array, previous: Uint8Array, i: number, bpp: number): number {
    const left = i >= bpp ? row[i - bpp] : 0;
    const up = previous[i];
    switch (filter) {
        case FilterType.None:
            return 0;
        case FilterType.Sub:
            return left;
        case FilterType.Up:
            return up;
        case FilterType.Average:
            return (left + up) >> 1;
        case FilterType.Paeth:
            return paethPredictor(left, up, i >= bpp ? previous[i - bpp] : 0);
    }
}

/**
 * Reverses the per-row filters of an inflated, non-interlaced image.
 *
 * @param filtered - inflated IDAT stream: one filter byte followed by `rowBytes` bytes per row
 * @param rowBytes - unfiltered bytes per row
 * @param height - number of rows
 * @param bpp - bytes per complete pixel
 * @returns the reconstructed samples, `rowBytes * height` long
 */
export function unfilterScanlines(filtered: Uint8Array, rowBytes: number, height: number, bpp: number): Uint8Array {
    const samples = new Uint8Array(rowBytes * height);
    let previous: Uint8Array = new Uint8Array(rowBytes);

    for (let y = 0; y < height; y++) {
        const filterOffset = y * (rowBytes + 1);
        const filter = filtered[filterOffset];
        if (!isFilterType(filter)) {
            throw new CorruptImageError(`Unknown scanline filter type ${filter} in row ${y}`);
        }
        const row = samples.subarray(y * rowBytes, (y + 1) * rowBytes);
        for (let i = 0; i < rowBytes; i++) {
            row[i] = (filtered[filterOffset + 1 + i] + predict(filter, row, previous, i, bpp)) & 0xff;
        }
        previous = row;
    }

    return samples;
}

function filterRow(filter: FilterType, row: Uint8Array, previous: Uint8Array, bpp: number, out: Uint8Array): void {
    out[0] = filter;
    for (let i = 0; i < row.length; i++) {
        out[i + 1] = (row[i] - predict(filter, row, previous, i, bpp)) & 0xff;
    }
}

// Minimum sum of absolute differences, the heuristic libpng uses for adaptive filtering.
function filterCost(filteredRow: Uint8Array): number {
    let sum = 0;
    for (let i = 1; i < filteredRow.length; i++) {
        const value = filteredRow[i];
        sum += value < 128 ? value : 256 - value;
    }
    return sum;
}

/**
 * Applies PNG row filters to raw samples. Without `adaptive` every row uses None;
 * with it each row takes whichever filter yields the smallest cost.
 *
 * @returns the filtered stream, `(rowBytes + 1) * height` long
 */
export function filterScanlines(
    samples: Uint8Array,
    rowBytes: number,
    height: number,
    bpp: number,
    adaptive: boolean,
): Uint8Array {
    const stride = rowBytes + 1;
    const filtered = new Uint8Array(stride * height);
    const candidate = new Uint8Array(stride);
    let previous: Uint8Array = new Uint8Array(rowBytes);

    for (let y = 0; y < height; y++) {
        const row = samples.subarray(y * rowBytes, (y + 1) * rowBytes);
        const target = filtered.subarray(y * stride, (y + 1) * stride);

        if (!adaptive) {
            filterRow(FilterType.None, row, previous, bpp, target);
        } else {
            let bestCost = Number.POSITIVE_INFINITY;
            for (const filter of ALL_FILTERS) {
                filterRow(filter, row, previous, bpp, candidate);
                const cost = filterCost(candidate);
                if (cost < bestCost) {
                    bestCost = cost;
                    target.set(candidate);
                }
            }
        }
        previous = row;
    }

    return filtered;
}
