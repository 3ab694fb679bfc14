// src/utils/bitManipulation/bitUtils.ts

/**
 * Mask selecting the lowest `bitCount` bits of a byte.
 *
 * @param {number} bitCount - The number of low-order bits to select.
 * @return {number} The mask.
 */
export function lowBitMask(bitCount: number): number {
    return (1 << bitCount) - 1;
}

/**
 * Extracts bits from a byte.
 *
 * @param {number} byte - The source byte.
 * @param {number} startBit - The position of the first bit (0 = least significant).
 * @param {number} bitCount - The number of bits to extract.
 * @return {number} The extracted bits, shifted down to bit 0.
 */
export function extractBits(byte: number, startBit: number, bitCount: number): number {
    return (byte >> startBit) & lowBitMask(bitCount);
}

/**
 * Overwrites bits of a byte with the low bits of `bits`.
 *
 * @param {number} byte - The original byte.
 * @param {number} bits - The bits to insert.
 * @param {number} startBit - The position of the first bit to overwrite (0 = least significant).
 * @param {number} bitCount - The number of bits to overwrite.
 * @return {number} The resulting byte, always within 0..255.
 */
export function insertBits(byte: number, bits: number, startBit: number, bitCount: number): number {
    const mask = lowBitMask(bitCount) << startBit;
    return ((byte & ~mask) | ((bits << startBit) & mask)) & 0xff;
}
