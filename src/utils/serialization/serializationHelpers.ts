// src/utils/serialization/serializationHelpers.ts

/**
 * Serializes a 32-bit unsigned integer, big endian.
 *
 * @param {number} value - The value to serialize.
 * @return {Uint8Array} A 4-byte buffer.
 */
export function serializeUInt32(value: number): Uint8Array {
    const buffer = new Uint8Array(4);
    writeUInt32(buffer, 0, value);
    return buffer;
}

/**
 * Writes a 32-bit unsigned integer into a buffer, big endian.
 *
 * @param {Uint8Array} buffer - The buffer to write into.
 * @param {number} offset - The byte offset to write at.
 * @param {number} value - The value to write.
 * @return {void}
 */
export function writeUInt32(buffer: Uint8Array, offset: number, value: number): void {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    view.setUint32(offset, value >>> 0, false);
}

/**
 * Deserializes a 32-bit unsigned integer from the given buffer at the specified offset.
 *
 * @param {Uint8Array} buffer - The buffer to read from.
 * @param {number} offset - The byte offset to start reading at.
 * @return {{ value: number; newOffset: number }} The value and the offset just past it.
 */
export function deserializeUInt32(buffer: Uint8Array, offset: number): { value: number; newOffset: number } {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const value = view.getUint32(offset, false);
    return { value, newOffset: offset + 4 };
}

/**
 * Concatenates multiple Uint8Array objects into a single Uint8Array.
 *
 * @param {readonly Uint8Array[]} arrays - The arrays to concatenate, in order.
 * @return {Uint8Array} A new array holding all bytes.
 */
export function concatUint8Arrays(arrays: readonly Uint8Array[]): Uint8Array {
    const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const arr of arrays) {
        result.set(arr, offset);
        offset += arr.length;
    }
    return result;
}

/**
 * Compares two arrays byte by byte.
 *
 * @param {Uint8Array} arr1 - The first array.
 * @param {Uint8Array} arr2 - The second array.
 * @return {boolean} True if both hold the same bytes.
 */
export function compareUint8ArraysQuick(arr1: Uint8Array, arr2: Uint8Array): boolean {
    return arr1.length === arr2.length && arr1.every((value, index) => value === arr2[index]);
}
