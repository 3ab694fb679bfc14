// src/utils/checksum/crc32.ts

// IEEE 802.3 polynomial, reflected; the same CRC PNG uses for its chunks.
const CRC_TABLE: Uint32Array = (() => {
    const table = new Uint32Array(256);
    for (let n = 0; n < 256; n++) {
        let c = n;
        for (let k = 0; k < 8; k++) {
            c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
        }
        table[n] = c >>> 0;
    }
    return table;
})();

/**
 * Continues a running CRC32 over `data`. Pass the previous result as `crc` to checksum
 * several buffers as if they were one.
 */
export function updateCrc32(crc: number, data: Uint8Array): number {
    let c = ~crc >>> 0;
    for (let i = 0; i < data.length; i++) {
        c = CRC_TABLE[(c ^ data[i]) & 0xff] ^ (c >>> 8);
    }
    return ~c >>> 0;
}

export function crc32(data: Uint8Array): number {
    return updateCrc32(0, data);
}
