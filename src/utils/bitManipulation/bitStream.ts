// src/utils/bitManipulation/bitStream.ts

import type { IBitStream } from '../../@types';

/**
 * Reads groups of bits from a byte buffer, most significant bit first.
 * Reading past `bitLength` yields zero bits.
 */
export class BitReader {
    private position = 0;

    constructor(
        private readonly bytes: Uint8Array,
        readonly bitLength: number = bytes.length * 8,
    ) {}

    get remaining(): number {
        return Math.max(0, this.bitLength - this.position);
    }

    /**
     * Reads the next `count` bits (1..8) as an unsigned number, MSB first.
     */
    read(count: number): number {
        let value = 0;
        for (let i = 0; i < count; i++) {
            value = (value << 1) | this.readBit();
        }
        return value;
    }

    private readBit(): number {
        if (this.position >= this.bitLength) {
            this.position++;
            return 0;
        }
        const byte = this.bytes[this.position >> 3];
        const bit = (byte >> (7 - (this.position & 7))) & 1;
        this.position++;
        return bit;
    }
}

/**
 * Appends groups of bits into a growing byte buffer, most significant bit first.
 */
export class BitWriter {
    private readonly bytes: Uint8Array;
    private position = 0;

    constructor(capacityBits: number) {
        this.bytes = new Uint8Array(Math.ceil(capacityBits / 8));
    }

    get bitLength(): number {
        return this.position;
    }

    write(value: number, count: number): void {
        for (let i = count - 1; i >= 0; i--) {
            if (this.position >= this.bytes.length * 8) {
                throw new RangeError(`BitWriter overflow at bit ${this.position}`);
            }
            if ((value >> i) & 1) {
                this.bytes[this.position >> 3] |= 0x80 >> (this.position & 7);
            }
            this.position++;
        }
    }

    toBitStream(): IBitStream {
        return { bytes: this.bytes.slice(0, Math.ceil(this.position / 8)), bitLength: this.position };
    }
}
