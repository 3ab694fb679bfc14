// src/utils/cryptography/strategies/HashStreamXorStrategy.ts

import { createHash } from 'node:crypto';
import type { ObfuscationStrategy } from '../../../@types';
import { serializeUInt32 } from '../../serialization/serializationHelpers';

const BLOCK_SIZE = 32;

/**
 * XORs the data with a keystream of SHA-256(key || blockIndex) blocks, block index as
 * a big-endian u32. Spreads a short key over the whole payload; still not authenticated.
 */
export class HashStreamXorStrategy implements ObfuscationStrategy {
    apply(data: Uint8Array, key: Uint8Array): Uint8Array {
        if (key.length === 0) {
            throw new RangeError('Obfuscation key must not be empty');
        }
        const out = new Uint8Array(data.length);
        for (let blockIndex = 0; blockIndex * BLOCK_SIZE < data.length; blockIndex++) {
            const block = this.keystreamBlock(key, blockIndex);
            const offset = blockIndex * BLOCK_SIZE;
            const end = Math.min(offset + BLOCK_SIZE, data.length);
            for (let i = offset; i < end; i++) {
                out[i] = data[i] ^ block[i - offset];
            }
        }
        return out;
    }

    private keystreamBlock(key: Uint8Array, blockIndex: number): Uint8Array {
        return createHash('sha256').update(key).update(serializeUInt32(blockIndex)).digest();
    }
}
