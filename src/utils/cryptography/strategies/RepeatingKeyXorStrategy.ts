// src/utils/cryptography/strategies/RepeatingKeyXorStrategy.ts

import type { ObfuscationStrategy } from '../../../@types';

/**
 * XORs the data with the key bytes, repeating the key as often as needed.
 */
export class RepeatingKeyXorStrategy implements ObfuscationStrategy {
    apply(data: Uint8Array, key: Uint8Array): Uint8Array {
        if (key.length === 0) {
            throw new RangeError('Obfuscation key must not be empty');
        }
        const out = new Uint8Array(data.length);
        for (let i = 0; i < data.length; i++) {
            out[i] = data[i] ^ key[i % key.length];
        }
        return out;
    }
}
