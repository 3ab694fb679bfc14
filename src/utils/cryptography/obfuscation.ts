// src/utils/cryptography/obfuscation.ts

import { ObfuscationStrategyMap, SupportedObfuscationStrategies } from './obfuscationStrategies';

/**
 * Applies the keyed XOR transform of the given scheme. The transform is its own inverse,
 * so the same call obfuscates and restores. Without a key the data is returned as is.
 *
 * @param data - bytes to transform; never modified
 * @param key - obfuscation key, or undefined to skip the pass
 * @param scheme - keystream derivation
 */
export function applyObfuscation(
    data: Uint8Array,
    key: Uint8Array | undefined,
    scheme: SupportedObfuscationStrategies,
): Uint8Array {
    if (!key) {
        return data;
    }
    return ObfuscationStrategyMap[scheme].apply(data, key);
}
