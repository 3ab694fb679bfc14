// src/core/engine/result.ts

import type { StegoResult } from '../../@types';

/**
 * Returns the value of a successful result, or throws the failure's error unchanged.
 */
export function unwrapResult<T>(result: StegoResult<T>): T {
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}
