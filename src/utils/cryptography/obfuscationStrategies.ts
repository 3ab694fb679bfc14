// src/utils/cryptography/obfuscationStrategies.ts

import type { ObfuscationStrategy } from '../../@types';
import { HashStreamXorStrategy } from './strategies/HashStreamXorStrategy';
import { RepeatingKeyXorStrategy } from './strategies/RepeatingKeyXorStrategy';

export enum SupportedObfuscationStrategies {
    RepeatingKeyXor = 'xor',
    HashStreamXor = 'sha256-xor',
}

export const ObfuscationStrategyMap: Record<SupportedObfuscationStrategies, ObfuscationStrategy> = {
    [SupportedObfuscationStrategies.RepeatingKeyXor]: new RepeatingKeyXorStrategy(),
    [SupportedObfuscationStrategies.HashStreamXor]: new HashStreamXorStrategy(),
};

export function isSupportedObfuscationStrategy(value: string): value is SupportedObfuscationStrategies {
    return Object.values<string>(SupportedObfuscationStrategies).includes(value);
}
