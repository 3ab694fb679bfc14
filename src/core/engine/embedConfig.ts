// src/core/engine/embedConfig.ts

import type { BitsPerChannel, EmbedConfigInput, IEmbedConfig } from '../../@types';
import { config, SUPPORTED_BITS_PER_CHANNEL } from '../../config';
import { InvalidConfigError } from '../errors';
import { isSupportedObfuscationStrategy } from '../../utils/cryptography/obfuscationStrategies';

function isBitsPerChannel(value: number): value is BitsPerChannel {
    return SUPPORTED_BITS_PER_CHANNEL.some((supported) => supported === value);
}

/**
 * Fills in defaults from `config.embedding`, validates and freezes an embed/extract
 * configuration. String keys are taken as UTF-8.
 *
 * @throws InvalidConfigError when bitsPerChannel is outside 1..4, the key is empty or
 *         the obfuscation scheme is unknown
 */
export function resolveEmbedConfig(input: EmbedConfigInput = {}): Readonly<IEmbedConfig> {
    const bitsPerChannel = input.bitsPerChannel ?? config.embedding.bitsPerChannel;
    if (!isBitsPerChannel(bitsPerChannel)) {
        throw new InvalidConfigError(
            `bitsPerChannel must be one of ${SUPPORTED_BITS_PER_CHANNEL.join(', ')}, got ${bitsPerChannel}`,
        );
    }

    const obfuscationScheme = input.obfuscationScheme ?? config.embedding.obfuscationScheme;
    if (!isSupportedObfuscationStrategy(obfuscationScheme)) {
        throw new InvalidConfigError(`Unknown obfuscation scheme "${obfuscationScheme}"`);
    }

    const key = typeof input.obfuscationKey === 'string'
        ? new TextEncoder().encode(input.obfuscationKey)
        : input.obfuscationKey;
    if (key && key.length === 0) {
        throw new InvalidConfigError('Obfuscation key must not be empty');
    }

    return Object.freeze({
        bitsPerChannel,
        useAlphaChannel: input.useAlphaChannel ?? config.embedding.useAlphaChannel,
        obfuscationKey: key ? Uint8Array.from(key) : undefined,
        obfuscationScheme,
    });
}
