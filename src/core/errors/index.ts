// src/core/errors/index.ts

export type StegoErrorCode =
    | 'UNSUPPORTED_FORMAT'
    | 'CORRUPT_IMAGE'
    | 'CAPACITY'
    | 'FRAME'
    | 'CHECKSUM_MISMATCH'
    | 'TRUNCATED_STREAM'
    | 'INVALID_CONFIG';

/**
 * Base class of every failure the codec reports. None of them are retried internally.
 */
export abstract class StegoError extends Error {
    abstract readonly code: StegoErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * The PNG is well formed but uses a layout the codec does not handle
 * (palette, grayscale, bit depth other than 8, interlacing).
 */
export class UnsupportedFormatError extends StegoError {
    readonly code = 'UNSUPPORTED_FORMAT';
}

export class CorruptImageError extends StegoError {
    readonly code = 'CORRUPT_IMAGE';
}

/**
 * Payload does not fit. Both figures count frame bytes, header included.
 */
export class CapacityError extends StegoError {
    readonly code = 'CAPACITY';

    constructor(
        readonly needed: number,
        readonly available: number,
    ) {
        super(`Payload needs ${needed} bytes but the cover image only holds ${available} bytes`);
    }
}

export class FrameError extends StegoError {
    readonly code: StegoErrorCode = 'FRAME';
}

export class ChecksumMismatchError extends FrameError {
    override readonly code = 'CHECKSUM_MISMATCH';

    /**
     * @param expected - checksum stored in the frame header
     * @param actual - checksum computed over the recovered payload
     * @param payload - the recovered (possibly garbage) bytes, for callers that accept damaged data
     */
    constructor(
        readonly expected: number,
        readonly actual: number,
        readonly payload: Uint8Array,
    ) {
        super(
            `Checksum mismatch: frame declares 0x${toHex(expected)}, payload hashes to 0x${toHex(actual)}`,
        );
    }
}

export class TruncatedStreamError extends FrameError {
    override readonly code = 'TRUNCATED_STREAM';

    constructor(
        readonly declaredBytes: number,
        readonly availableBytes: number,
        message = `Frame declares ${declaredBytes} payload bytes but only ${availableBytes} bytes are available`,
    ) {
        super(message);
    }
}

export class InvalidConfigError extends StegoError {
    readonly code = 'INVALID_CONFIG';
}

export function isStegoError(error: unknown): error is StegoError {
    return error instanceof StegoError;
}

function toHex(value: number): string {
    return value.toString(16).padStart(8, '0');
}
