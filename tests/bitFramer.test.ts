// tests/bitFramer.test.ts

import { ChecksumMismatchError, FrameError, TruncatedStreamError } from '../src/core/errors';
import { buildFrame, frame, readFrameHeader, unframe } from '../src/core/framing';
import { crc32 } from '../src/utils/checksum/crc32';
import { SupportedObfuscationStrategies } from '../src/utils/cryptography/obfuscationStrategies';
import { captureError, seededBytes, textEncoder } from './helpers/fixtures';

const plain = { obfuscationScheme: SupportedObfuscationStrategies.RepeatingKeyXor };
const keyed = { ...plain, obfuscationKey: textEncoder.encode('test-secret') };

describe('Bit framer', () => {
    it('lays out length, checksum and payload big endian', () => {
        const stream = frame(textEncoder.encode('HI'), plain);
        expect(stream.bitLength).toBe(80);
        expect(Array.from(stream.bytes)).toEqual([0, 0, 0, 2, 0x76, 0x79, 0x2e, 0xc6, 0x48, 0x49]);
    });

    it('frames an empty payload as a bare header', () => {
        const stream = frame(new Uint8Array(0), plain);
        expect(Array.from(stream.bytes)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
        expect(Array.from(unframe(stream, plain))).toEqual([]);
    });

    it('obfuscates only the payload section', () => {
        const payload = new Uint8Array([0x00, 0xff]);
        const stream = frame(payload, { ...plain, obfuscationKey: new Uint8Array([0x0f]) });
        expect(Array.from(stream.bytes.subarray(0, 4))).toEqual([0, 0, 0, 2]);
        expect(Array.from(stream.bytes.subarray(8))).toEqual([0x0f, 0xf0]);
    });

    it('checksums the payload before obfuscation', () => {
        const payload = textEncoder.encode('HELLO WORLD');
        const built = buildFrame(payload, keyed);
        expect(built.payloadLength).toBe(11);
        expect(built.checksum).toBe(0x87e5865b);
        expect(built.checksum).toBe(crc32(payload));
    });

    it.each(Object.values(SupportedObfuscationStrategies))('round-trips with the %s scheme', (scheme) => {
        const payload = seededBytes(100, 'framer');
        const framingConfig = { obfuscationScheme: scheme, obfuscationKey: textEncoder.encode('test-secret') };
        expect(Array.from(unframe(frame(payload, framingConfig), framingConfig))).toEqual(Array.from(payload));
    });

    it('ignores bits after the declared payload', () => {
        const stream = frame(textEncoder.encode('HI'), plain);
        const padded = { bytes: new Uint8Array([...stream.bytes, 0xde, 0xad]), bitLength: stream.bitLength + 13 };
        expect(new TextDecoder().decode(unframe(padded, plain))).toBe('HI');
    });

    it('reports a wrong key as a checksum mismatch', () => {
        const stream = frame(textEncoder.encode('HELLO WORLD'), keyed);
        const error = captureError(() =>
            unframe(stream, { ...plain, obfuscationKey: textEncoder.encode('wrong-secret') }),
        );
        expect(error).toBeInstanceOf(ChecksumMismatchError);
        expect(error).toBeInstanceOf(FrameError);
        expect(error).toHaveProperty('expected', 0x87e5865b);
        expect(error).toHaveProperty('payload.length', 11);
    });

    it('detects a flipped payload bit', () => {
        const stream = frame(textEncoder.encode('HI'), plain);
        stream.bytes[9] ^= 0x01;
        const error = captureError(() => unframe(stream, plain));
        expect(error).toBeInstanceOf(ChecksumMismatchError);
        expect(error).toHaveProperty('message', 'Checksum mismatch: frame declares 0x76792ec6, payload hashes to 0x' +
            crc32(textEncoder.encode('HH')).toString(16).padStart(8, '0'));
    });

    it('rejects streams shorter than their declared payload', () => {
        const stream = frame(textEncoder.encode('HI'), plain);
        const error = captureError(() => unframe({ bytes: stream.bytes, bitLength: 72 }, plain));
        expect(error).toBeInstanceOf(TruncatedStreamError);
        expect(error).toHaveProperty('message', 'Frame declares 2 payload bytes but only 1 bytes are available');
    });

    it('rejects a header cut short', () => {
        const error = captureError(() => readFrameHeader(new Uint8Array(3)));
        expect(error).toBeInstanceOf(TruncatedStreamError);
        expect(error).toHaveProperty('message', 'Frame header needs 8 bytes but only 3 are available');
    });

    it('parses the header fields', () => {
        expect(readFrameHeader(new Uint8Array([0, 0, 1, 0, 0xde, 0xad, 0xbe, 0xef]))).toEqual({
            payloadLength: 256,
            checksum: 0xdeadbeef,
        });
    });
});
