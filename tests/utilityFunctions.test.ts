// tests/utilityFunctions.test.ts

import { createHash } from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import type { ILogFacility } from '../src/@types';
import { crc32, updateCrc32 } from '../src/utils/checksum/crc32';
import { applyObfuscation } from '../src/utils/cryptography/obfuscation';
import {
    isSupportedObfuscationStrategy,
    SupportedObfuscationStrategies,
} from '../src/utils/cryptography/obfuscationStrategies';
import { getLogger } from '../src/utils/logging/logUtils';
import {
    compareUint8ArraysQuick,
    concatUint8Arrays,
    deserializeUInt32,
    serializeUInt32,
} from '../src/utils/serialization/serializationHelpers';
import {
    hasPngExtension,
    isRegularFile,
    readBufferFromFile,
    writeBufferToFile,
} from '../src/utils/storage/storageUtils';
import { textEncoder } from './helpers/fixtures';

describe('Utility functions', () => {
    describe('crc32', () => {
        it('matches the standard check values', () => {
            expect(crc32(textEncoder.encode('123456789'))).toBe(0xcbf43926);
            expect(crc32(textEncoder.encode('HI'))).toBe(0x76792ec6);
            expect(crc32(new Uint8Array(0))).toBe(0);
        });

        it('can be continued across buffers', () => {
            const first = crc32(textEncoder.encode('1234'));
            expect(updateCrc32(first, textEncoder.encode('56789'))).toBe(0xcbf43926);
        });
    });

    describe('serialization helpers', () => {
        it('writes and reads big-endian u32 values', () => {
            expect(Array.from(serializeUInt32(0x01020304))).toEqual([1, 2, 3, 4]);
            expect(Array.from(serializeUInt32(0xffffffff))).toEqual([255, 255, 255, 255]);
        });

        it('respects the byte offset of a subarray', () => {
            const buffer = new Uint8Array([9, 9, 0, 0, 1, 0, 7]);
            expect(deserializeUInt32(buffer.subarray(2), 0)).toEqual({ value: 256, newOffset: 4 });
        });

        it('concatenates and compares arrays', () => {
            const joined = concatUint8Arrays([new Uint8Array([1]), new Uint8Array(0), new Uint8Array([2, 3])]);
            expect(compareUint8ArraysQuick(joined, new Uint8Array([1, 2, 3]))).toBe(true);
            expect(compareUint8ArraysQuick(joined, new Uint8Array([1, 2]))).toBe(false);
        });
    });

    describe('obfuscation', () => {
        const key = textEncoder.encode('test-secret');

        it('repeats the key across the data', () => {
            const out = applyObfuscation(
                new Uint8Array([0x00, 0xff]),
                new Uint8Array([0x0f]),
                SupportedObfuscationStrategies.RepeatingKeyXor,
            );
            expect(Array.from(out)).toEqual([0x0f, 0xf0]);
            expect(
                Array.from(
                    applyObfuscation(
                        new Uint8Array([1, 2, 3]),
                        new Uint8Array([1, 2]),
                        SupportedObfuscationStrategies.RepeatingKeyXor,
                    ),
                ),
            ).toEqual([0, 0, 2]);
        });

        it('derives the hash keystream from the key and block index', () => {
            const data = new Uint8Array(40).fill(0);
            const out = applyObfuscation(data, key, SupportedObfuscationStrategies.HashStreamXor);
            const block0 = createHash('sha256').update(key).update(new Uint8Array([0, 0, 0, 0])).digest();
            const block1 = createHash('sha256').update(key).update(new Uint8Array([0, 0, 0, 1])).digest();
            expect(Array.from(out.subarray(0, 32))).toEqual(Array.from(block0));
            expect(Array.from(out.subarray(32))).toEqual(Array.from(block1.subarray(0, 8)));
        });

        it.each(Object.values(SupportedObfuscationStrategies))('%s is its own inverse', (scheme) => {
            const data = textEncoder.encode('attack at dawn');
            const once = applyObfuscation(data, key, scheme);
            expect(compareUint8ArraysQuick(once, data)).toBe(false);
            expect(Array.from(applyObfuscation(once, key, scheme))).toEqual(Array.from(data));
        });

        it('passes data through without a key', () => {
            const data = new Uint8Array([1, 2, 3]);
            expect(applyObfuscation(data, undefined, SupportedObfuscationStrategies.HashStreamXor)).toBe(data);
        });

        it('recognises scheme names', () => {
            expect(isSupportedObfuscationStrategy('xor')).toBe(true);
            expect(isSupportedObfuscationStrategy('sha256-xor')).toBe(true);
            expect(isSupportedObfuscationStrategy('aes')).toBe(false);
        });
    });

    describe('storage utilities', () => {
        let tmpDir: string;

        beforeEach(async () => {
            tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'lsb-storage-'));
        });

        afterEach(async () => {
            await fs.promises.rm(tmpDir, { recursive: true, force: true });
        });

        it('writes into directories that do not exist yet', async () => {
            const target = path.join(tmpDir, 'nested', 'deeper', 'data.bin');
            await writeBufferToFile(target, new Uint8Array([4, 5, 6]));
            expect(Array.from(await readBufferFromFile(target))).toEqual([4, 5, 6]);
            expect(await isRegularFile(target)).toBe(true);
        });

        it('reports missing files', async () => {
            const missing = path.join(tmpDir, 'missing.png');
            expect(await isRegularFile(missing)).toBe(false);
            expect(await isRegularFile(tmpDir)).toBe(false);
            await expect(readBufferFromFile(missing)).rejects.toThrow(`File not found: ${missing}`);
        });

        it('detects PNG file names', () => {
            expect(hasPngExtension('cover.PNG')).toBe(true);
            expect(hasPngExtension('cover.png.txt')).toBe(false);
        });
    });

    describe('logger', () => {
        function captureFacility(): ILogFacility & { lines: string[] } {
            const lines: string[] = [];
            const push = (...input: unknown[]) => {
                lines.push(stripVTControlCharacters(input.map(String).join(' ')));
            };
            return { lines, log: push, warn: push, error: push };
        }

        it('prefixes lines with level and name', () => {
            const facility = captureFacility();
            const logger = getLogger('utility-test-plain', facility);
            logger.info('hello');
            logger.warn('careful');
            logger.debug('hidden');
            expect(facility.lines).toEqual(['[INFO] utility-test-plain :: hello', '[WARNING] utility-test-plain :: careful']);
            expect(logger.warnMessages).toEqual(['careful']);
            expect(logger.debugMessages).toEqual(['hidden']);
        });

        it('prints debug lines in verbose mode', () => {
            const facility = captureFacility();
            const logger = getLogger('utility-test-verbose', facility, true);
            logger.debug('shown');
            expect(facility.lines).toEqual(['[DEBUG] utility-test-verbose :: shown']);
        });

        it('returns the cached logger for a known name', () => {
            const first = getLogger('utility-test-cached', captureFacility());
            expect(getLogger('utility-test-cached')).toBe(first);
        });
    });
});
