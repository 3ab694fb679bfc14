// src/utils/storage/storageUtils.ts

import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

/**
 * Ensures that the specified output directory exists, creating it and any
 * missing parents.
 *
 * @param {string} outputFolder - The path of the output directory to ensure.
 * @return {Promise<void>}
 */
export async function ensureOutputDirectory(outputFolder: string): Promise<void> {
    await mkdir(outputFolder, { recursive: true });
}

/**
 * Writes a buffer to a file at the specified path, creating the parent directory first.
 *
 * @param {string} filePath - The path of the file where the data will be written.
 * @param {Uint8Array} data - The data to write.
 * @return {Promise<void>}
 */
export async function writeBufferToFile(filePath: string, data: Uint8Array): Promise<void> {
    await ensureOutputDirectory(path.dirname(filePath));
    await writeFile(filePath, data);
}

/**
 * Reads the whole file at the given path.
 *
 * @param {string} filePath - The path of the file to read.
 * @return {Promise<Uint8Array>} The file contents.
 * @throws {Error} When no regular file exists at `filePath`.
 */
export async function readBufferFromFile(filePath: string): Promise<Uint8Array> {
    if (!(await isRegularFile(filePath))) {
        throw new Error(`File not found: ${filePath}`);
    }
    const data = await readFile(filePath);
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Checks whether a regular file exists at the given path.
 *
 * @param {string} filePath - The path to check.
 * @return {Promise<boolean>} False for missing paths and directories.
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            return false;
        }
        throw error;
    }
}

/**
 * Checks whether the filename ends in `.png`, ignoring case.
 *
 * @param {string} filename - The filename to check.
 * @return {boolean}
 */
export function hasPngExtension(filename: string): boolean {
    return path.extname(filename).toLowerCase() === '.png';
}
