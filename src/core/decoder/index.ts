// src/core/decoder/index.ts

import type { IExtractOptions } from '../../@types';

import { ExtractStateMachine } from './stateMachine';

/**
 * Extracts the payload hidden in `options.stegoImage` and writes it to `options.outputFile`.
 */
export async function extractFile(options: IExtractOptions): Promise<void> {
    const stateMachine = new ExtractStateMachine(options);
    await stateMachine.run();
}
