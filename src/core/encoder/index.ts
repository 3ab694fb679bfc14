// src/core/encoder/index.ts

import type { IEmbedOptions } from '../../@types';

import { EmbedStateMachine } from './stateMachine';

/**
 * Embeds the contents of `options.dataFile` into `options.coverImage` and writes the
 * result to `options.outputFile`. Nothing is written when any step fails.
 */
export async function embedFile(options: IEmbedOptions): Promise<void> {
    const stateMachine = new EmbedStateMachine(options);
    await stateMachine.run();
}
