// src/core/engine/index.ts

export { embed, embedPlane, extract, extractPlane, inspectCapacity } from './stegoEngine';
export { resolveEmbedConfig } from './embedConfig';
export { eligibleSampleIndices } from './traversal';
export { unwrapResult } from './result';
