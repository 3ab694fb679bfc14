// src/stateMachine/definedStates.ts

export enum EmbedStates {
    INIT = 'INIT',
    VALIDATE_CONFIG = 'VALIDATE_CONFIG',
    READ_COVER_IMAGE = 'READ_COVER_IMAGE',
    READ_PAYLOAD = 'READ_PAYLOAD',
    ANALYZE_CAPACITY = 'ANALYZE_CAPACITY',
    EMBED_PAYLOAD = 'EMBED_PAYLOAD',
    VERIFY_EMBEDDING = 'VERIFY_EMBEDDING',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

export enum ExtractStates {
    INIT = 'INIT',
    VALIDATE_CONFIG = 'VALIDATE_CONFIG',
    READ_STEGO_IMAGE = 'READ_STEGO_IMAGE',
    EXTRACT_PAYLOAD = 'EXTRACT_PAYLOAD',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

/**
 * Number of progress increments a run produces: every working state plus completion.
 */
export function progressSteps(states: Record<string, string>): number {
    return Object.keys(states).length - 1;
}
