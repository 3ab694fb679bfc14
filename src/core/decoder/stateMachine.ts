// src/core/decoder/stateMachine.ts

import type { IEmbedConfig, IExtractOptions } from '../../@types';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { ExtractStates } from '../../stateMachine/definedStates';
import { readBufferFromFile, writeBufferToFile } from '../../utils/storage/storageUtils';
import { extract, resolveEmbedConfig } from '../engine';
import { ChecksumMismatchError } from '../errors';

export class ExtractStateMachine extends AbstractStateMachine<ExtractStates, IExtractOptions> {
    private embedConfig: Readonly<IEmbedConfig> | null = null;
    private stegoBytes: Uint8Array | null = null;
    private payload: Uint8Array | null = null;

    constructor(options: IExtractOptions) {
        super(ExtractStates.INIT, options);
        this.stateTransitions = [
            { state: ExtractStates.INIT, handler: this.init },
            { state: ExtractStates.VALIDATE_CONFIG, handler: this.validateConfig },
            { state: ExtractStates.READ_STEGO_IMAGE, handler: this.readStegoImage },
            { state: ExtractStates.EXTRACT_PAYLOAD, handler: this.extractPayload },
            { state: ExtractStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    protected getCompletionState(): ExtractStates {
        return ExtractStates.COMPLETED;
    }

    protected getErrorState(): ExtractStates {
        return ExtractStates.ERROR;
    }

    private init(): void {
        const { logger, verbose } = this.options;
        if (verbose) logger.info('Initializing extraction process...');
    }

    private validateConfig(): void {
        this.embedConfig = resolveEmbedConfig(this.options.embedConfig);
    }

    private async readStegoImage(): Promise<void> {
        const { logger, stegoImage } = this.options;
        this.stegoBytes = await readBufferFromFile(stegoImage);
        logger.debug(`Stego image "${stegoImage}" read (${this.stegoBytes.length} bytes).`);
    }

    /**
     * Extracts and verifies the payload. A checksum mismatch aborts unless the caller
     * accepts damaged data, in which case the recovered bytes are kept with a warning.
     */
    private extractPayload(): void {
        const { logger, acceptChecksumMismatch } = this.options;
        if (!this.stegoBytes || !this.embedConfig) {
            throw new Error(`Stego image is not available in state ${this.state}`);
        }
        const result = extract(this.stegoBytes, this.embedConfig);
        if (result.ok) {
            this.payload = result.value;
            logger.info(`Extracted ${result.value.length} bytes of payload.`);
            return;
        }
        if (acceptChecksumMismatch && result.error instanceof ChecksumMismatchError) {
            logger.warn(`${result.error.message}. Keeping the recovered bytes anyway.`);
            this.payload = result.error.payload;
            return;
        }
        logger.debug(`Extraction failed during the ${result.stage} stage.`);
        throw result.error;
    }

    private async writeOutput(): Promise<void> {
        const { logger, outputFile } = this.options;
        if (!this.payload) {
            throw new Error(`Payload is not available in state ${this.state}`);
        }
        await writeBufferToFile(outputFile, this.payload);
        logger.success(`Payload written to "${outputFile}".`);
    }
}
