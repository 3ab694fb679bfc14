// src/core/encoder/stateMachine.ts

import type { IEmbedConfig, IEmbedOptions } from '../../@types';
import path from 'node:path';
import { AbstractStateMachine } from '../../stateMachine/AbstractStateMachine';
import { EmbedStates } from '../../stateMachine/definedStates';
import { readBufferFromFile, hasPngExtension, writeBufferToFile } from '../../utils/storage/storageUtils';
import { compareUint8ArraysQuick } from '../../utils/serialization/serializationHelpers';
import { ensureFits } from '../capacity';
import { embed, extract, inspectCapacity, resolveEmbedConfig, unwrapResult } from '../engine';
import { InvalidConfigError } from '../errors';

export class EmbedStateMachine extends AbstractStateMachine<EmbedStates, IEmbedOptions> {
    private embedConfig: Readonly<IEmbedConfig> | null = null;
    private coverBytes: Uint8Array | null = null;
    private payload: Uint8Array | null = null;
    private stegoBytes: Uint8Array | null = null;

    constructor(options: IEmbedOptions) {
        super(EmbedStates.INIT, options);
        this.stateTransitions = [
            { state: EmbedStates.INIT, handler: this.init },
            { state: EmbedStates.VALIDATE_CONFIG, handler: this.validateConfig },
            { state: EmbedStates.READ_COVER_IMAGE, handler: this.readCoverImage },
            { state: EmbedStates.READ_PAYLOAD, handler: this.readPayload },
            { state: EmbedStates.ANALYZE_CAPACITY, handler: this.analyzeCapacity },
            { state: EmbedStates.EMBED_PAYLOAD, handler: this.embedPayload },
            { state: EmbedStates.VERIFY_EMBEDDING, handler: this.verifyEmbedding },
            { state: EmbedStates.WRITE_OUTPUT, handler: this.writeOutput },
        ];
    }

    protected getCompletionState(): EmbedStates {
        return EmbedStates.COMPLETED;
    }

    protected getErrorState(): EmbedStates {
        return EmbedStates.ERROR;
    }

    /**
     * Returns the value set by an earlier state, failing loudly if the order was broken.
     */
    private require<T>(value: T | null, what: string): T {
        if (value === null) {
            throw new Error(`${what} is not available in state ${this.state}`);
        }
        return value;
    }

    private init(): void {
        const { logger, verbose } = this.options;
        if (verbose) logger.info('Initializing embedding process...');
    }

    private validateConfig(): void {
        const { logger, coverImage, embedConfig } = this.options;
        if (!hasPngExtension(coverImage)) {
            throw new InvalidConfigError(`Cover image must be a PNG file: ${coverImage}`);
        }
        this.embedConfig = resolveEmbedConfig(embedConfig);
        logger.debug(
            `Embedding with ${this.embedConfig.bitsPerChannel} bit(s) per channel, alpha ${
                this.embedConfig.useAlphaChannel ? 'used' : 'skipped'
            }, obfuscation ${this.embedConfig.obfuscationKey ? this.embedConfig.obfuscationScheme : 'off'}.`,
        );
    }

    private async readCoverImage(): Promise<void> {
        const { logger, coverImage } = this.options;
        logger.debug(`Reading cover image: ${coverImage}`);
        this.coverBytes = await readBufferFromFile(coverImage);
        logger.debug(`Cover image "${path.basename(coverImage)}" read (${this.coverBytes.length} bytes).`);
    }

    private async readPayload(): Promise<void> {
        const { logger, dataFile } = this.options;
        this.payload = await readBufferFromFile(dataFile);
        logger.info(`Read ${this.payload.length} bytes of payload from "${dataFile}".`);
    }

    /**
     * Reports how much the cover holds and stops early when the payload does not fit.
     */
    private analyzeCapacity(): void {
        const { logger } = this.options;
        const coverBytes = this.require(this.coverBytes, 'Cover image');
        const payload = this.require(this.payload, 'Payload');
        const report = unwrapResult(inspectCapacity(coverBytes, this.require(this.embedConfig, 'Config')));
        logger.info(
            `Cover image holds ${report.payloadBytes} payload bytes (${report.eligibleSamples} eligible samples).`,
        );
        ensureFits(report.frameBytes, payload.length);
    }

    private embedPayload(): void {
        const { logger } = this.options;
        logger.info('Embedding payload...');
        this.stegoBytes = unwrapResult(
            embed(
                this.require(this.coverBytes, 'Cover image'),
                this.require(this.payload, 'Payload'),
                this.require(this.embedConfig, 'Config'),
            ),
        );
        logger.debug(`Stego image encoded (${this.stegoBytes.length} bytes).`);
    }

    /**
     * Extracts the payload back from the in-memory result before anything is written.
     */
    private verifyEmbedding(): void {
        const { logger, verify } = this.options;
        if (verify === false) {
            logger.info('Verification step skipped.');
            return;
        }
        const recovered = unwrapResult(
            extract(this.require(this.stegoBytes, 'Stego image'), this.require(this.embedConfig, 'Config')),
        );
        if (!compareUint8ArraysQuick(recovered, this.require(this.payload, 'Payload'))) {
            throw new Error('Verification failed: extracted payload does not match the original data.');
        }
        logger.success('Verification successful: extracted payload matches original data.');
    }

    private async writeOutput(): Promise<void> {
        const { logger, outputFile } = this.options;
        await writeBufferToFile(outputFile, this.require(this.stegoBytes, 'Stego image'));
        logger.success(`Data successfully embedded in "${outputFile}".`);
    }
}
