#!/usr/bin/env node
// src/cli/index.ts

import { Command } from 'commander';
import figlet from 'figlet';
import { rainbow } from 'gradient-string';
import path from 'node:path';
import type { IProgressBar } from '../@types';
import { config } from '../config';
import { embedFile } from '../core/encoder';
import { extractFile } from '../core/decoder';
import { inspectCapacity, unwrapResult } from '../core/engine';
import { EmbedStates, ExtractStates, progressSteps } from '../stateMachine/definedStates';
import { generateCoverImage } from '../utils/imageProcessing/coverImage';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils';
import { readBufferFromFile, writeBufferToFile } from '../utils/storage/storageUtils';
import {
    createProgressBar,
    exitCodeFor,
    type ICodecCommandOptions,
    parseInteger,
    shouldReportFailure,
    toEmbedConfigInput,
} from './options';

interface IEmbedCommandOptions extends ICodecCommandOptions {
    input: string;
    dataFile: string;
    output: string;
    verify: boolean;
}

interface IExtractCommandOptions extends ICodecCommandOptions {
    input: string;
    output: string;
    force?: boolean;
}

interface ICoverCommandOptions {
    output: string;
    width: number;
    height: number;
    alpha?: boolean;
}

const cliLogger = getLogger('cli', console);

function fail(error: unknown, report = true): never {
    if (report) {
        cliLogger.error(error instanceof Error ? error.message : String(error));
    }
    process.exit(exitCodeFor(error));
}

function addCodecOptions(command: Command): Command {
    return command
        .option('-b, --bits <number>', 'Low-order bits overwritten per channel, 1-4 (Default: 1)', parseInteger)
        .option('-a, --alpha', 'Also carry data in the alpha channel of RGBA images')
        .option('-k, --key <key>', 'Obfuscation key')
        .option('-e, --obfuscate', 'Prompt for an obfuscation key')
        .option('--scheme <scheme>', 'Obfuscation keystream: xor or sha256-xor (Default: xor)')
        .option('-l, --log', 'Enable logging')
        .option('-v, --verbose', 'Enable verbose logging');
}

export function createProgram(): Command {
    const program = new Command();
    program
        .name('lsb-stash')
        .description('Hide data in the least-significant bits of PNG images')
        .version('1.0.0');

    addCodecOptions(
        program
            .command('embed')
            .description('Embed a file into a PNG image')
            .requiredOption('-i, --input <file>', 'Cover PNG image')
            .requiredOption('-d, --data-file <file>', 'File whose contents are embedded')
            .option('-o, --output <file>', 'Output PNG image', config.defaultOutputFile)
            .option('--no-verify', 'Skip extracting the payload again before writing'),
    )
        .showHelpAfterError()
        .action(async (options: IEmbedCommandOptions) => {
            const isLogging = options.log || false;
            const verbose = options.verbose || false;
            const logger = getLogger('embed', isLogging ? console : NoopLogFacility, verbose);
            let progressBar: IProgressBar | undefined;
            try {
                const embedConfig = await toEmbedConfigInput(options, true);
                if (!isLogging) {
                    progressBar = createProgressBar(progressSteps(EmbedStates));
                }
                await embedFile({
                    coverImage: path.resolve(options.input),
                    dataFile: path.resolve(options.dataFile),
                    outputFile: path.resolve(options.output),
                    embedConfig,
                    verbose,
                    logger,
                    verify: options.verify,
                    progressBar,
                });
                progressBar?.stop();
            } catch (error) {
                progressBar?.stop();
                fail(error, shouldReportFailure(logger, isLogging));
            }
        });

    addCodecOptions(
        program
            .command('extract')
            .description('Extract a hidden payload from a PNG image')
            .requiredOption('-i, --input <file>', 'PNG image carrying the payload')
            .requiredOption('-o, --output <file>', 'File the payload is written to')
            .option('--force', 'Write the payload even when its checksum does not match'),
    )
        .showHelpAfterError()
        .action(async (options: IExtractCommandOptions) => {
            const isLogging = options.log || false;
            const verbose = options.verbose || false;
            const logger = getLogger('extract', isLogging ? console : NoopLogFacility, verbose);
            let progressBar: IProgressBar | undefined;
            try {
                const embedConfig = await toEmbedConfigInput(options, false);
                if (!isLogging) {
                    progressBar = createProgressBar(progressSteps(ExtractStates));
                }
                await extractFile({
                    stegoImage: path.resolve(options.input),
                    outputFile: path.resolve(options.output),
                    embedConfig,
                    verbose,
                    logger,
                    acceptChecksumMismatch: options.force || false,
                    progressBar,
                });
                progressBar?.stop();
            } catch (error) {
                progressBar?.stop();
                fail(error, shouldReportFailure(logger, isLogging));
            }
        });

    program
        .command('capacity')
        .description('Show how many payload bytes a PNG image can carry')
        .requiredOption('-i, --input <file>', 'Cover PNG image')
        .option('-b, --bits <number>', 'Low-order bits overwritten per channel, 1-4 (Default: 1)', parseInteger)
        .option('-a, --alpha', 'Also carry data in the alpha channel of RGBA images')
        .action(async (options: { input: string; bits?: number; alpha?: boolean }) => {
            try {
                const png = await readBufferFromFile(path.resolve(options.input));
                const report = unwrapResult(
                    inspectCapacity(png, { bitsPerChannel: options.bits, useAlphaChannel: options.alpha }),
                );
                cliLogger.info(
                    `${report.eligibleSamples} eligible samples, ${report.payloadBytes} payload bytes ` +
                        `(${report.frameBytes} bytes including the frame header).`,
                );
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('cover')
        .description('Generate a noise PNG to use as a cover image')
        .option('-o, --output <file>', 'Output PNG image', 'cover.png')
        .option('-w, --width <pixels>', 'Image width', parseInteger, config.coverImage.width)
        .option('-H, --height <pixels>', 'Image height', parseInteger, config.coverImage.height)
        .option('--alpha', 'Generate an RGBA image')
        .action(async (options: ICoverCommandOptions) => {
            try {
                const png = await generateCoverImage({
                    width: options.width,
                    height: options.height,
                    format: options.alpha ? 'rgba' : 'rgb',
                });
                const outputFile = path.resolve(options.output);
                await writeBufferToFile(outputFile, png);
                cliLogger.success(`Cover image ${options.width}x${options.height} written to "${outputFile}".`);
            } catch (error) {
                fail(error);
            }
        });

    return program;
}

function printBanner(): void {
    console.clear();
    console.log(rainbow.multiline(
        figlet.textSync('LSB-Stash', {
            font: 'Roman',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
    console.log(rainbow('Hide data in the least-significant bits of PNG images.\n'));
}

if (require.main === module) {
    printBanner();
    createProgram()
        .parseAsync(process.argv)
        .catch(fail);
}
