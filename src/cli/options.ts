// src/cli/options.ts

import { InvalidArgumentError } from 'commander';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import type { EmbedConfigInput, ILogger, IProgressBar } from '../@types';
import { CapacityError, InvalidConfigError } from '../core/errors';

export interface ICodecCommandOptions {
    bits?: number;
    alpha?: boolean;
    key?: string;
    obfuscate?: boolean;
    scheme?: string;
    log?: boolean;
    verbose?: boolean;
}

export const EXIT_CODES = {
    success: 0,
    failure: 1,
    invalidConfig: 2,
    capacity: 3,
} as const;

/**
 * Commander argument parser for integer options.
 *
 * @param {string} value - The raw option value.
 * @return {number} The parsed integer.
 * @throws {InvalidArgumentError} When the value is not an integer.
 */
export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`"${value}" is not an integer.`);
    }
    return parsed;
}

interface IKeyAnswers {
    key: string;
    confirmKey?: string;
}

async function promptForKey(confirm: boolean): Promise<string> {
    const notEmpty = (value: string) => (value.length === 0 ? 'Key cannot be empty' : true);
    const questions: inquirer.DistinctQuestion<IKeyAnswers>[] = [
        { type: 'password', name: 'key', message: 'Enter obfuscation key:', mask: '*', validate: notEmpty },
    ];
    if (confirm) {
        questions.push({
            type: 'password',
            name: 'confirmKey',
            message: 'Confirm obfuscation key:',
            mask: '*',
            validate: notEmpty,
        });
    }
    const answers = await inquirer.prompt<IKeyAnswers>(questions);
    if (confirm && answers.key !== answers.confirmKey) {
        throw new InvalidConfigError('Keys do not match.');
    }
    return answers.key;
}

/**
 * Turns command options into an embed config input. `--obfuscate` asks for the key
 * interactively (twice when `confirmKey` is set); `--key` wins when both are given.
 */
export async function toEmbedConfigInput(
    options: ICodecCommandOptions,
    confirmKey: boolean,
): Promise<EmbedConfigInput> {
    const key = options.key ?? (options.obfuscate ? await promptForKey(confirmKey) : undefined);
    return {
        bitsPerChannel: options.bits,
        useAlphaChannel: options.alpha,
        obfuscationKey: key,
        obfuscationScheme: options.scheme,
    };
}

/**
 * Maps a failure to the process exit code.
 *
 * @param {unknown} error - The error a command failed with.
 * @return {number} 2 for invalid configuration, 3 for capacity errors, 1 otherwise.
 */
export function exitCodeFor(error: unknown): number {
    if (error instanceof InvalidConfigError) return EXIT_CODES.invalidConfig;
    if (error instanceof CapacityError) return EXIT_CODES.capacity;
    return EXIT_CODES.failure;
}

/**
 * Whether the CLI still has to print a command's failure. With logging on, the state
 * machine has already written the failing state and message through the command logger.
 *
 * @param {ILogger} commandLogger - The logger the command's state machine used.
 * @param {boolean} isLogging - Whether that logger writes to the console.
 * @return {boolean}
 */
export function shouldReportFailure(commandLogger: ILogger, isLogging: boolean): boolean {
    return !isLogging || commandLogger.errorMessages.length === 0;
}

/**
 * Starts a progress bar advanced once per state transition.
 *
 * @param {number} steps - The number of transitions the run will make.
 * @return {IProgressBar} The started bar.
 */
export function createProgressBar(steps: number): IProgressBar {
    const progressBar = new cliProgress.SingleBar({
        format: 'Processing |{bar}| {percentage}% || {value}/{total} state: {state}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
    }, cliProgress.Presets.shades_grey);
    progressBar.start(steps, 0, { state: 'INIT' });
    return progressBar;
}
