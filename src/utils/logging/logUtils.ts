// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types';

import chalk from 'chalk';

const loggerMap: Record<string, ILogger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing coloured, level-prefixed lines to a log facility.
 * Debug lines only reach the facility in verbose mode but are always recorded.
 */
class Logger implements ILogger {
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.facility.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
    }

    success(message: string) {
        this.facility.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
    }

    warn(message: string) {
        this.facility.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.facility.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.facility.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        this.debugMessages.push(message);
    }
}

/**
 * Retrieves a logger by name, creating it on first use. Later calls with the same
 * name return the cached instance and ignore the remaining arguments.
 *
 * @param name - identifier printed in every line
 * @param logFacility - where formatted lines are sent
 * @param verbose - print debug lines
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    const existing = loggerMap[name];
    if (existing) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}
