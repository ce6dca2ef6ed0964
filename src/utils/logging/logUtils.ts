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
 * Logger writing coloured, level-tagged lines to a log facility. Every message
 * is also kept in memory so callers can inspect what was reported.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.logger.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
        this.infoMessages.push(message);
    }

    success(message: string) {
        this.logger.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
        this.successMessages.push(message);
    }

    warn(message: string) {
        this.logger.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.logger.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.logger.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        this.debugMessages.push(message);
    }
}

/**
 * Retrieves logger by name. The first call for a name creates the logger bound
 * to the given facility and verbosity; later calls return that cached instance
 * and ignore their `logFacility` and `verbose` arguments.
 *
 * @param name - The name identifier for the logger.
 * @param logFacility - Where log lines are sent. Only used when the logger is created.
 * @param verbose - Print debug lines as well. Only used when the logger is created.
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
