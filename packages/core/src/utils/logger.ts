import chalk from "chalk";

export interface Logger {
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /**
     * Only printed in verbose mode
     */
    debug(message: string): void;
}

export interface ConsoleLoggerOptions {
    verbose?: boolean;
}

export function createConsoleLogger(
    options: ConsoleLoggerOptions = {},
): Logger {
    return {
        info: (message) => console.log(chalk.gray(message)),
        success: (message) => console.log(chalk.green(message)),
        warn: (message) => console.log(chalk.yellow(message)),
        error: (message) => console.error(chalk.red(message)),
        debug: (message) => {
            if (options.verbose) {
                console.log(chalk.magenta(message));
            }
        },
    };
}

const noop = (): void => {};

export const silentLogger: Logger = {
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    debug: noop,
};
