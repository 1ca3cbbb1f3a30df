import chalk from 'chalk';

/**
 * Diagnostic sink for a synthesis run. The text is for humans only;
 * nothing downstream parses it.
 */
export interface Logger {
    info(message: string): void;
    success(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Only shown in verbose mode */
    debug(message: string): void;
}

export interface LoggerOptions {
    verbose?: boolean;
    /** Defaults to stderr so stdout stays clean for piping */
    stream?: NodeJS.WritableStream;
}

/**
 * Console logger with the CLI's colour conventions
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const stream = options.stream ?? process.stderr;
    const write = (line: string) => {
        stream.write(line + '\n');
    };

    return {
        info: (message) => write(message),
        success: (message) => write(chalk.green(`✓ ${message}`)),
        warn: (message) => write(chalk.yellow(`⚠ ${message}`)),
        error: (message) => write(chalk.red(`✗ ${message}`)),
        debug: (message) => {
            if (options.verbose) write(chalk.dim(`  ${message}`));
        },
    };
}

export const silentLogger: Logger = {
    info: () => {},
    success: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
};
