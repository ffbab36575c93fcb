import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Send everything to stderr, keeping stdout clean for json/csv reports. */
  stderr?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const out = options.stderr ? console.error : console.log;

  return {
    debug(message) {
      if (options.verbose) {
        out(chalk.gray(message));
      }
    },
    info(message) {
      out(message);
    },
    warn(message) {
      console.error(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
