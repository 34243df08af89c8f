import ora, { Ora } from 'ora';

export interface Logger {
  info(message: string): void;
  succeed(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Printed only in verbose mode. */
  debug(message: string): void;
  /** Shows a transient status line; a no-op when nothing is rendered. */
  progress(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const spinner: Ora = ora({ isSilent: options.silent });

  return {
    info: (message) => spinner.info(message),
    succeed: (message) => spinner.succeed(message),
    warn: (message) => spinner.warn(message),
    error: (message) => spinner.fail(message),
    debug: (message) => {
      if (options.verbose) {
        spinner.stopAndPersist({ symbol: ' ', text: message });
      }
    },
    progress: (message) => {
      spinner.start(message);
    },
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  info: noop,
  succeed: noop,
  warn: noop,
  error: noop,
  debug: noop,
  progress: noop,
};
