/**
 * Console reporting with verbose/quiet switches
 */

export type Logger = {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
};

export type LoggerOptions = {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
};

export const createConsoleLogger = (options: LoggerOptions = {}): Logger => ({
  debug: (message) => {
    if (options.verbose && !options.quiet) console.log(message);
  },
  info: (message) => {
    if (!options.quiet) console.log(message);
  },
  warn: (message) => {
    console.error(`Warning: ${message}`);
  },
  error: (message) => {
    console.error(`Error: ${message}`);
  },
});

const discard = (): void => {};

export const silentLogger: Logger = {
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
};
