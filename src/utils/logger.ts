import { readPrefixedEnvFlag } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
  readonly child: (scope: string) => Logger;
};

export type ConsoleLoggerOptions = {
  /** Defaults to `ABLATIONS_DEBUG`. */
  readonly debug?: boolean;
};

export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? readPrefixedEnvFlag("DEBUG");
  const prefix = `[${scope}]`;
  return {
    debug: (message) => {
      if (debugEnabled) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info: (message) => {
      console.log(`${prefix} ${message}`);
    },
    warn: (message) => {
      console.warn(`${prefix} ${message}`);
    },
    error: (message) => {
      console.error(`${prefix} ${message}`);
    },
    child: (childScope) => createConsoleLogger(`${scope}:${childScope}`, { debug: debugEnabled }),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
