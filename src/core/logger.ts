import { log } from "@clack/prompts";

export interface ExportLogger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ClackLoggerOptions {
  verbose?: boolean;
}

export function createClackLogger(options: ClackLoggerOptions = {}): ExportLogger {
  return {
    debug(message) {
      if (options.verbose) log.message(message);
    },
    info(message) {
      log.info(message);
    },
    success(message) {
      log.success(message);
    },
    warn(message) {
      log.warn(message);
    },
    error(message) {
      log.error(message);
    }
  };
}

export const silentLogger: ExportLogger = {
  debug() {},
  info() {},
  success() {},
  warn() {},
  error() {}
};
