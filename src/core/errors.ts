import type { ExportFailure, ReportFormat } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;
const EXIT_CODE_INTERNAL_INCONSISTENCY = 3;

interface FolioErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class FolioError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: FolioErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends FolioError {
  constructor(message: string, options: FolioErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ConfigError extends FolioError {
  constructor(message: string, options: FolioErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends FolioError {
  constructor(message: string, options: FolioErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

// Exporter wiring is broken, as opposed to bad input or a hostile environment.
export class InternalInconsistencyError extends FolioError {
  constructor(message: string, options: FolioErrorOptions = {}) {
    super(message, "INTERNAL", EXIT_CODE_INTERNAL_INCONSISTENCY, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  return "code" in error && typeof error.code === "string";
}

export function normalizeError(error: unknown): FolioError {
  if (error instanceof FolioError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function failureToError(failure: ExportFailure): FolioError {
  const options = { details: { reason: failure.reason, category: failure.category } };
  if (failure.category === "internal") return new InternalInconsistencyError(failure.message, options);
  if (failure.category === "io") return new ExecutionError(failure.message, options);
  if (failure.reason === "InvalidOptions") return new ConfigError(failure.message, options);
  return new UserInputError(failure.message, options);
}

export function normalizeReportFormat(value: string | undefined): ReportFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --report value "${String(value)}". Expected "text" or "json".`);
}

export function resolveReportFormatFromArgv(argv: string[]): ReportFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--report") {
      const next = argv[index + 1];
      if (!next) return "text";
      return next.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--report=")) continue;
    const value = token.slice("--report=".length).trim().toLowerCase();
    return value === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: FolioError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
