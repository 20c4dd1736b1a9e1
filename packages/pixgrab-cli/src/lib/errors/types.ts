/**
 * Error codes for every failure the CLI can report.
 * Pipeline codes describe a single URL; the rest describe CLI setup.
 */
export type ErrorCode =
  // Per-URL pipeline errors
  | "INVALID_URL"
  | "NETWORK_ERROR"
  | "HTTP_ERROR"
  | "UNSUPPORTED_TYPE"
  | "TOO_LARGE"
  | "WRITE_ERROR"
  | "DIRECTORY_ERROR"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  | "INTERACTIVE_UNAVAILABLE"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  /** URL the error relates to, for per-URL failures */
  url?: string;
  /** HTTP status, for HTTP_ERROR */
  status?: number;
  cause?: unknown;
}

/**
 * Extended Error class for CLI errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;
  readonly url?: string;
  readonly status?: number;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.example = options.example;
    this.details = options.details;
    this.url = options.url;
    this.status = options.status;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
