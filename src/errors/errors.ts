/**
 * Shared error hierarchy for consistent error handling.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CLI_INVALID_PATH'
  | 'PROCESS_SPAWN_FAILED'
  | 'BINARY_NOT_FOUND'
  | 'REGISTRY_INVALID'
  | 'UNEXPECTED_ERROR';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * Base error carrying a stable code, optional details and the original cause.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

export class CliError extends AppError {}
export class ProcessError extends AppError {}
export class BinaryError extends AppError {}

/**
 * Format an arbitrary error into a concise string for logging or display.
 *
 * @param error - The error value to format (may be an Error, AppError, or other).
 * @returns A short string representation of the error.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * True for the errors that mean a step's tool could not be run at all.
 */
export function isToolMissingError(error: unknown): boolean {
  return (
    (error instanceof BinaryError && error.code === 'BINARY_NOT_FOUND') ||
    (error instanceof ProcessError && error.code === 'PROCESS_SPAWN_FAILED')
  );
}
