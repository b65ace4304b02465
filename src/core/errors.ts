/**
 * worksession error type with exit code integration.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/** Coarse error category, derived from the exit code range. */
export type ErrorCategory = 'NOT_FOUND' | 'VALIDATION' | 'CONFLICT' | 'SESSION' | 'GATEWAY' | 'INTERNAL';

/**
 * Map numeric exit codes to an error category.
 */
export function exitCodeToCategory(code: ExitCode): ErrorCategory {
  if (code >= 1 && code <= 9) {
    switch (code) {
      case ExitCode.NOT_FOUND: return 'NOT_FOUND';
      case ExitCode.INVALID_INPUT: return 'VALIDATION';
      case ExitCode.VALIDATION_ERROR: return 'VALIDATION';
      case ExitCode.CONFIG_ERROR: return 'VALIDATION';
      case ExitCode.LOCK_TIMEOUT: return 'CONFLICT';
      default: return 'INTERNAL';
    }
  }
  if (code >= 20 && code <= 29) return 'CONFLICT'; // concurrency
  if (code >= 30 && code <= 39) return 'SESSION';
  if (code >= 40 && code <= 49) return 'GATEWAY';
  return 'INTERNAL';
}

/** Error body of the CLI error envelope. */
export interface ErrorDetail {
  code: ExitCode;
  name: string;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  fix?: string;
  cause?: string;
}

/**
 * Structured error class for worksession operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class WorkSessionError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'WorkSessionError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Category of this error (see {@link exitCodeToCategory}). */
  get category(): ErrorCategory {
    return exitCodeToCategory(this.code);
  }

  /** Whether retrying the same operation may succeed. */
  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation used by the CLI error envelope. */
  toJSON(): { success: false; error: ErrorDetail } {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        category: this.category,
        message: this.message,
        retryable: this.retryable,
        ...(this.fix && { fix: this.fix }),
        ...(this.cause !== undefined && { cause: describeCause(this.cause) }),
      },
    };
  }
}

/**
 * Render any thrown value as a one-line message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function describeCause(cause: unknown): string {
  return errorMessage(cause);
}

/**
 * Wrap an unknown error in a WorkSessionError unless it already is one.
 */
export function toWorkSessionError(
  err: unknown,
  code: ExitCode = ExitCode.GENERAL_ERROR,
  message?: string,
): WorkSessionError {
  if (err instanceof WorkSessionError) return err;
  return new WorkSessionError(code, message ?? errorMessage(err), { cause: err });
}
