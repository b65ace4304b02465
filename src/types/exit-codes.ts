/**
 * worksession exit codes.
 * Ranges: 0 = success, 1-99 = errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  DEPENDENCY_ERROR = 5,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === CONCURRENCY ERRORS (20-29) ===
  CONCURRENT_MODIFICATION = 21,

  // === SESSION ERRORS (30-39) ===
  SESSION_EXISTS = 30,
  SESSION_NOT_FOUND = 31,
  RESOURCE_CREATION_FAILED = 32,
  BRANCH_PROTECTED = 33,

  // === GATEWAY ERRORS (40-49) ===
  GATEWAY_FAILED = 40,
  COMMAND_TIMEOUT = 41,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.FILE_ERROR,
    ExitCode.DEPENDENCY_ERROR,
    ExitCode.VALIDATION_ERROR,
    ExitCode.CONFIG_ERROR,
    ExitCode.BRANCH_PROTECTED,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
