/**
 * Backlog exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  DEPENDENCY_UNMET = 5,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === GRAPH / LIFECYCLE ERRORS (10-19) ===
  ILLEGAL_TRANSITION = 10,
  INVALID_STATE = 11,
  CIRCULAR_REFERENCE = 14,
  ACCEPTANCE_INCOMPLETE = 17,

  // === CONCURRENCY ERRORS (20-29) ===
  CHECKSUM_MISMATCH = 20,
  CONCURRENT_MODIFICATION = 21,
  ID_COLLISION = 22,

  // === SESSION / ADMISSION ERRORS (30-39) ===
  SESSION_EXISTS = 30,
  SESSION_NOT_FOUND = 31,
  RESOURCE_CONFLICT = 32,
  TASK_NOT_IN_SCOPE = 34,
  ACTIVE_LIMIT_EXCEEDED = 35,
  SESSION_CLOSE_BLOCKED = 37,

  // === SPECIAL CODES (100+) - NOT errors ===
  NO_DATA = 100,
  ALREADY_EXISTS = 101,
  NO_CHANGE = 102,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.FILE_ERROR,
    ExitCode.CIRCULAR_REFERENCE,
    ExitCode.ILLEGAL_TRANSITION,
    ExitCode.VALIDATION_ERROR,
    ExitCode.CONFIG_ERROR,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
