/**
 * Backlog error types with exit code integration.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/** Error kinds surfaced to callers of the engine. */
export type ErrorKind =
  | 'NotFound'
  | 'IllegalTransition'
  | 'DependencyUnmet'
  | 'CycleDetected'
  | 'ActiveLimitExceeded'
  | 'ResourceConflict'
  | 'AcceptanceCriteriaIncomplete'
  | 'Conflict'
  | 'InvalidState'
  | 'SessionExists'
  | 'SessionCloseBlocked'
  | 'ValidationError'
  | 'LockTimeout'
  | 'InternalError';

/** Map a numeric exit code to its error kind. */
export function errorKind(code: ExitCode): ErrorKind {
  switch (code) {
    case ExitCode.NOT_FOUND:
    case ExitCode.SESSION_NOT_FOUND:
      return 'NotFound';
    case ExitCode.ILLEGAL_TRANSITION: return 'IllegalTransition';
    case ExitCode.DEPENDENCY_UNMET: return 'DependencyUnmet';
    case ExitCode.CIRCULAR_REFERENCE: return 'CycleDetected';
    case ExitCode.ACTIVE_LIMIT_EXCEEDED: return 'ActiveLimitExceeded';
    case ExitCode.RESOURCE_CONFLICT: return 'ResourceConflict';
    case ExitCode.ACCEPTANCE_INCOMPLETE: return 'AcceptanceCriteriaIncomplete';
    case ExitCode.CONCURRENT_MODIFICATION:
    case ExitCode.CHECKSUM_MISMATCH:
      return 'Conflict';
    case ExitCode.INVALID_STATE:
    case ExitCode.TASK_NOT_IN_SCOPE:
      return 'InvalidState';
    case ExitCode.SESSION_EXISTS: return 'SessionExists';
    case ExitCode.SESSION_CLOSE_BLOCKED: return 'SessionCloseBlocked';
    case ExitCode.INVALID_INPUT:
    case ExitCode.VALIDATION_ERROR:
    case ExitCode.CONFIG_ERROR:
      return 'ValidationError';
    case ExitCode.LOCK_TIMEOUT: return 'LockTimeout';
    default: return 'InternalError';
  }
}

/**
 * Structured error class for backlog operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class BacklogError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'BacklogError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  get kind(): ErrorKind {
    return errorKind(this.code);
  }

  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        kind: this.kind,
        message: this.message,
        ...(this.fix && { fix: this.fix }),
        ...(this.details && { details: this.details }),
      },
    };
  }
}

/** Type guard used by engines and tests. */
export function isBacklogError(err: unknown): err is BacklogError {
  return err instanceof BacklogError;
}
