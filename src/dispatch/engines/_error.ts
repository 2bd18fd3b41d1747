/**
 * Centralized engine error helper.
 *
 * All engines import `engineError()` / `engineSuccess()` from this module to
 * produce consistently typed results with correct exit codes and pino
 * logging. Core functions throw BacklogError; engines never let them escape.
 *
 * The STRING_TO_EXIT map is the canonical mapping from string error codes
 * to numeric exit codes. Source of truth: src/types/exit-codes.ts.
 */

import { getLogger } from '../../core/logger.js';
import { isBacklogError, errorKind, type ErrorKind } from '../../core/errors.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';
import type { IntegrityWarning } from '../../types/task.js';

/**
 * Canonical EngineResult type used by all engines.
 */
export interface EngineResult<T = unknown> {
  success: boolean;
  data?: T;
  /** Soft data-integrity warnings; never set on their own failure. */
  warnings?: IntegrityWarning[];
  error?: {
    code: string;
    kind: ErrorKind;
    message: string;
    exitCode: number;
    details?: Record<string, unknown>;
    fix?: string;
  };
}

/**
 * Canonical mapping from string error codes to numeric exit codes.
 */
export const STRING_TO_EXIT: Record<string, ExitCode> = {
  // General Errors (1-9)
  E_GENERAL: ExitCode.GENERAL_ERROR,
  E_GENERAL_ERROR: ExitCode.GENERAL_ERROR,
  E_INVALID_INPUT: ExitCode.INVALID_INPUT,
  E_FILE_ERROR: ExitCode.FILE_ERROR,
  E_NOT_FOUND: ExitCode.NOT_FOUND,
  E_DEPENDENCY_UNMET: ExitCode.DEPENDENCY_UNMET,
  E_VALIDATION_ERROR: ExitCode.VALIDATION_ERROR,
  E_LOCK_TIMEOUT: ExitCode.LOCK_TIMEOUT,
  E_CONFIG_ERROR: ExitCode.CONFIG_ERROR,

  // Graph / Lifecycle Errors (10-19)
  E_ILLEGAL_TRANSITION: ExitCode.ILLEGAL_TRANSITION,
  E_INVALID_STATE: ExitCode.INVALID_STATE,
  E_CIRCULAR_REFERENCE: ExitCode.CIRCULAR_REFERENCE,
  E_ACCEPTANCE_INCOMPLETE: ExitCode.ACCEPTANCE_INCOMPLETE,

  // Concurrency Errors (20-29)
  E_CHECKSUM_MISMATCH: ExitCode.CHECKSUM_MISMATCH,
  E_CONCURRENT_MODIFICATION: ExitCode.CONCURRENT_MODIFICATION,
  E_ID_COLLISION: ExitCode.ID_COLLISION,

  // Session / Admission Errors (30-39)
  E_SESSION_EXISTS: ExitCode.SESSION_EXISTS,
  E_SESSION_NOT_FOUND: ExitCode.SESSION_NOT_FOUND,
  E_RESOURCE_CONFLICT: ExitCode.RESOURCE_CONFLICT,
  E_TASK_NOT_IN_SCOPE: ExitCode.TASK_NOT_IN_SCOPE,
  E_ACTIVE_LIMIT_EXCEEDED: ExitCode.ACTIVE_LIMIT_EXCEEDED,
  E_SESSION_CLOSE_BLOCKED: ExitCode.SESSION_CLOSE_BLOCKED,

  // Special Codes (100+) - NOT errors
  E_NO_DATA: ExitCode.NO_DATA,
  E_ALREADY_EXISTS: ExitCode.ALREADY_EXISTS,
  E_NO_CHANGE: ExitCode.NO_CHANGE,
};

/**
 * Derive pino log level from exit code.
 *
 * - 100+: special/informational -> 'debug'
 * - internal errors (1, 3): -> 'error'
 * - everything else is a domain error -> 'warn'
 */
function logLevel(exitCode: number): 'error' | 'warn' | 'debug' {
  if (exitCode === 0 || exitCode >= 100) return 'debug';
  if (exitCode === 1 || exitCode === 3) return 'error';
  return 'warn';
}

/**
 * Create a typed engine error result with pino logging and correct exit code.
 *
 * @param code - String error code (e.g., 'E_NOT_FOUND')
 */
export function engineError<T>(
  code: string,
  message: string,
  options?: {
    details?: Record<string, unknown>;
    fix?: string;
  },
): EngineResult<T> {
  const exitCode = STRING_TO_EXIT[code] ?? ExitCode.GENERAL_ERROR;
  const level = logLevel(exitCode);

  // Keep test output clean: skip engine logging under Vitest.
  if (process.env['VITEST'] !== 'true') {
    // Acquired lazily so the CLI's preAction initLogger() has already run
    const logger = getLogger('engine');
    logger[level]({ code, exitCode, ...(options?.details && { details: options.details }) }, message);
  }

  return {
    success: false,
    error: {
      code,
      kind: errorKind(exitCode),
      message,
      exitCode,
      ...(options?.details && { details: options.details }),
      ...(options?.fix && { fix: options.fix }),
    },
  };
}

/**
 * Create an engine success result.
 */
export function engineSuccess<T>(data: T, warnings?: IntegrityWarning[]): EngineResult<T> {
  return {
    success: true,
    data,
    ...(warnings && warnings.length > 0 && { warnings }),
  };
}

/**
 * Convert a thrown value into an error result. BacklogError keeps its code;
 * anything else is an unexpected failure (E_GENERAL).
 */
export function fromError<T>(err: unknown): EngineResult<T> {
  if (isBacklogError(err)) {
    return engineError(`E_${getExitCodeName(err.code)}`, err.message, {
      details: err.details,
      fix: err.fix,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return engineError('E_GENERAL', message);
}

/** Run a core call and wrap its outcome. */
export async function attempt<T>(
  fn: () => Promise<T>,
  warningsOf?: (data: T) => IntegrityWarning[],
): Promise<EngineResult<T>> {
  try {
    const data = await fn();
    return engineSuccess(data, warningsOf?.(data));
  } catch (err) {
    return fromError(err);
  }
}
