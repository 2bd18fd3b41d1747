/**
 * JSON envelope formatter for CLI output.
 *
 * Every command prints one envelope on stdout: `_meta` describes the call,
 * then either `result` (success) or `error` (failure). Soft integrity
 * warnings ride in `_meta.warnings`.
 */

import { randomUUID } from 'node:crypto';
import type { IntegrityWarning } from '../types/task.js';

/** Envelope metadata. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
  warnings?: IntegrityWarning[];
}

/** Error block of a failed envelope. */
export interface EnvelopeError {
  code: string;
  kind: string;
  message: string;
  exitCode: number;
  details?: Record<string, unknown>;
  fix?: string;
}

export interface SuccessEnvelope<T = unknown> {
  _meta: EnvelopeMeta;
  success: true;
  result: T;
  message?: string;
}

export interface ErrorEnvelope {
  _meta: EnvelopeMeta;
  success: false;
  error: EnvelopeError;
}

export type Envelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

function createMeta(operation: string, warnings?: IntegrityWarning[]): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
    ...(warnings && warnings.length > 0 && { warnings }),
  };
}

/** Build a success envelope. */
export function successEnvelope<T>(
  result: T,
  operation: string,
  options: { message?: string; warnings?: IntegrityWarning[] } = {},
): SuccessEnvelope<T> {
  return {
    _meta: createMeta(operation, options.warnings),
    success: true,
    result,
    ...(options.message && { message: options.message }),
  };
}

/** Build an error envelope. */
export function errorEnvelope(error: EnvelopeError, operation: string): ErrorEnvelope {
  return { _meta: createMeta(operation), success: false, error };
}

/** Serialize a success envelope. */
export function formatSuccess<T>(
  result: T,
  operation: string,
  options?: { message?: string; warnings?: IntegrityWarning[] },
): string {
  return JSON.stringify(successEnvelope(result, operation, options));
}

/** Serialize an error envelope. */
export function formatError(error: EnvelopeError, operation: string): string {
  return JSON.stringify(errorEnvelope(error, operation));
}
