/**
 * Commander option parsers shared by command files.
 */

import { InvalidArgumentError } from 'commander';
import {
  isValidPriority,
  isValidStatus,
  type TaskPriority,
  type TaskStatus,
} from '../store/status-registry.js';

/** Comma-separated list, trimmed, empties dropped. */
export function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/** Repeatable option: each occurrence appends one value. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePriority(value: string): TaskPriority {
  const upper = value.toUpperCase();
  if (!isValidPriority(upper)) {
    throw new InvalidArgumentError('Priority must be one of P1, P2, P3, P4.');
  }
  return upper;
}

export function parseStatus(value: string): TaskStatus {
  if (!isValidStatus(value)) {
    throw new InvalidArgumentError('Status must be one of pending, in_progress, blocked, completed.');
  }
  return value;
}

/** Non-negative integer (versions, indexes, limits). */
export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

/** The working project root. */
export function projectRoot(): string {
  return process.cwd();
}
