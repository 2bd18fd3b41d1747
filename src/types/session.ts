/**
 * Parallel session type definitions.
 */

import type { SessionStatus } from '../store/status-registry.js';
export type { SessionStatus };

/** A constituent failure reported by a worker. */
export interface SessionFailure {
  taskId: string;
  note: string;
  timestamp: string;
}

/**
 * An explicit scope permitting several concurrently in-progress tasks,
 * provided their resource footprints are pairwise disjoint.
 */
export interface ParallelSession {
  id: string;
  label: string | null;
  status: SessionStatus;
  taskIds: string[];
  openedAt: string;
  closedAt: string | null;
  failures: SessionFailure[];
}

/** Message a worker sends back to the orchestrator about its task. */
export interface WorkerOutcome {
  ok: boolean;
  note?: string;
  /** Force completion with unchecked criteria (recorded in the progress log). */
  override?: boolean;
}
