/**
 * Learning ledger type definitions.
 */

/** A single append-only learning entry. Never mutated or deleted. */
export interface LearningEntry {
  id: string;
  createdAt: string;
  /** Linked task, or null for a general learning. */
  taskId: string | null;
  context: string;
  insight: string;
  appliedAction: string;
}

/** Parameters for appending a learning. */
export interface AppendLearningParams {
  taskId?: string | null;
  context: string;
  insight: string;
  appliedAction?: string;
}
