/**
 * Zod schemas for everything the backlog persists.
 *
 * These are the single source of truth for the on-disk shapes: tasks.json,
 * learnings.jsonl and audit.jsonl. Loaders parse through them so a hand-edited
 * or truncated file is rejected instead of half-read.
 */

import { z } from 'zod';
import { TASK_STATUSES, TASK_PRIORITIES, SESSION_STATUSES } from './status-registry.js';

// ── Tasks ────────────────────────────────────────────────────────────

export const TaskIdSchema = z.string().regex(/^T\d{3,}$/);
export const SessionIdSchema = z.string().regex(/^S\d{3,}$/);
export const LearningIdSchema = z.string().regex(/^L\d{3,}$/);

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export const TaskPrioritySchema = z.enum(TASK_PRIORITIES);

export const AcceptanceCriterionSchema = z.object({
  text: z.string().min(1),
  checked: z.boolean(),
});

export const ProgressEntrySchema = z.object({
  timestamp: z.string(),
  note: z.string(),
});

export const TaskSchema = z.object({
  id: TaskIdSchema,
  title: z.string().min(1).max(200),
  status: TaskStatusSchema,
  priority: TaskPrioritySchema,
  category: z.string().nullable().default(null),
  blockedBy: z.array(z.string()).default([]),
  resourceFootprint: z.array(z.string()).default([]),
  acceptanceCriteria: z.array(AcceptanceCriterionSchema).default([]),
  createdAt: z.string(),
  startedAt: z.string().nullable().default(null),
  completedAt: z.string().nullable().default(null),
  progressLog: z.array(ProgressEntrySchema).default([]),
  learnings: z.array(z.string()).default([]),
  version: z.number().int().min(1).default(1),
  updatedAt: z.string(),
});

// ── Sessions ─────────────────────────────────────────────────────────

export const SessionFailureSchema = z.object({
  taskId: z.string(),
  note: z.string(),
  timestamp: z.string(),
});

export const ParallelSessionSchema = z.object({
  id: SessionIdSchema,
  label: z.string().nullable().default(null),
  status: z.enum(SESSION_STATUSES),
  taskIds: z.array(TaskIdSchema),
  openedAt: z.string(),
  closedAt: z.string().nullable().default(null),
  failures: z.array(SessionFailureSchema).default([]),
});

// ── Root document ────────────────────────────────────────────────────

export const FileMetaSchema = z.object({
  schemaVersion: z.string(),
  checksum: z.string(),
  nextId: z.number().int().min(1),
  nextSessionId: z.number().int().min(1).default(1),
  generation: z.number().int().min(0).default(0),
});

export const TaskFileSchema = z.object({
  version: z.string(),
  project: z.object({ name: z.string() }),
  lastUpdated: z.string(),
  _meta: FileMetaSchema,
  tasks: z.array(TaskSchema),
  archive: z.array(TaskSchema).default([]),
  sessions: z.array(ParallelSessionSchema).default([]),
});

// ── Ledgers ──────────────────────────────────────────────────────────

export const LearningEntrySchema = z.object({
  id: LearningIdSchema,
  createdAt: z.string(),
  taskId: TaskIdSchema.nullable(),
  context: z.string(),
  insight: z.string().min(1),
  appliedAction: z.string(),
});

export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  action: z.string(),
  taskId: z.string().nullable(),
  actor: z.string(),
  before: z.record(z.string(), z.unknown()).nullable(),
  after: z.record(z.string(), z.unknown()).nullable(),
});
export type AuditEntry = z.infer<typeof AuditEntrySchema>;
