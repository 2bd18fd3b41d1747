/**
 * Task Record Store: durable CRUD over the backlog document.
 *
 * Owns the split between the active partition (pending, in_progress,
 * blocked) and the archive partition (completed). Both partitions live in one
 * document, so moving a task between them is a single atomic commit.
 *
 * Writes are optimistic-concurrency checked: callers pass the version they
 * last read and get a Conflict when someone else has written since.
 */

import { randomBytes } from 'node:crypto';
import { BacklogError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import type {
  Task,
  TaskFile,
  TaskStatus,
  TaskPriority,
  Partition,
  AcceptanceCriterion,
  IntegrityWarning,
} from '../types/task.js';
import type { DataAccessor } from './data-accessor.js';
import { TaskSchema, type AuditEntry } from './schema.js';
import { TERMINAL_TASK_STATUSES } from './status-registry.js';
import { cycleForNewEdge } from '../core/tasks/dependency-graph.js';

// === IDS ===

/** Format a numeric id as T001, T002, ... */
export function formatTaskId(n: number): string {
  return `T${String(n).padStart(3, '0')}`;
}

/** Numeric part of a task id (T012 -> 12). NaN for malformed ids. */
export function taskIdNumber(id: string): number {
  return /^T\d+$/.test(id) ? parseInt(id.slice(1), 10) : Number.NaN;
}

/** Order two task ids numerically; malformed ids sort last, lexically. */
export function compareTaskIds(a: string, b: string): number {
  const na = taskIdNumber(a);
  const nb = taskIdNumber(b);
  if (Number.isNaN(na) || Number.isNaN(nb)) {
    if (Number.isNaN(na) && Number.isNaN(nb)) return a.localeCompare(b);
    return Number.isNaN(na) ? 1 : -1;
  }
  return na - nb;
}

// === DOCUMENT HELPERS ===

/** A task together with the partition holding it. */
export interface LocatedTask {
  task: Task;
  partition: Partition;
}

/** Find a task in either partition. */
export function locateTask(data: TaskFile, id: string): LocatedTask | null {
  const active = data.tasks.find((t) => t.id === id);
  if (active) return { task: active, partition: 'active' };
  const archived = data.archive.find((t) => t.id === id);
  if (archived) return { task: archived, partition: 'archive' };
  return null;
}

/** Find a task in either partition or throw NotFound. */
export function requireTask(data: TaskFile, id: string): LocatedTask {
  const located = locateTask(data, id);
  if (!located) {
    throw new BacklogError(
      ExitCode.NOT_FOUND,
      `Task not found: ${id}`,
      { fix: "Use 'backlog list' to see existing task ids" },
    );
  }
  return located;
}

/** Every task in both partitions. */
export function allTasks(data: TaskFile): Task[] {
  return [...data.tasks, ...data.archive];
}

/** Lookup map over both partitions. */
export function taskIndex(data: TaskFile): Map<string, Task> {
  return new Map(allTasks(data).map((t) => [t.id, t]));
}

/** Throw Conflict when the stored version moved past what the caller read. */
export function assertVersion(task: Task, expectedVersion: number | undefined): void {
  if (expectedVersion === undefined || task.version === expectedVersion) return;
  throw new BacklogError(
    ExitCode.CONCURRENT_MODIFICATION,
    `Task ${task.id} was modified concurrently (expected version ${expectedVersion}, found ${task.version})`,
    {
      fix: `Re-read the task with 'backlog show ${task.id}' and retry`,
      details: { taskId: task.id, expectedVersion, actualVersion: task.version },
    },
  );
}

/** Bump version and updatedAt; call exactly once per task per commit. */
export function touch(task: Task, now: string): void {
  task.version += 1;
  task.updatedAt = now;
}

/** Move a task from the active partition into the archive partition. */
export function moveToArchive(data: TaskFile, id: string): void {
  const idx = data.tasks.findIndex((t) => t.id === id);
  const task = data.tasks[idx];
  if (!task) return;
  data.tasks.splice(idx, 1);
  data.archive.push(task);
}

/** Move a task from the archive partition back into the active partition. */
export function moveToActive(data: TaskFile, id: string): void {
  const idx = data.archive.findIndex((t) => t.id === id);
  const task = data.archive[idx];
  if (!task) return;
  data.archive.splice(idx, 1);
  data.tasks.push(task);
}

/** Snapshot the fields worth keeping in an audit entry. */
export function auditSnapshot(task: Task): Record<string, unknown> {
  return {
    title: task.title,
    status: task.status,
    priority: task.priority,
    version: task.version,
  };
}

/** Build an audit log entry. */
export function auditEntry(
  action: string,
  taskId: string | null,
  before: Record<string, unknown> | null,
  after: Record<string, unknown> | null,
  actor = 'system',
): AuditEntry {
  return {
    id: `log-${Math.floor(Date.now() / 1000)}-${randomBytes(3).toString('hex')}`,
    timestamp: new Date().toISOString(),
    action,
    taskId,
    actor,
    before,
    after,
  };
}

// === STORE ===

/** Input for creating a task. */
export interface CreateTaskInput {
  title: string;
  priority?: TaskPriority;
  category?: string | null;
  blockedBy?: string[];
  resourceFootprint?: string[];
  acceptanceCriteria?: Array<string | AcceptanceCriterion>;
  actor?: string;
}

/** Result of creating a task. */
export interface CreateTaskResult {
  task: Task;
  warnings: IntegrityWarning[];
}

/** Filter for list(). */
export interface TaskFilter {
  status?: TaskStatus | TaskStatus[];
  priority?: TaskPriority;
  category?: string;
  /** Which partition(s) to read. Default: 'all'. */
  partition?: Partition | 'all';
}

/** Fields only the state machine or dependency graph may change. */
const PROTECTED_FIELDS = [
  'id', 'status', 'blockedBy', 'createdAt', 'startedAt', 'completedAt', 'version', 'updatedAt',
] as const;

function unique(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))];
}

function normalizeCriteria(input: Array<string | AcceptanceCriterion> | undefined): AcceptanceCriterion[] {
  return (input ?? []).map((c) => (typeof c === 'string' ? { text: c, checked: false } : { ...c }));
}

/**
 * A blocker must name an id that has already been issued. Ids at or past
 * `nextId` (the new task's own id included) could later close a cycle that
 * no check would see; an issued id whose task is gone stays a dangling
 * blocker.
 */
function assertIssuedId(blockerId: string, newId: string, nextId: number): void {
  const n = taskIdNumber(blockerId);
  if (Number.isNaN(n)) {
    throw new BacklogError(ExitCode.INVALID_INPUT, `Blocker ${blockerId} is not a task id`);
  }
  if (blockerId === newId) {
    throw new BacklogError(ExitCode.INVALID_INPUT, `Task ${newId} cannot block itself`);
  }
  if (n >= nextId) {
    throw new BacklogError(
      ExitCode.INVALID_INPUT,
      `Blocker ${blockerId} has not been created yet`,
      { details: { blockerId, nextId }, fix: `Create it first, then run 'backlog deps add ${newId} ${blockerId}'` },
    );
  }
}

/** Reject a second P1 while another active task already holds it. */
export function assertP1Available(data: TaskFile, exceptId: string | null): void {
  const holder = data.tasks.find((t) => t.priority === 'P1' && t.id !== exceptId);
  if (holder) {
    throw new BacklogError(
      ExitCode.VALIDATION_ERROR,
      `P1 is already held by ${holder.id}; at most one active task may be P1`,
      { fix: `Use 'backlog promote <id>' to move P1 (demotes ${holder.id} to P2)` },
    );
  }
}

/**
 * A running task may not widen its footprint onto a resource another
 * in-progress task already holds.
 */
function assertFootprintFree(data: TaskFile, task: Task): void {
  const mine = new Set(task.resourceFootprint);
  for (const other of data.tasks) {
    if (other.id === task.id || other.status !== 'in_progress') continue;
    const shared = [...new Set(other.resourceFootprint.filter((r) => mine.has(r)))].sort();
    if (shared.length > 0) {
      throw new BacklogError(
        ExitCode.RESOURCE_CONFLICT,
        `Task ${task.id} conflicts with in-progress ${other.id} on ${shared.join(', ')}`,
        { details: { conflictsWith: [other.id], resources: shared } },
      );
    }
  }
}

/**
 * Task Record Store.
 *
 * All mutations commit through DataAccessor.mutateTaskFile, which holds the
 * store lock for the whole read-modify-write.
 */
export class TaskStore {
  private readonly logger = getLogger('store');

  constructor(readonly accessor: DataAccessor) {}

  /**
   * Create a task in `pending`. Ids are always fresh. Blockers must be issued
   * ids that close no cycle; a duplicate title or an issued blocker whose
   * task is gone is reported as a warning.
   */
  async create(input: CreateTaskInput): Promise<CreateTaskResult> {
    const title = input.title.trim();
    if (!title) {
      throw new BacklogError(ExitCode.INVALID_INPUT, 'Task title is required');
    }

    const result = await this.accessor.mutateTaskFile((data) => {
      const now = new Date().toISOString();
      const warnings: IntegrityWarning[] = [];
      const id = formatTaskId(data._meta.nextId);
      if (locateTask(data, id)) {
        throw new BacklogError(ExitCode.ID_COLLISION, `Task id ${id} already exists`);
      }

      const priority = input.priority ?? 'P3';
      if (priority === 'P1') assertP1Available(data, null);

      const lowered = title.toLowerCase();
      const duplicate = allTasks(data).find((t) => t.title.trim().toLowerCase() === lowered);
      if (duplicate) {
        warnings.push({
          code: 'W_DUPLICATE_TITLE',
          taskId: id,
          message: `Title duplicates ${duplicate.id}: "${duplicate.title}"`,
          relatedIds: [duplicate.id],
        });
      }

      const blockedBy = unique(input.blockedBy ?? []);
      const index = taskIndex(data);
      for (const blockerId of blockedBy) {
        assertIssuedId(blockerId, id, data._meta.nextId);
        const cycle = cycleForNewEdge(id, blockerId, index);
        if (cycle.length > 0) {
          throw new BacklogError(
            ExitCode.CIRCULAR_REFERENCE,
            `Adding ${blockerId} as a blocker of ${id} would create a cycle: ${cycle.join(' -> ')}`,
            { details: { cycle } },
          );
        }
        if (!index.has(blockerId)) {
          warnings.push({
            code: 'W_DANGLING_BLOCKER',
            taskId: id,
            message: `Blocker ${blockerId} does not exist; ${id} will never become eligible until it is removed`,
            relatedIds: [blockerId],
          });
        }
      }

      const parsed = TaskSchema.safeParse({
        id,
        title,
        status: 'pending',
        priority,
        category: input.category?.trim() || null,
        blockedBy,
        resourceFootprint: unique(input.resourceFootprint ?? []),
        acceptanceCriteria: normalizeCriteria(input.acceptanceCriteria),
        createdAt: now,
        startedAt: null,
        completedAt: null,
        progressLog: [{ timestamp: now, note: 'Created' }],
        learnings: [],
        version: 1,
        updatedAt: now,
      });
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new BacklogError(
          ExitCode.VALIDATION_ERROR,
          `Invalid task: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
          { details: { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) } },
        );
      }
      const task: Task = parsed.data;

      data.tasks.push(task);
      data._meta.nextId += 1;
      return { task, warnings };
    });

    for (const w of result.warnings) {
      this.logger.warn({ code: w.code, taskId: w.taskId, relatedIds: w.relatedIds }, w.message);
    }
    await this.accessor.appendLog(
      auditEntry('task_created', result.task.id, null, auditSnapshot(result.task), input.actor),
    );
    return result;
  }

  /** Get a task from either partition. */
  async get(id: string): Promise<Task> {
    const data = await this.accessor.loadTaskFile();
    return requireTask(data, id).task;
  }

  /** Get a task together with the partition holding it. */
  async locate(id: string): Promise<LocatedTask> {
    const data = await this.accessor.loadTaskFile();
    return requireTask(data, id);
  }

  /**
   * Apply a mutation to a task. `expectedVersion` is the version the caller
   * last read; a mismatch fails with Conflict and nothing is written.
   *
   * Status, blockers and timestamps are owned by the state machine and the
   * dependency graph and cannot be changed here.
   */
  async update(
    id: string,
    expectedVersion: number | undefined,
    mutation: (task: Task) => void,
    options?: { action?: string; actor?: string },
  ): Promise<Task> {
    let before: Record<string, unknown> | null = null;
    const updated = await this.accessor.mutateTaskFile((data) => {
      const { task } = requireTask(data, id);
      assertVersion(task, expectedVersion);
      before = auditSnapshot(task);

      const original = structuredClone(task);
      mutation(task);

      for (const field of PROTECTED_FIELDS) {
        if (JSON.stringify(task[field]) !== JSON.stringify(original[field])) {
          throw new BacklogError(
            ExitCode.VALIDATION_ERROR,
            `Field '${field}' of ${id} cannot be changed by update`,
            { fix: 'Use transition, reopen or the deps commands instead' },
          );
        }
      }
      const logKept = original.progressLog.every(
        (entry, i) => JSON.stringify(task.progressLog[i]) === JSON.stringify(entry),
      );
      if (!logKept || !original.learnings.every((l) => task.learnings.includes(l))) {
        throw new BacklogError(
          ExitCode.VALIDATION_ERROR,
          `Progress log and learnings of ${id} are append-only`,
        );
      }
      if (task.priority === 'P1' && original.priority !== 'P1' && task.status !== 'completed') {
        assertP1Available(data, id);
      }
      if (
        task.status === 'in_progress'
        && JSON.stringify(task.resourceFootprint) !== JSON.stringify(original.resourceFootprint)
      ) {
        assertFootprintFree(data, task);
      }

      const parsed = TaskSchema.safeParse(task);
      if (!parsed.success) {
        throw new BacklogError(
          ExitCode.VALIDATION_ERROR,
          `Update would leave ${id} invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        );
      }

      touch(task, new Date().toISOString());
      return structuredClone(task);
    });

    await this.accessor.appendLog(
      auditEntry(options?.action ?? 'task_updated', id, before, auditSnapshot(updated), options?.actor),
    );
    return updated;
  }

  /**
   * Archive a completed task: move it from the active partition into the
   * archive partition in one commit. Already-archived tasks are returned as is.
   */
  async archive(id: string, options?: { actor?: string }): Promise<Task> {
    const outcome = await this.accessor.mutateTaskFile((data) => {
      const { task, partition } = requireTask(data, id);
      if (partition === 'archive') return { task: structuredClone(task), moved: false };
      if (!TERMINAL_TASK_STATUSES.has(task.status)) {
        throw new BacklogError(
          ExitCode.INVALID_STATE,
          `Task ${id} is ${task.status}; only completed tasks can be archived`,
        );
      }
      moveToArchive(data, id);
      return { task: structuredClone(task), moved: true };
    });

    if (outcome.moved) {
      await this.accessor.appendLog(
        auditEntry('task_archived', id, null, auditSnapshot(outcome.task), options?.actor),
      );
    }
    return outcome.task;
  }

  /** List tasks matching a filter, ordered by numeric id. */
  async list(filter: TaskFilter = {}): Promise<Task[]> {
    const data = await this.accessor.loadTaskFile();
    const partition = filter.partition ?? 'all';
    let tasks = partition === 'active'
      ? data.tasks
      : partition === 'archive'
        ? data.archive
        : allTasks(data);

    if (filter.status !== undefined) {
      const wanted = new Set(Array.isArray(filter.status) ? filter.status : [filter.status]);
      tasks = tasks.filter((t) => wanted.has(t.status));
    }
    if (filter.priority) {
      tasks = tasks.filter((t) => t.priority === filter.priority);
    }
    if (filter.category !== undefined) {
      tasks = tasks.filter((t) => t.category === filter.category);
    }

    return [...tasks].sort((a, b) => compareTaskIds(a.id, b.id));
  }

  /** Load the full document (read-only snapshot). */
  async snapshot(): Promise<TaskFile> {
    return this.accessor.loadTaskFile();
  }
}
