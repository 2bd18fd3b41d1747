/**
 * Backlog engine: task lifecycle, dependency ordering, admission control
 * and prioritisation over a file-backed task store.
 */

// Types
export * from './types/index.js';
export {
  TASK_STATUSES,
  TASK_PRIORITIES,
  isValidStatus,
  isValidPriority,
  priorityRank,
} from './store/status-registry.js';

// Errors and output
export { BacklogError, isBacklogError, errorKind, type ErrorKind } from './core/errors.js';
export { formatSuccess, formatError, type Envelope } from './core/output.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

// Configuration and setup
export { loadConfig, getConfigValue, setConfigValue, DEFAULTS } from './core/config.js';
export { initProject, type InitOptions, type InitResult } from './core/init.js';

// Store
export {
  getAccessor,
  createDataAccessor,
  createEmptyTaskFile,
  type DataAccessor,
  type AccessorOptions,
} from './store/data-accessor.js';
export {
  TaskStore,
  type CreateTaskInput,
  type CreateTaskResult,
  type TaskFilter,
} from './store/task-store.js';

// Dependency graph
export {
  checkEligibility,
  eligible,
  unblocksOf,
  blockersOf,
  transitiveBlockers,
  validateGraph,
  type GraphValidation,
} from './core/tasks/dependency-graph.js';
export { addBlocker, removeBlocker, showDependencies, checkGraph, type DependencyView } from './core/tasks/deps.js';

// Conflict detection
export {
  conflicts,
  admissible,
  partition,
  findConflicts,
  STRICT_POLICY,
  type ConflictPolicy,
  type ConflictPair,
} from './core/orchestration/conflicts.js';

// State machine and edits
export {
  transition,
  applyTransition,
  startTask,
  blockTask,
  unblockTask,
  completeTask,
  reopen,
  isLegalTransition,
  LEGAL_TRANSITIONS,
  type TransitionContext,
  type TransitionResult,
} from './core/tasks/state-machine.js';
export { updateTask, addCriterion, setCriterion, addNote, promote } from './core/tasks/update.js';

// Scheduling, reconciliation, summary
export { rank, next, rankTasks, type RankedTask } from './core/tasks/scheduler.js';
export { reconcile, reconcileTask, type Evidence, type ReconcileReport } from './core/tasks/reconcile.js';
export { computeIndexSummary, getIndexSummary, staleTasks, type IndexSummary } from './core/stats/index.js';

// Parallel sessions
export {
  openSession,
  admit,
  reportOutcome,
  closeSession,
  getSessionStatus,
  listSessions,
  type SessionStatus as ParallelSessionStatus,
} from './core/orchestration/parallel.js';

// Learning ledger
export {
  appendLearning,
  readLearnings,
  learningsByTask,
  searchLearnings,
  learningStats,
} from './core/memory/learnings.js';
