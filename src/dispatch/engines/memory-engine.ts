/**
 * Memory Engine: thin wrapper over the learning ledger.
 */

import type { LearningEntry, AppendLearningParams } from '../../types/learning.js';
import type { IntegrityWarning } from '../../types/task.js';
import {
  appendLearning,
  learningsByTask,
  searchLearnings,
  learningStats,
  learningLinkWarnings,
  type SearchLearningParams,
  type LearningStats,
} from '../../core/memory/learnings.js';
import { attempt, type EngineResult } from './_error.js';
import { withBacklog } from './_context.js';

export type { EngineResult };

export async function learnAdd(projectRoot: string, params: AppendLearningParams): Promise<EngineResult<LearningEntry>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => appendLearning(accessor, params)));
}

/**
 * List learnings. `general: true` selects entries tied to no task; otherwise
 * the search filters apply.
 */
export async function learnList(
  projectRoot: string,
  params: SearchLearningParams & { general?: boolean } = {},
): Promise<EngineResult<LearningEntry[]>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) =>
    params.general ? learningsByTask(accessor, null) : searchLearnings(accessor, params),
  ));
}

/** Ledger totals; entries missing from their task's learnings come back as warnings. */
export async function learnStats(projectRoot: string): Promise<EngineResult<LearningStats>> {
  let warnings: IntegrityWarning[] = [];
  return attempt(
    () => withBacklog(projectRoot, async ({ accessor }) => {
      warnings = await learningLinkWarnings(accessor);
      return learningStats(accessor);
    }),
    () => warnings,
  );
}
