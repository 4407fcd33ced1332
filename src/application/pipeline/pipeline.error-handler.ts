import { InvalidWorkItemError } from "../../core/items/workItem";
import {
  PipelineError,
  PipelineFatalError,
  toErrorMessage,
  type FatalStage
} from "../../shared/errors/pipeline.errors";
import type { ItemFailure, ItemStatus, PipelineItemResult } from "./pipeline.types";

/** Per-item failures never stop the run; they become a `failed` result. */
export const classifyItemFailure = (reason: unknown): ItemFailure => {
  if (reason instanceof PipelineError) {
    return { code: reason.code, message: reason.message };
  }
  if (reason instanceof InvalidWorkItemError) {
    return { code: "no_content", message: reason.message };
  }
  return { code: "unexpected", message: toErrorMessage(reason) };
};

export const wrapFatalFailure = (reason: unknown, context: { runId: string; stage: FatalStage }): PipelineFatalError => {
  if (reason instanceof PipelineFatalError) return reason;
  return new PipelineFatalError({
    message: `Pipeline run ${context.runId} failed during ${context.stage}: ${toErrorMessage(reason)}`,
    runId: context.runId,
    stage: context.stage,
    cause: reason
  });
};

export type ItemCounters = {
  completed: number;
  failed: number;
  degraded: number;
  cached: number;
};

export const createRunSummaryTracker = () => {
  const byStatus: Record<ItemStatus, number> = { completed: 0, degraded: 0, failed: 0 };
  let cached = 0;
  let sinceCheckpoint = 0;

  return {
    record: (result: PipelineItemResult) => {
      byStatus[result.status] += 1;
      if (result.fromCache) cached += 1;
      if (result.status !== "failed") sinceCheckpoint += 1;
    },
    processed: () => byStatus.completed + byStatus.degraded + byStatus.failed,
    checkpointDue: (interval: number) => sinceCheckpoint >= interval,
    markCheckpointed: () => {
      sinceCheckpoint = 0;
    },
    counters: (): ItemCounters => ({
      completed: byStatus.completed,
      failed: byStatus.failed,
      degraded: byStatus.degraded,
      cached
    })
  };
};
