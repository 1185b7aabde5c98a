import type { AccountQueryClient } from "../../ports/AccountQueryClient";
import { createLanePool, type Lane } from "../../shared/concurrency/lanePool";
import { partitionIntoBatches } from "../../core/work/partition";
import {
  isSuccess,
  type CallSuccess,
  type SessionCredential,
  type WorkItem
} from "../../core/work/work.types";
import { runBatch as defaultRunBatch, type BatchRunner } from "./batchRunner";
import type { EngineConfig } from "./engine.config";
import type { ProgressTracker, ResumeDecision } from "./progressTracker";

export type DispatchOutcome = {
  kind: "completed";
  resume: Exclude<ResumeDecision, { kind: "mismatch" }>;
  successes: CallSuccess[];
  failed: WorkItem[];
  batches: number;
  crashedBatches: number;
  checkpoints: number;
};

export type DispatchResult = DispatchOutcome | { kind: "resume_mismatch"; lastItem: WorkItem };

export type DispatchDeps = {
  client: AccountQueryClient;
  tracker: ProgressTracker;
  config: Pick<EngineConfig, "batchSize" | "processWorkers" | "threadWorkers" | "saveInterval">;
  runBatch?: BatchRunner;
};

/**
 * Main pass. Batches run on `processWorkers` lanes of `threadWorkers` calls
 * each; results are folded in batch completion order by this function alone,
 * which is also the only writer of the checkpoint.
 */
export const dispatch = async (
  deps: DispatchDeps,
  workList: readonly WorkItem[],
  credential: SessionCredential
): Promise<DispatchResult> => {
  const { client, tracker, config } = deps;
  const runBatch = deps.runBatch ?? defaultRunBatch;

  const resume = await tracker.resolveResume(workList);
  if (resume.kind === "mismatch") {
    return { kind: "resume_mismatch", lastItem: resume.lastItem };
  }

  const batches = partitionIntoBatches(workList.slice(resume.offset), config.batchSize);
  console.log(JSON.stringify({
    event: "dispatch.started",
    total: workList.length,
    resumeOffset: resume.offset,
    batches: batches.length,
    batchSize: config.batchSize
  }));

  const successes: CallSuccess[] = [];
  const failed: WorkItem[] = [];
  let crashedBatches = 0;
  let checkpoints = 0;
  let savedIntervals = 0;

  const lanes = createLanePool(config.processWorkers, config.threadWorkers);
  await lanes.runAll(
    batches.map((batch) => (lane: Lane) =>
      runBatch({ client, calls: lane.calls }, batch, structuredClone(credential))
    ),
    async (settled) => {
      const batch = batches[settled.index];

      if (settled.status === "rejected") {
        crashedBatches += 1;
        failed.push(...batch.items);
        console.error(JSON.stringify({
          event: "batch.failed",
          batchIndex: batch.index,
          items: batch.items.length,
          reason: settled.reason instanceof Error ? settled.reason.message : String(settled.reason)
        }));
        return;
      }

      let succeeded = 0;
      for (const result of settled.value) {
        if (isSuccess(result)) {
          successes.push(result);
          succeeded += 1;
        } else {
          failed.push(result.item);
        }
      }
      console.log(JSON.stringify({
        event: "batch.completed",
        batchIndex: batch.index,
        succeeded,
        failed: settled.value.length - succeeded
      }));

      const intervals = Math.floor(successes.length / config.saveInterval);
      if (intervals > savedIntervals) {
        savedIntervals = intervals;
        await tracker.checkpoint(successes);
        checkpoints += 1;
      }
    }
  );

  return {
    kind: "completed",
    resume,
    successes,
    failed,
    batches: batches.length,
    crashedBatches,
    checkpoints
  };
};
