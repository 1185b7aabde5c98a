import type { AccountQueryClient } from "../../ports/AccountQueryClient";
import type { WorkerPool, SettledTask } from "../../shared/concurrency/workerPool";
import {
  absentResult,
  type Batch,
  type CallResult,
  type SessionCredential,
  type WorkItem
} from "../../core/work/work.types";

export type BatchRunner = (
  deps: { client: AccountQueryClient; calls: WorkerPool },
  batch: Batch,
  credential: SessionCredential
) => Promise<CallResult[]>;

/**
 * Maps one settled call back to a result. A call that rejected (the client
 * contract says it should not) becomes an absent result for that item only.
 */
export const settledToResult = (
  items: readonly WorkItem[],
  entry: SettledTask<CallResult>,
  stage: "batch" | "retry"
): CallResult => {
  if (entry.status === "fulfilled") return entry.value;

  const item = items[entry.index];
  console.warn(JSON.stringify({
    event: "call.unexpected_error",
    stage,
    item,
    reason: entry.reason instanceof Error ? entry.reason.message : String(entry.reason)
  }));
  return absentResult(item, "unexpected_error");
};

/**
 * One call per item on the lane's call pool; resolves when every call has
 * settled, with results in completion order.
 */
export const runBatch: BatchRunner = async ({ client, calls }, batch, credential) => {
  const settled = await calls.runAll(batch.items.map((item) => () => client.call(item, credential)));
  return settled.map((entry) => settledToResult(batch.items, entry, "batch"));
};
