import type { AccountQueryClient } from "../../ports/AccountQueryClient";
import { createWorkerPool } from "../../shared/concurrency/workerPool";
import { isSuccess, type CallResult, type SessionCredential, type WorkItem } from "../../core/work/work.types";
import { settledToResult } from "./batchRunner";

/**
 * Single second pass over the items that came back absent. Items are
 * submitted one by one (no batching); there is no further round.
 */
export const retryFailed = async (
  deps: { client: AccountQueryClient; threadWorkers: number },
  failedItems: readonly WorkItem[],
  credential: SessionCredential
): Promise<CallResult[]> => {
  if (failedItems.length === 0) return [];

  console.log(JSON.stringify({ event: "retry.started", items: failedItems.length }));

  const pool = createWorkerPool("retry-calls", deps.threadWorkers);
  const settled = await pool.runAll(failedItems.map((item) => () => deps.client.call(item, credential)));
  const results = settled.map((entry) => settledToResult(failedItems, entry, "retry"));

  const recovered = results.filter(isSuccess).length;
  console.log(JSON.stringify({
    event: "retry.completed",
    recovered,
    stillFailed: results.length - recovered
  }));
  return results;
};
