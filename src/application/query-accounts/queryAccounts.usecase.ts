import { randomUUID } from "crypto";
import type { AccountListSource } from "../../ports/AccountListSource";
import type { AccountQueryClient } from "../../ports/AccountQueryClient";
import type { ResultSink } from "../../ports/ResultSink";
import type { RunHistory, RunRecord } from "../../ports/RunHistory";
import { normalizeResults } from "../../core/results/normalizeResults";
import { isSuccess, type CallSuccess, type WorkItem } from "../../core/work/work.types";
import type { FileLocations } from "../../shared/config/runtime.config";
import type { SessionFailureReason, SessionOutcome } from "../session/acquireSession.usecase";
import type { BatchRunner } from "./batchRunner";
import { dispatch } from "./dispatcher";
import type { EngineConfig } from "./engine.config";
import type { ProgressTracker } from "./progressTracker";
import { retryFailed } from "./retryCoordinator";
import {
  classifyInputFailure,
  createRunSummaryTracker,
  type RunSummary,
  wrapHistoryFailure,
  wrapOutputFailure
} from "./run.error-handler";

export type QueryAccountsDeps = {
  source: AccountListSource;
  sink: ResultSink;
  client: AccountQueryClient;
  tracker: ProgressTracker;
  acquireSession: () => Promise<SessionOutcome>;
  history?: RunHistory;
  config: {
    engine: EngineConfig;
    files: Pick<FileLocations, "inputFile" | "outputFile" | "inputColumn">;
  };
  runBatch?: BatchRunner;
  now?: () => number;
};

export type RunOutcome =
  | { outcome: "completed"; summary: RunSummary; results: CallSuccess[]; terminallyFailed: WorkItem[] }
  | { outcome: "input_missing" }
  | { outcome: "session_failed"; reason: SessionFailureReason }
  | { outcome: "resume_mismatch"; lastItem: WorkItem };

/**
 * Terminal failures of the last recorded run over the same input that this
 * run skips on resume and has not already queued for retry.
 */
const carriedFailures = async (
  history: RunHistory,
  inputFile: string,
  skipped: readonly WorkItem[],
  queued: readonly WorkItem[]
): Promise<WorkItem[]> => {
  let previous: RunRecord | undefined;
  try {
    previous = await history.lastRun(inputFile);
  } catch (error) {
    console.warn(JSON.stringify({
      event: "run.history_unavailable",
      reason: error instanceof Error ? error.message : String(error)
    }));
    return [];
  }
  if (!previous) return [];

  const skippedSet = new Set(skipped);
  const seen = new Set(queued);
  const carried: WorkItem[] = [];
  for (const item of previous.terminallyFailed) {
    if (!skippedSet.has(item) || seen.has(item)) continue;
    seen.add(item);
    carried.push(item);
  }
  return carried;
};

/**
 * Reads the account list, acquires a session, runs the main pass and one
 * retry pass, then writes the flattened responses.
 */
export const queryAccounts = async (deps: QueryAccountsDeps): Promise<RunOutcome> => {
  const { source, sink, client, tracker, history, config } = deps;
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const summaryTracker = createRunSummaryTracker(startedAt);

  let workList: WorkItem[];
  try {
    workList = await source.readColumn(config.files.inputFile, config.files.inputColumn);
  } catch (error) {
    const decision = classifyInputFailure(error, { file: config.files.inputFile });
    if (decision.action === "fail") throw decision.error;
    console.error(JSON.stringify(decision.log));
    return { outcome: "input_missing" };
  }
  summaryTracker.setInput(workList.length);

  const session = await deps.acquireSession();
  if (session.state === "FAILED") {
    console.error(JSON.stringify({ event: "run.session_failed", reason: session.reason }));
    return { outcome: "session_failed", reason: session.reason };
  }
  const credential = session.credential;

  const main = await dispatch(
    { client, tracker, config: config.engine, runBatch: deps.runBatch },
    workList,
    credential
  );
  if (main.kind === "resume_mismatch") {
    console.error(JSON.stringify({ event: "run.resume_mismatch", lastItem: main.lastItem }));
    return { outcome: "resume_mismatch", lastItem: main.lastItem };
  }
  summaryTracker.addDispatch({
    resumeOffset: main.resume.offset,
    batches: main.batches,
    crashedBatches: main.crashedBatches,
    checkpoints: main.checkpoints,
    succeeded: main.successes.length,
    failed: main.failed.length
  });

  const carried = history
    ? await carriedFailures(history, config.files.inputFile, workList.slice(0, main.resume.offset), main.failed)
    : [];
  summaryTracker.setCarried(carried.length);
  if (carried.length > 0) {
    console.log(JSON.stringify({ event: "run.carried_failures", items: carried }));
  }

  const retried = await retryFailed(
    { client, threadWorkers: config.engine.threadWorkers },
    [...main.failed, ...carried],
    credential
  );
  const recovered = retried.filter(isSuccess);
  const stillFailed = retried.filter((result) => !isSuccess(result)).map((result) => result.item);
  summaryTracker.addRetry(recovered.length, stillFailed);
  if (stillFailed.length > 0) {
    console.warn(JSON.stringify({ event: "run.terminally_failed", items: stillFailed }));
  }

  const results = [...main.successes, ...recovered];
  const table = normalizeResults(results);
  summaryTracker.setRows(table.rows.length);

  try {
    await sink.write(config.files.outputFile, table.rows, table.columns);
  } catch (error) {
    throw wrapOutputFailure(error, { file: config.files.outputFile, rows: table.rows.length });
  }

  const finishedAt = now();
  const summary = summaryTracker.summary(finishedAt);
  const terminallyFailed = summaryTracker.terminallyFailed();

  if (history) {
    try {
      await history.record({
        _id: randomUUID(),
        inputFile: config.files.inputFile,
        startedAt: new Date(startedAt),
        finishedAt: new Date(finishedAt),
        summary,
        terminallyFailed
      });
    } catch (error) {
      throw wrapHistoryFailure(error, { items: terminallyFailed.length });
    }
  }

  console.log(JSON.stringify({ event: "run.completed", ...summary }));
  return { outcome: "completed", summary, results, terminallyFailed };
};
