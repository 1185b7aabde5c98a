import type { RunSummary } from "../core/results/run.types";
import type { WorkItem } from "../core/work/work.types";

export type RunRecord = {
  _id: string;                  // UUIDv4
  inputFile: string;
  startedAt: Date;
  finishedAt: Date;
  summary: RunSummary;
  terminallyFailed: WorkItem[]; // items still failing after the retry pass
};

export interface RunHistory {
  /** Newest completed run over `inputFile`, if any. */
  lastRun(inputFile: string): Promise<RunRecord | undefined>;
  record(run: RunRecord): Promise<void>;
  close(): Promise<void>;
}
