export type RunSummary = {
  total: number;
  resumeOffset: number;
  batches: number;
  crashedBatches: number;
  checkpoints: number;
  succeeded: number;
  failedMainPass: number;
  carriedFromPreviousRun: number;
  recoveredOnRetry: number;
  terminallyFailed: number;
  rows: number;
  elapsedSeconds: number;
};
