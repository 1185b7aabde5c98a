import { InputColumnNotFoundError, InputFileNotFoundError } from "../../ports/AccountListSource";
import type { RunSummary } from "../../core/results/run.types";
import type { WorkItem } from "../../core/work/work.types";

export type { RunSummary };

export type RunFailureCode = "input_read_failed" | "output_write_failed" | "history_write_failed";

export type RunErrorContext = {
  items?: number;
  rows?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const causeOf = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class RunFatalError extends Error {
  readonly code: RunFailureCode;
  readonly context: RunErrorContext;

  constructor(args: { code: RunFailureCode; message: string; context: RunErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "RunFatalError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type InputFailureDecision =
  | { action: "abort"; log: RunInputMissingLog }
  | { action: "fail"; error: RunFatalError };

type RunInputMissingLog = {
  event: "run.input_missing";
  reason: string;
  file: string;
  column?: string;
};

/**
 * A missing input file or column stops the run before login; anything else
 * while reading the input is fatal.
 */
export const classifyInputFailure = (reason: unknown, context: { file: string }): InputFailureDecision => {
  if (reason instanceof InputFileNotFoundError) {
    return { action: "abort", log: { event: "run.input_missing", reason: reason.message, file: reason.filePath } };
  }
  if (reason instanceof InputColumnNotFoundError) {
    return {
      action: "abort",
      log: { event: "run.input_missing", reason: reason.message, file: reason.filePath, column: reason.column }
    };
  }

  return {
    action: "fail",
    error: new RunFatalError({
      code: "input_read_failed",
      message: `Reading ${context.file} failed: ${toErrorMessage(reason)}`,
      context: {},
      cause: causeOf(reason)
    })
  };
};

export const wrapOutputFailure = (reason: unknown, context: { file: string; rows: number }) =>
  new RunFatalError({
    code: "output_write_failed",
    message: `Writing ${context.file} failed after ${context.rows} rows were prepared: ${toErrorMessage(reason)}`,
    context: { rows: context.rows },
    cause: causeOf(reason)
  });

export const wrapHistoryFailure = (reason: unknown, context: { items: number }) =>
  new RunFatalError({
    code: "history_write_failed",
    message: `Recording the run with ${context.items} terminal failures failed: ${toErrorMessage(reason)}`,
    context,
    cause: causeOf(reason)
  });

export const createRunSummaryTracker = (startedAt: number) => {
  let total = 0;
  let resumeOffset = 0;
  let batches = 0;
  let crashedBatches = 0;
  let checkpoints = 0;
  let succeeded = 0;
  let failedMainPass = 0;
  let carriedFromPreviousRun = 0;
  let recoveredOnRetry = 0;
  let rows = 0;
  const terminallyFailed: WorkItem[] = [];

  return {
    setInput: (count: number) => {
      total = count;
    },
    addDispatch: (dispatch: {
      resumeOffset: number;
      batches: number;
      crashedBatches: number;
      checkpoints: number;
      succeeded: number;
      failed: number;
    }) => {
      resumeOffset = dispatch.resumeOffset;
      batches = dispatch.batches;
      crashedBatches = dispatch.crashedBatches;
      checkpoints = dispatch.checkpoints;
      succeeded += dispatch.succeeded;
      failedMainPass = dispatch.failed;
    },
    setCarried: (count: number) => {
      carriedFromPreviousRun = count;
    },
    addRetry: (recovered: number, stillFailed: readonly WorkItem[]) => {
      recoveredOnRetry += recovered;
      succeeded += recovered;
      terminallyFailed.push(...stillFailed);
    },
    setRows: (count: number) => {
      rows = count;
    },
    terminallyFailed: () => terminallyFailed.slice(),
    summary: (finishedAt: number): RunSummary => ({
      total,
      resumeOffset,
      batches,
      crashedBatches,
      checkpoints,
      succeeded,
      failedMainPass,
      carriedFromPreviousRun,
      recoveredOnRetry,
      terminallyFailed: terminallyFailed.length,
      rows,
      elapsedSeconds: Number(((finishedAt - startedAt) / 1000).toFixed(2))
    })
  };
};
