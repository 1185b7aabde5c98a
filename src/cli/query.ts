import type { RunOutcome } from "../application/query-accounts/queryAccounts.usecase";
import {
  RunFatalError,
  type RunErrorContext,
  type RunFailureCode
} from "../application/query-accounts/run.error-handler";
import type { SessionFailureReason } from "../application/session/acquireSession.usecase";
import type { WorkItem } from "../core/work/work.types";
import { runQueryAccounts } from "../composition/root";

type RunFailedEnvelope = {
  event: "run.failed";
  name: string;
  message: string;
  code?: RunFailureCode;
  context?: RunErrorContext;
  stack?: string;
};

type RunAbortedEnvelope =
  | { event: "run.aborted"; outcome: "input_missing" }
  | { event: "run.aborted"; outcome: "session_failed"; reason: SessionFailureReason }
  | { event: "run.aborted"; outcome: "resume_mismatch"; lastItem: WorkItem };

export type CliEnvelope = RunFailedEnvelope | RunAbortedEnvelope;

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

/**
 * Only a `RunFatalError` contributes a code and counts; the cause chain and
 * any other fields on the error stay out of the output.
 */
export const describeFailure = (err: unknown, includeStack: boolean): RunFailedEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const envelope: RunFailedEnvelope = {
    event: "run.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (err instanceof RunFatalError) {
    envelope.code = err.code;
    const { items, rows } = err.context;
    const context: RunErrorContext = {
      ...(items === undefined ? {} : { items }),
      ...(rows === undefined ? {} : { rows })
    };
    if (Object.keys(context).length > 0) envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }
  return envelope;
};

export const describeOutcome = (result: RunOutcome): RunAbortedEnvelope | undefined => {
  switch (result.outcome) {
    case "completed":
      return undefined;
    case "input_missing":
      return { event: "run.aborted", outcome: "input_missing" };
    case "session_failed":
      return { event: "run.aborted", outcome: "session_failed", reason: result.reason };
    case "resume_mismatch":
      return { event: "run.aborted", outcome: "resume_mismatch", lastItem: result.lastItem };
  }
};

export const executeQueryCli = async (): Promise<void> => {
  let envelope: CliEnvelope | undefined;
  try {
    envelope = describeOutcome(await runQueryAccounts());
  } catch (err) {
    envelope = describeFailure(err, isDebugMode());
  }

  if (envelope) {
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeQueryCli();
}
