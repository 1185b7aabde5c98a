import type { ProgressStore } from "../../ports/ProgressStore";
import type { ProgressEntry } from "../../core/results/progress.types";
import type { CallSuccess, WorkItem } from "../../core/work/work.types";
import type { ResumePolicy } from "./engine.config";

export type ResumeDecision =
  | { kind: "fresh"; offset: 0 }
  | { kind: "resume"; offset: number; lastItem: WorkItem }
  | { kind: "restart"; offset: 0; lastItem: WorkItem }
  | { kind: "mismatch"; lastItem: WorkItem };

export type ProgressTracker = {
  load(): Promise<ProgressEntry[]>;
  resolveResume(workList: readonly WorkItem[]): Promise<ResumeDecision>;
  checkpoint(successes: readonly CallSuccess[]): Promise<void>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isProgressEntry = (value: unknown): value is ProgressEntry =>
  isRecord(value) && typeof value.username === "string" && "response" in value;

export const toProgressEntry = (success: CallSuccess): ProgressEntry => ({
  username: success.item,
  response: success.payload
});

/**
 * The checkpoint's last entry is located by exact match; work resumes right
 * after it. The checkpoint only holds a recent tail, so nothing earlier than
 * the last entry is consulted.
 */
export const decideResume = (
  checkpoint: readonly ProgressEntry[],
  workList: readonly WorkItem[],
  policy: ResumePolicy
): ResumeDecision => {
  const last = checkpoint[checkpoint.length - 1];
  if (!last) return { kind: "fresh", offset: 0 };

  const position = workList.indexOf(last.username);
  if (position >= 0) return { kind: "resume", offset: position + 1, lastItem: last.username };

  return policy === "restart"
    ? { kind: "restart", offset: 0, lastItem: last.username }
    : { kind: "mismatch", lastItem: last.username };
};

export const createProgressTracker = (deps: {
  store: ProgressStore;
  tailSize: number;
  policy: ResumePolicy;
}): ProgressTracker => {
  const { store, tailSize, policy } = deps;

  const load = async (): Promise<ProgressEntry[]> => {
    let raw: unknown;
    try {
      raw = await store.read();
    } catch (err) {
      console.warn(JSON.stringify({
        event: "progress.unreadable",
        reason: err instanceof Error ? err.message : String(err)
      }));
      return [];
    }

    if (raw === undefined) return [];
    if (!Array.isArray(raw) || !raw.every(isProgressEntry)) {
      console.warn(JSON.stringify({ event: "progress.unreadable", reason: "checkpoint is not a list of progress entries" }));
      return [];
    }
    return raw;
  };

  const resolveResume = async (workList: readonly WorkItem[]): Promise<ResumeDecision> => {
    const decision = decideResume(await load(), workList, policy);
    switch (decision.kind) {
      case "resume":
        console.log(JSON.stringify({ event: "progress.resuming", lastItem: decision.lastItem, offset: decision.offset }));
        break;
      case "restart":
        console.warn(JSON.stringify({ event: "progress.mismatch", lastItem: decision.lastItem, policy }));
        break;
      case "mismatch":
        console.error(JSON.stringify({ event: "progress.mismatch", lastItem: decision.lastItem, policy }));
        break;
      case "fresh":
        break;
    }
    return decision;
  };

  const checkpoint = async (successes: readonly CallSuccess[]): Promise<void> => {
    const tail = successes.slice(-tailSize).map(toProgressEntry);
    try {
      await store.write(tail);
      console.log(JSON.stringify({
        event: "progress.saved",
        entries: tail.length,
        lastItem: tail[tail.length - 1]?.username ?? null
      }));
    } catch (err) {
      console.warn(JSON.stringify({
        event: "progress.save_failed",
        reason: err instanceof Error ? err.message : String(err)
      }));
    }
  };

  return { load, resolveResume, checkpoint };
};
