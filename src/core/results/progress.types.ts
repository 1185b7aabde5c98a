import type { JsonValue } from "../work/work.types";

/** Persisted form of one successful call, as stored in the checkpoint file. */
export type ProgressEntry = {
  username: string;
  response: JsonValue;
};
