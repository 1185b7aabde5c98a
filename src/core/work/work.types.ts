export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type WorkItem = string;

/** Cookie name to value map of an authenticated session. */
export type SessionCredential = Record<string, string>;

export type CallFailureReason = "attempts_exhausted" | "batch_crashed" | "unexpected_error";

export type CallSuccess = {
  item: WorkItem;
  status: "ok";
  payload: JsonValue;
  attempts: number;
};

export type CallFailure = {
  item: WorkItem;
  status: "absent";
  reason: CallFailureReason;
  attempts: number;
};

export type CallResult = CallSuccess | CallFailure;

export type Batch = {
  index: number;
  items: WorkItem[];
};

export const isSuccess = (result: CallResult): result is CallSuccess => result.status === "ok";

export const absentResult = (item: WorkItem, reason: CallFailureReason, attempts = 0): CallFailure => ({
  item,
  status: "absent",
  reason,
  attempts
});
