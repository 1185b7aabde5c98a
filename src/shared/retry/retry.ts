export type RetryOptions = {
  maxAttempts: number;      // total tries, the first one included
  delayMs: number;          // fixed pause between tries
  onRetry?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  sleepFn?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export const retry = async <T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { maxAttempts, delayMs, onRetry, onGiveUp, sleepFn = sleep } = opts;

  let attempt = 1;
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      onRetry?.({ attempt, maxAttempts, error: err });
      await sleepFn(delayMs);
      attempt += 1;
    }
  }
};
