import type { AccountQueryClient } from "../../ports/AccountQueryClient";
import {
  absentResult,
  type CallResult,
  type JsonValue,
  type SessionCredential,
  type WorkItem
} from "../../core/work/work.types";
import { retry } from "../../shared/retry/retry";

export const linetestQueryPath = "linetest/Test/TestGponByList";
export const probeAccount = "test_user";

export type LinetestClientOptions = {
  baseUrl: string;
  provinceCode: string;
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  sleepFn?: (ms: number) => Promise<void>;
};

export class LinetestRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "LinetestRequestError";
    this.status = status;
  }
}

export const toCookieHeader = (credential: SessionCredential): string =>
  Object.entries(credential)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");

const statusOf = (error: unknown): number | null =>
  error instanceof LinetestRequestError && error.status != null ? error.status : null;

/**
 * Queries one account per request against the line-test endpoint, with the
 * session cookies attached. `call` never rejects.
 */
export class LinetestHttpClient implements AccountQueryClient {
  private readonly endpoint: string;

  constructor(private readonly options: LinetestClientOptions) {
    const url = new URL(options.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${linetestQueryPath}` : `${url.pathname}/${linetestQueryPath}`;
    this.endpoint = url.toString();
  }

  /** The timer covers the whole exchange, body read included. */
  private async post(listInfo: JsonValue, credential: SessionCredential): Promise<JsonValue> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const res = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json;charset=UTF-8",
          Cookie: toCookieHeader(credential)
        },
        body: JSON.stringify({ listInfo, provinceCode: this.options.provinceCode }),
        signal: controller.signal
      });

      if (!res.ok) {
        await res.text().catch(() => "");
        throw new LinetestRequestError(`Linetest request failed: ${res.status}`, res.status);
      }

      const text = await res.text();
      const payload: JsonValue = JSON.parse(text);
      return payload;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new LinetestRequestError(`Linetest request timeout after ${this.options.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  async call(item: WorkItem, credential: SessionCredential): Promise<CallResult> {
    const { maxAttempts, retryDelayMs, sleepFn } = this.options;
    let attempts = 0;

    try {
      const payload = await retry(
        async (attempt) => {
          attempts = attempt;
          const body = await this.post(item, credential);
          console.log(JSON.stringify({ event: "call.succeeded", item, attempt, maxAttempts }));
          return body;
        },
        {
          maxAttempts,
          delayMs: retryDelayMs,
          sleepFn,
          onRetry: ({ attempt, error }) => {
            console.warn(JSON.stringify({ event: "call.retry", item, status: statusOf(error), attempt, maxAttempts }));
          },
          onGiveUp: ({ attempt, error }) => {
            console.warn(JSON.stringify({ event: "call.give_up", item, status: statusOf(error), attempt, maxAttempts }));
          }
        }
      );
      return { item, status: "ok", payload, attempts };
    } catch {
      return absentResult(item, "attempts_exhausted", attempts);
    }
  }

  async probe(credential: SessionCredential): Promise<boolean> {
    try {
      await this.post([probeAccount], credential);
      console.log(JSON.stringify({ event: "session.probe", valid: true }));
      return true;
    } catch (error) {
      console.log(JSON.stringify({ event: "session.probe", valid: false, status: statusOf(error) }));
      return false;
    }
  }
}
