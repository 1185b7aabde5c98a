import type { OtpChannel } from "../../ports/OtpChannel";

export type TelegramOtpChannelOptions = {
  baseUrl: string;
  botToken: string;
  chatId: string;
  timeoutMs?: number;
};

type TelegramMessage = {
  chat: { id: number | string };
  date: number;
  text?: string;
};

type TelegramReply = {
  ok: boolean;
  status: number;
  body: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const asMessage = (update: unknown): TelegramMessage | undefined => {
  if (!isRecord(update) || !isRecord(update.message)) return undefined;
  const { chat, date, text } = update.message;
  if (!isRecord(chat) || (typeof chat.id !== "number" && typeof chat.id !== "string")) return undefined;
  if (typeof date !== "number") return undefined;
  return { chat: { id: chat.id }, date, text: typeof text === "string" ? text : undefined };
};

/**
 * Scans a getUpdates payload newest-first for an all-digit message in the
 * chat that was posted strictly after `after`.
 */
export const extractOtpCode = (payload: unknown, chatId: string, after: Date): string | undefined => {
  if (!isRecord(payload) || !Array.isArray(payload.result)) return undefined;

  for (let i = payload.result.length - 1; i >= 0; i -= 1) {
    const message = asMessage(payload.result[i]);
    if (!message || message.text == null) continue;
    if (String(message.chat.id) !== chatId) continue;
    if (message.date * 1000 <= after.getTime()) continue;

    const code = message.text.trim();
    if (/^\d+$/.test(code)) return code;
  }
  return undefined;
};

export class TelegramOtpChannel implements OtpChannel {
  constructor(private readonly options: TelegramOtpChannelOptions) {}

  private methodUrl(method: "sendMessage" | "getUpdates"): string {
    const url = new URL(this.options.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${base}bot${this.options.botToken}/${method}`;
    return url.toString();
  }

  /** Fetches and reads the body under one timer. */
  private async request(method: "sendMessage" | "getUpdates", init: RequestInit = {}): Promise<TelegramReply> {
    const timeoutMs = this.options.timeoutMs ?? 8000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(this.methodUrl(method), { ...init, signal: controller.signal });
      const body = await res.text();
      return { ok: res.ok, status: res.status, body };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(`Telegram ${method} timeout after ${timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  async notify(message: string): Promise<void> {
    try {
      const res = await this.request("sendMessage", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: this.options.chatId, text: message })
      });
      if (!res.ok) {
        console.warn(JSON.stringify({ event: "otp.notify_failed", status: res.status }));
        return;
      }
      console.log(JSON.stringify({ event: "otp.notified" }));
    } catch (err) {
      console.warn(JSON.stringify({
        event: "otp.notify_failed",
        status: null,
        reason: err instanceof Error ? err.message : String(err)
      }));
    }
  }

  async pollForCode(after: Date): Promise<string | undefined> {
    try {
      const res = await this.request("getUpdates");
      if (!res.ok) {
        console.warn(JSON.stringify({ event: "otp.poll_failed", status: res.status }));
        return undefined;
      }
      const payload: unknown = JSON.parse(res.body);
      return extractOtpCode(payload, this.options.chatId, after);
    } catch (err) {
      console.warn(JSON.stringify({
        event: "otp.poll_failed",
        status: null,
        reason: err instanceof Error ? err.message : String(err)
      }));
      return undefined;
    }
  }
}
