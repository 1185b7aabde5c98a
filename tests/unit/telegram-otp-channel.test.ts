import { type CapturedRequest, sendJson, startServer } from "../helpers/http-server";
import { loggedEvents, silenceConsole } from "../helpers/fakes";
import { extractOtpCode, TelegramOtpChannel } from "../../src/infrastructure/telegram/TelegramOtpChannel";

const update = (chatId: number, date: number, text?: string) => ({
  update_id: date,
  message: { chat: { id: chatId }, date, ...(text === undefined ? {} : { text }) }
});

describe("extractOtpCode", () => {
  const after = new Date(1_000_000);

  it("returns the newest numeric message from the chat posted after the request", () => {
    const payload = {
      ok: true,
      result: [update(42, 1001, "111111"), update(42, 1002, " 222222 "), update(42, 1003, "thanks")]
    };
    expect(extractOtpCode(payload, "42", after)).toBe("222222");
  });

  it("ignores other chats, older messages and messages without text", () => {
    const payload = {
      ok: true,
      result: [update(42, 999, "123456"), update(42, 1000, "654321"), update(7, 1005, "777777"), update(42, 1006)]
    };
    expect(extractOtpCode(payload, "42", after)).toBeUndefined();
  });

  it("returns undefined for a payload without results", () => {
    expect(extractOtpCode({ ok: false }, "42", after)).toBeUndefined();
    expect(extractOtpCode("not json", "42", after)).toBeUndefined();
  });
});

describe("TelegramOtpChannel", () => {
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
  });

  afterEach(() => {
    consoleSpies.restore();
  });

  it("posts the OTP request message to the configured chat", async () => {
    const captured: CapturedRequest[] = [];
    const server = await startServer((req, res, body) => {
      captured.push({ method: req.method ?? "", path: req.url ?? "", headers: req.headers, body });
      sendJson(res, 200, { ok: true });
    });

    const channel = new TelegramOtpChannel({ baseUrl: server.baseUrl, botToken: "test-token", chatId: "42" });
    await channel.notify("I need OTP");

    expect(captured).toHaveLength(1);
    expect(captured[0]?.method).toBe("POST");
    expect(captured[0]?.path).toBe("/bottest-token/sendMessage");
    expect(JSON.parse(captured[0]?.body ?? "")).toEqual({ chat_id: "42", text: "I need OTP" });
    expect(loggedEvents(consoleSpies.log)).toEqual([{ event: "otp.notified" }]);

    await server.close();
  });

  it("polls getUpdates and extracts the code", async () => {
    const paths: string[] = [];
    const server = await startServer((req, res) => {
      paths.push(req.url ?? "");
      sendJson(res, 200, { ok: true, result: [update(42, 2000, "987654")] });
    });

    const channel = new TelegramOtpChannel({ baseUrl: server.baseUrl, botToken: "test-token", chatId: "42" });

    await expect(channel.pollForCode(new Date(1_999_000))).resolves.toBe("987654");
    await expect(channel.pollForCode(new Date(2_000_000))).resolves.toBeUndefined();
    expect(paths).toEqual(["/bottest-token/getUpdates", "/bottest-token/getUpdates"]);

    await server.close();
  });

  it("logs failures without throwing", async () => {
    const server = await startServer((_req, res) => sendJson(res, 502, { ok: false }));

    const channel = new TelegramOtpChannel({ baseUrl: server.baseUrl, botToken: "test-token", chatId: "42" });
    await expect(channel.notify("I need OTP")).resolves.toBeUndefined();
    await expect(channel.pollForCode(new Date(0))).resolves.toBeUndefined();

    expect(loggedEvents(consoleSpies.warn)).toEqual([
      { event: "otp.notify_failed", status: 502 },
      { event: "otp.poll_failed", status: 502 }
    ]);

    await server.close();
  });
});
