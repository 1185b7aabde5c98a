import { sendJson, startServer } from "../helpers/http-server";
import { loggedEvents, silenceConsole } from "../helpers/fakes";
import { LinetestHttpClient } from "../../src/infrastructure/linetest/LinetestHttpClient";

const createClient = (baseUrl: string, maxAttempts: number, sleeps: number[]) =>
  new LinetestHttpClient({
    baseUrl,
    provinceCode: "NAN",
    maxAttempts,
    retryDelayMs: 250,
    timeoutMs: 2000,
    sleepFn: async (ms) => {
      sleeps.push(ms);
    }
  });

describe("LinetestHttpClient retry policy", () => {
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    consoleSpies = silenceConsole();
  });

  afterEach(() => {
    consoleSpies.restore();
  });

  it("returns the payload of the first successful attempt and stops there", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests < 3) {
        res.writeHead(500, { "content-type": "text/plain" });
        res.end("temporary failure");
        return;
      }
      sendJson(res, 200, { attempt: requests });
    });

    const sleeps: number[] = [];
    const client = createClient(server.baseUrl, 5, sleeps);
    const result = await client.call("acc-1", { sid: "abc" });

    expect(result).toEqual({ item: "acc-1", status: "ok", payload: { attempt: 3 }, attempts: 3 });
    expect(requests).toBe(3);
    expect(sleeps).toEqual([250, 250]);

    await server.close();
  });

  it("returns an absent result after exactly maxAttempts failing attempts", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      res.writeHead(503, { "content-type": "text/plain" });
      res.end("unavailable");
    });

    const sleeps: number[] = [];
    const client = createClient(server.baseUrl, 3, sleeps);
    const result = await client.call("acc-2", { sid: "abc" });

    expect(result).toEqual({ item: "acc-2", status: "absent", reason: "attempts_exhausted", attempts: 3 });
    expect(requests).toBe(3);
    expect(sleeps).toEqual([250, 250]);

    await server.close();
  });

  it("retries transport failures", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests === 1) {
        res.socket?.destroy();
        return;
      }
      sendJson(res, 200, []);
    });

    const client = createClient(server.baseUrl, 2, []);
    const result = await client.call("acc-3", {});

    expect(result).toEqual({ item: "acc-3", status: "ok", payload: [], attempts: 2 });
    expect(requests).toBe(2);

    await server.close();
  });

  it("retries a success status whose body is not JSON", async () => {
    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests === 1) {
        res.writeHead(200, { "content-type": "text/html" });
        res.end("<html>login</html>");
        return;
      }
      sendJson(res, 200, [{ port: "3/1" }]);
    });

    const client = createClient(server.baseUrl, 2, []);
    const result = await client.call("acc-4", {});

    expect(result).toEqual({ item: "acc-4", status: "ok", payload: [{ port: "3/1" }], attempts: 2 });

    await server.close();
  });

  it("logs one line per attempt without response bodies", async () => {
    let requests = 0;
    const secretBody = "upstream-secret-body";
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests === 1) {
        res.writeHead(500, { "content-type": "text/plain" });
        res.end(secretBody);
        return;
      }
      sendJson(res, 200, []);
    });

    const client = createClient(server.baseUrl, 2, []);
    await client.call("acc-5", { sid: "abc" });

    expect(loggedEvents(consoleSpies.warn)).toEqual([
      { event: "call.retry", item: "acc-5", status: 500, attempt: 1, maxAttempts: 2 }
    ]);
    expect(loggedEvents(consoleSpies.log)).toEqual([
      { event: "call.succeeded", item: "acc-5", attempt: 2, maxAttempts: 2 }
    ]);
    expect(JSON.stringify(consoleSpies.warn.mock.calls)).not.toContain(secretBody);

    await server.close();
  });

  it("logs give-up metadata on the last attempt", async () => {
    const server = await startServer((_req, res) => {
      res.writeHead(502, { "content-type": "text/plain" });
      res.end("bad gateway");
    });

    const client = createClient(server.baseUrl, 2, []);
    await client.call("acc-6", {});

    expect(loggedEvents(consoleSpies.warn)).toEqual([
      { event: "call.retry", item: "acc-6", status: 502, attempt: 1, maxAttempts: 2 },
      { event: "call.give_up", item: "acc-6", status: 502, attempt: 2, maxAttempts: 2 }
    ]);

    await server.close();
  });
});
