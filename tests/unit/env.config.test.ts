import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults and leaves MONGO_URI out when unset", () => {
    const env = loadEnv({});

    expect(env).toEqual({
      LINETEST_BASE_URL: "https://cts.vnpt.vn",
      LINETEST_USERNAME: "",
      LINETEST_PASSWORD: "",
      TELEGRAM_BASE_URL: "https://api.telegram.org",
      TELEGRAM_BOT_TOKEN: "",
      TELEGRAM_CHAT_ID: ""
    });
  });

  it.each([
    "http://localhost:3999",
    "https://cts.example.test/portal"
  ])("accepts valid LINETEST_BASE_URL with http/https: %s", (baseUrl) => {
    const env = loadEnv({ LINETEST_BASE_URL: baseUrl });
    expect(env.LINETEST_BASE_URL).toBe(baseUrl);
  });

  it("rejects non-absolute base URLs", () => {
    expect(() => loadEnv({ LINETEST_BASE_URL: "/linetest" })).toThrow(
      "LINETEST_BASE_URL must be a valid absolute http/https URL. Received: /linetest"
    );
  });

  it("rejects unsupported base URL schemes", () => {
    expect(() => loadEnv({ TELEGRAM_BASE_URL: "ftp://example.com" })).toThrow(
      "TELEGRAM_BASE_URL must use http or https scheme. Received: ftp://example.com"
    );
  });

  it("keeps credentials and a trimmed numeric chat id", () => {
    const env = loadEnv({
      LINETEST_USERNAME: "operator",
      LINETEST_PASSWORD: "test-secret",
      TELEGRAM_BOT_TOKEN: "test-token",
      TELEGRAM_CHAT_ID: " -100123 "
    });

    expect(env.LINETEST_USERNAME).toBe("operator");
    expect(env.LINETEST_PASSWORD).toBe("test-secret");
    expect(env.TELEGRAM_BOT_TOKEN).toBe("test-token");
    expect(env.TELEGRAM_CHAT_ID).toBe("-100123");
  });

  it("rejects a non-numeric chat id", () => {
    expect(() => loadEnv({ TELEGRAM_CHAT_ID: "@channel" })).toThrow(
      "TELEGRAM_CHAT_ID must be a numeric chat id. Received: @channel"
    );
  });

  it("accepts mongodb URIs and rejects other schemes", () => {
    expect(loadEnv({ MONGO_URI: "mongodb://localhost:27017/linetest" }).MONGO_URI).toBe(
      "mongodb://localhost:27017/linetest"
    );
    expect(loadEnv({ MONGO_URI: "mongodb+srv://cluster.example.test/linetest" }).MONGO_URI).toBe(
      "mongodb+srv://cluster.example.test/linetest"
    );
    expect(() => loadEnv({ MONGO_URI: "postgres://localhost/linetest" })).toThrow(
      "MONGO_URI must start with mongodb:// or mongodb+srv://"
    );
  });
});
