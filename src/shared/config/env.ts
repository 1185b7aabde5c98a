export type Env = {
  LINETEST_BASE_URL: string;
  LINETEST_USERNAME: string;
  LINETEST_PASSWORD: string;
  TELEGRAM_BASE_URL: string;
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_CHAT_ID: string;
  MONGO_URI?: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateMongoUri = (value: string | undefined): string | undefined => {
  if (value == null || value.trim() === "") return undefined;
  if (!/^mongodb(\+srv)?:\/\//.test(value)) {
    throw new Error("MONGO_URI must start with mongodb:// or mongodb+srv://");
  }
  return value;
};

const validateChatId = (value: string): string => {
  if (value !== "" && !/^-?\d+$/.test(value)) {
    throw new Error(`TELEGRAM_CHAT_ID must be a numeric chat id. Received: ${value}`);
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const LINETEST_BASE_URL = validateHttpUrl("LINETEST_BASE_URL", env.LINETEST_BASE_URL ?? "https://cts.vnpt.vn");
  const LINETEST_USERNAME = env.LINETEST_USERNAME ?? "";
  const LINETEST_PASSWORD = env.LINETEST_PASSWORD ?? "";
  const TELEGRAM_BASE_URL = validateHttpUrl("TELEGRAM_BASE_URL", env.TELEGRAM_BASE_URL ?? "https://api.telegram.org");
  const TELEGRAM_BOT_TOKEN = env.TELEGRAM_BOT_TOKEN ?? "";
  const TELEGRAM_CHAT_ID = validateChatId(env.TELEGRAM_CHAT_ID?.trim() ?? "");
  const MONGO_URI = validateMongoUri(env.MONGO_URI);

  return {
    LINETEST_BASE_URL,
    LINETEST_USERNAME,
    LINETEST_PASSWORD,
    TELEGRAM_BASE_URL,
    TELEGRAM_BOT_TOKEN,
    TELEGRAM_CHAT_ID,
    ...(MONGO_URI ? { MONGO_URI } : {})
  };
};
