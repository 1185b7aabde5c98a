import { queryAccounts, type RunOutcome } from "../application/query-accounts/queryAccounts.usecase";
import { createProgressTracker } from "../application/query-accounts/progressTracker";
import { acquireSession } from "../application/session/acquireSession.usecase";
import { defaultOtpRequestMessage, type SessionConfig } from "../application/session/session.config";
import { PlaywrightLoginDriver } from "../infrastructure/browser/PlaywrightLoginDriver";
import { ExcelAccountListSource } from "../infrastructure/excel/ExcelAccountListSource";
import { ExcelResultSink } from "../infrastructure/excel/ExcelResultSink";
import { JsonFileCredentialStore } from "../infrastructure/files/JsonFileCredentialStore";
import { JsonFileProgressStore } from "../infrastructure/files/JsonFileProgressStore";
import { LinetestHttpClient } from "../infrastructure/linetest/LinetestHttpClient";
import { MongoRunHistory } from "../infrastructure/mongo/MongoRunHistory";
import { TelegramOtpChannel } from "../infrastructure/telegram/TelegramOtpChannel";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type RuntimeConfig } from "../shared/config/runtime.config";

export type AppConfig = {
  env: Env;
  runtime: RuntimeConfig;
};

export const loadAppConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => ({
  env: loadEnv(source),
  runtime: loadRuntimeConfigFromEnv(source)
});

export const runQueryAccounts = async (config: AppConfig = loadAppConfig()): Promise<RunOutcome> => {
  const { env, runtime } = config;

  const client = new LinetestHttpClient({
    baseUrl: env.LINETEST_BASE_URL,
    provinceCode: runtime.provinceCode,
    maxAttempts: runtime.engine.maxAttempts,
    retryDelayMs: runtime.engine.retryDelayMs,
    timeoutMs: runtime.engine.requestTimeoutMs
  });
  const sessionConfig: SessionConfig = {
    username: env.LINETEST_USERNAME,
    password: env.LINETEST_PASSWORD,
    otpTimeoutMs: runtime.otpTimeoutMs,
    otpPollIntervalMs: runtime.otpPollIntervalMs,
    otpRequestMessage: defaultOtpRequestMessage
  };
  const credentialStore = new JsonFileCredentialStore(runtime.files.credentialFile);
  const otp = new TelegramOtpChannel({
    baseUrl: env.TELEGRAM_BASE_URL,
    botToken: env.TELEGRAM_BOT_TOKEN,
    chatId: env.TELEGRAM_CHAT_ID
  });
  const tracker = createProgressTracker({
    store: new JsonFileProgressStore(runtime.files.progressFile),
    tailSize: runtime.engine.checkpointTailSize,
    policy: runtime.engine.resumeOnMissing
  });
  const history = env.MONGO_URI ? new MongoRunHistory(env.MONGO_URI) : undefined;

  try {
    return await queryAccounts({
      source: new ExcelAccountListSource(),
      sink: new ExcelResultSink(),
      client,
      tracker,
      history,
      acquireSession: () =>
        acquireSession({
          store: credentialStore,
          client,
          driver: new PlaywrightLoginDriver({
            baseUrl: env.LINETEST_BASE_URL,
            headless: runtime.browser.headless,
            executablePath: runtime.browser.executablePath
          }),
          otp,
          config: sessionConfig
        }),
      config: { engine: runtime.engine, files: runtime.files }
    });
  } finally {
    await history?.close();
  }
};
