import {
  defaultEngineConfig,
  engineCaps,
  type EngineConfig,
  isResumePolicy,
  resumePolicies,
  validateEngineConfig
} from "../../application/query-accounts/engine.config";
import { defaultSessionTimings, sessionCaps } from "../../application/session/session.config";

export type FileLocations = {
  inputFile: string;
  outputFile: string;
  inputColumn: string;
  credentialFile: string;
  progressFile: string;
};

export type BrowserOptions = {
  headless: boolean;
  executablePath?: string;
};

export type RuntimeConfig = {
  engine: EngineConfig;
  files: FileLocations;
  provinceCode: string;
  otpTimeoutMs: number;
  otpPollIntervalMs: number;
  browser: BrowserOptions;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const readString = (env: NodeJS.ProcessEnv, name: string, fallback: string): string => {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
};

const parseBoolean = (env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw == null || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${name} must be one of true, false, 1, 0. Received: ${raw}`);
};

const parseResumePolicy = (env: NodeJS.ProcessEnv) => {
  const raw = readString(env, "RESUME_ON_MISSING", defaultEngineConfig.resumeOnMissing);
  if (!isResumePolicy(raw)) {
    throw new Error(`RESUME_ON_MISSING must be one of ${resumePolicies.join(", ")}. Received: ${raw}`);
  }
  return raw;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const engine = validateEngineConfig({
    batchSize: parseOptionalIntInRange(env, "BATCH_SIZE", engineCaps.batchSize) ?? defaultEngineConfig.batchSize,
    threadWorkers: parseOptionalIntInRange(env, "THREAD_WORKERS", engineCaps.threadWorkers) ?? defaultEngineConfig.threadWorkers,
    processWorkers: parseOptionalIntInRange(env, "PROCESS_WORKERS", engineCaps.processWorkers) ?? defaultEngineConfig.processWorkers,
    maxAttempts: parseOptionalIntInRange(env, "MAX_ATTEMPTS", engineCaps.maxAttempts) ?? defaultEngineConfig.maxAttempts,
    retryDelayMs: parseOptionalIntInRange(env, "RETRY_DELAY_MS", engineCaps.retryDelayMs) ?? defaultEngineConfig.retryDelayMs,
    requestTimeoutMs:
      parseOptionalIntInRange(env, "REQUEST_TIMEOUT_MS", engineCaps.requestTimeoutMs) ?? defaultEngineConfig.requestTimeoutMs,
    saveInterval: parseOptionalIntInRange(env, "SAVE_INTERVAL", engineCaps.saveInterval) ?? defaultEngineConfig.saveInterval,
    checkpointTailSize:
      parseOptionalIntInRange(env, "CHECKPOINT_TAIL_SIZE", engineCaps.checkpointTailSize) ?? defaultEngineConfig.checkpointTailSize,
    resumeOnMissing: parseResumePolicy(env)
  });

  const files: FileLocations = {
    inputFile: readString(env, "INPUT_FILE", "input.xlsx"),
    outputFile: readString(env, "OUTPUT_FILE", "output.xlsx"),
    inputColumn: readString(env, "INPUT_COLUMN", "username"),
    credentialFile: readString(env, "CREDENTIAL_FILE", "session_cookies.json"),
    progressFile: readString(env, "PROGRESS_FILE", "progress.json")
  };

  const executablePath = env.BROWSER_EXECUTABLE_PATH?.trim();

  return {
    engine,
    files,
    provinceCode: readString(env, "PROVINCE_CODE", "NAN"),
    otpTimeoutMs: parseOptionalIntInRange(env, "OTP_TIMEOUT_MS", sessionCaps.otpTimeoutMs) ?? defaultSessionTimings.otpTimeoutMs,
    otpPollIntervalMs:
      parseOptionalIntInRange(env, "OTP_POLL_INTERVAL_MS", sessionCaps.otpPollIntervalMs) ?? defaultSessionTimings.otpPollIntervalMs,
    browser: {
      headless: parseBoolean(env, "BROWSER_HEADLESS", true),
      ...(executablePath ? { executablePath } : {})
    }
  };
};
