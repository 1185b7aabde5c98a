export type ResumePolicy = "fail" | "restart";

export type EngineConfig = {
  batchSize: number;
  threadWorkers: number;
  processWorkers: number;
  maxAttempts: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  saveInterval: number;
  checkpointTailSize: number;
  resumeOnMissing: ResumePolicy;
};

export const defaultEngineConfig: EngineConfig = {
  batchSize: 500,
  threadWorkers: 20,
  processWorkers: 8,
  maxAttempts: 2,
  retryDelayMs: 1000,
  requestTimeoutMs: 8000,
  saveInterval: 1000,
  checkpointTailSize: 100,
  resumeOnMissing: "fail"
};

export const engineCaps = {
  batchSize: { min: 1, max: 10000 },
  threadWorkers: { min: 1, max: 200 },
  processWorkers: { min: 1, max: 64 },
  maxAttempts: { min: 1, max: 10 },
  retryDelayMs: { min: 0, max: 60000 },
  requestTimeoutMs: { min: 1000, max: 120000 },
  saveInterval: { min: 1, max: 1000000 },
  checkpointTailSize: { min: 1, max: 10000 }
} as const;

type CappedKey = keyof typeof engineCaps;

const cappedKeys: readonly CappedKey[] = [
  "batchSize",
  "threadWorkers",
  "processWorkers",
  "maxAttempts",
  "retryDelayMs",
  "requestTimeoutMs",
  "saveInterval",
  "checkpointTailSize"
];

export const resumePolicies: readonly ResumePolicy[] = ["fail", "restart"];

export const isResumePolicy = (value: string): value is ResumePolicy =>
  resumePolicies.some((policy) => policy === value);

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateEngineConfig = (config: EngineConfig): EngineConfig => {
  for (const key of cappedKeys) {
    assertIntegerInRange(key, config[key], engineCaps[key].min, engineCaps[key].max);
  }
  if (!isResumePolicy(config.resumeOnMissing)) {
    throw new Error(`resumeOnMissing must be one of ${resumePolicies.join(", ")}. Received: ${String(config.resumeOnMissing)}`);
  }
  return config;
};
