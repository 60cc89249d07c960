import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export type PipelineMode = "live" | "fake";

export type SynthesisConfig = {
  apiKey: string;
  apiSecret: string;
  endpoint: string;
  reqKey: string;
};

export type LlmConfig = {
  apiKey: string;
  endpoint: string;
  modelId: string;
};

export type StorageConfig = {
  bucket: string;
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  keyPrefix: string;
};

export type AppConfig = {
  mode: PipelineMode;
  port: number;
  maxConcurrentRuns: number;
  synthesisConcurrency: number;
  autoAdvanceMs: number;
  /** Artificial latency of the offline collaborators in fake mode. */
  fakeDelayMs: number;
  synthesis: SynthesisConfig;
  llm: LlmConfig;
  storage: StorageConfig;
};

export const SYNTH_CONCURRENCY_MAX = 8;
const DEFAULT_PORT = 5050;
const DEFAULT_AUTO_ADVANCE_MS = 5000;
const DEFAULT_KEY_PREFIX = "webstory";
const DEFAULT_FAKE_DELAY_MS = 250;

const LIVE_REQUIRED = [
  "CV_API_KEY",
  "CV_API_SECRET",
  "CV_API_ENDPOINT",
  "CV_REQ_KEY",
  "ARK_API_KEY",
  "ARK_API_ENDPOINT",
  "ARK_MODEL_ID",
  "STORAGE_BUCKET",
  "STORAGE_ENDPOINT",
  "STORAGE_REGION",
  "STORAGE_ACCESS_KEY_ID",
  "STORAGE_SECRET_ACCESS_KEY"
] as const;

type RequiredVar = (typeof LIVE_REQUIRED)[number];

const optionalTrimmed = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const EnvSchema = z.object({
  WEBSTORY_PIPELINE_MODE: optionalTrimmed.pipe(z.enum(["live", "fake"]).optional()),
  PORT: optionalTrimmed.pipe(z.coerce.number().int().min(1).max(65535).optional()),
  MAX_CONCURRENT_RUNS: optionalTrimmed.pipe(z.coerce.number().int().min(1).max(16).optional()),
  WEBSTORY_SYNTH_CONCURRENCY: optionalTrimmed.pipe(z.coerce.number().int().min(1).max(SYNTH_CONCURRENCY_MAX).optional()),
  WEBSTORY_AUTO_ADVANCE_MS: optionalTrimmed.pipe(z.coerce.number().int().min(0).max(60_000).optional()),
  WEBSTORY_FAKE_DELAY_MS: optionalTrimmed.pipe(z.coerce.number().int().min(0).max(10_000).optional()),
  STORAGE_KEY_PREFIX: optionalTrimmed
});

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name];
  return v && v.trim().length > 0 ? v.trim() : undefined;
}

/**
 * Reads configuration from an environment map. In live mode every upstream credential must be
 * present; the fake pipeline only needs the ambient settings.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`, fields);
  }

  const mode: PipelineMode = parsed.data.WEBSTORY_PIPELINE_MODE ?? "live";
  const values: Partial<Record<RequiredVar, string>> = {};
  const missing: string[] = [];
  for (const name of LIVE_REQUIRED) {
    const v = readVar(env, name);
    if (v) values[name] = v;
    else missing.push(name);
  }

  if (mode === "live" && missing.length > 0) {
    throw new ConfigurationError(`Missing required env vars: ${missing.join(", ")}`, missing);
  }

  const fallback = (name: RequiredVar, fake: string): string => values[name] ?? fake;

  return {
    mode,
    port: parsed.data.PORT ?? DEFAULT_PORT,
    maxConcurrentRuns: parsed.data.MAX_CONCURRENT_RUNS ?? 1,
    synthesisConcurrency: parsed.data.WEBSTORY_SYNTH_CONCURRENCY ?? 1,
    autoAdvanceMs: parsed.data.WEBSTORY_AUTO_ADVANCE_MS ?? DEFAULT_AUTO_ADVANCE_MS,
    fakeDelayMs: parsed.data.WEBSTORY_FAKE_DELAY_MS ?? DEFAULT_FAKE_DELAY_MS,
    synthesis: {
      apiKey: fallback("CV_API_KEY", "fake-key"),
      apiSecret: fallback("CV_API_SECRET", "fake-secret"),
      endpoint: fallback("CV_API_ENDPOINT", "http://localhost/fake-synthesis"),
      reqKey: fallback("CV_REQ_KEY", "fake-req-key")
    },
    llm: {
      apiKey: fallback("ARK_API_KEY", "fake-key"),
      endpoint: fallback("ARK_API_ENDPOINT", "http://localhost/fake-llm/chat/completions"),
      modelId: fallback("ARK_MODEL_ID", "fake-model")
    },
    storage: {
      bucket: fallback("STORAGE_BUCKET", "local"),
      endpoint: fallback("STORAGE_ENDPOINT", "localhost"),
      region: fallback("STORAGE_REGION", "local"),
      accessKeyId: fallback("STORAGE_ACCESS_KEY_ID", "fake-access-key"),
      secretAccessKey: fallback("STORAGE_SECRET_ACCESS_KEY", "fake-secret-key"),
      keyPrefix: (parsed.data.STORAGE_KEY_PREFIX ?? DEFAULT_KEY_PREFIX).replace(/^\/+|\/+$/g, "")
    }
  };
}

export function configPresence(env: NodeJS.ProcessEnv = process.env): {
  hasSynthesisKey: boolean;
  hasLlmKey: boolean;
  hasStorage: boolean;
} {
  return {
    hasSynthesisKey: Boolean(readVar(env, "CV_API_KEY") && readVar(env, "CV_API_SECRET")),
    hasLlmKey: Boolean(readVar(env, "ARK_API_KEY")),
    hasStorage: Boolean(
      readVar(env, "STORAGE_BUCKET") && readVar(env, "STORAGE_ENDPOINT") && readVar(env, "STORAGE_ACCESS_KEY_ID") && readVar(env, "STORAGE_SECRET_ACCESS_KEY")
    )
  };
}
