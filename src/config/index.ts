import * as path from "node:path";
import { z } from "zod";
import { toConfigurationError } from "../core/errors.js";

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  GEO_DATA_DIR: z.string().min(1).default("./data"),
  GEO_EXCLUSION_FILE: z.string().min(1).default("./config/keywords_exclusion"),
  GEO_WORKER_CONCURRENCY: intFromEnv(4, 1),
  GEO_MAX_RETRIES: intFromEnv(3),
  GEO_RETRY_DELAY_MS: intFromEnv(30_000),
  GEO_TICK_INTERVAL_MS: intFromEnv(60_000, 1),
  GEO_DEFAULT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
  GEO_REQUESTS_PER_MINUTE: intFromEnv(6),
  GEO_RATE_LIMIT_BURST: intFromEnv(1, 1),
  PORT: intFromEnv(3100, 1),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface AppConfig {
  dataDir: string;
  exclusionFile: string;
  workerConcurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  tickIntervalMs: number;
  defaultTemperature: number;
  /** Calls per minute per provider; 0 disables pacing. */
  requestsPerMinute: number;
  rateLimitBurst: number;
  port: number;
  host: string;
  logLevel: string;
}

/**
 * Read configuration from the environment. Empty strings count as unset.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, "Invalid environment configuration");
  }

  const e = parsed.data;
  const dataDir = path.resolve(e.GEO_DATA_DIR);
  return {
    dataDir,
    exclusionFile: path.resolve(e.GEO_EXCLUSION_FILE),
    workerConcurrency: e.GEO_WORKER_CONCURRENCY,
    maxRetries: e.GEO_MAX_RETRIES,
    retryDelayMs: e.GEO_RETRY_DELAY_MS,
    tickIntervalMs: e.GEO_TICK_INTERVAL_MS,
    defaultTemperature: e.GEO_DEFAULT_TEMPERATURE,
    requestsPerMinute: e.GEO_REQUESTS_PER_MINUTE,
    rateLimitBurst: e.GEO_RATE_LIMIT_BURST,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
  };
}
