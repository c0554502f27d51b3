import { ZodError } from "zod";
import type { Response } from "./schemas/index.js";

export type ErrorKind =
  | "configuration"
  | "provider"
  | "execution"
  | "storage"
  | "not_found"
  | "busy"
  | "aborted";

/** Base class for every error the monitor raises on purpose. */
export abstract class GeoMonitorError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown provider, malformed cron, missing credential. Never retried. */
export class ConfigurationError extends GeoMonitorError {
  readonly kind = "configuration";
}

export class ProviderError extends GeoMonitorError {
  readonly kind = "provider";
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { retryable: boolean; status?: number; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

/** Terminal failure of an attempt sequence; the failed Response was persisted. */
export class ExecutionFailedError extends GeoMonitorError {
  readonly kind = "execution";
  readonly response: Response;

  constructor(message: string, response: Response, options?: { cause?: unknown }) {
    super(message, options);
    this.response = response;
  }
}

export class StorageError extends GeoMonitorError {
  readonly kind = "storage";
}

export class NotFoundError extends GeoMonitorError {
  readonly kind = "not_found";
}

export class ScheduleBusyError extends GeoMonitorError {
  readonly kind = "busy";
  readonly scheduleId: string;

  constructor(scheduleId: string) {
    super(`Schedule ${scheduleId} is already running`);
    this.scheduleId = scheduleId;
  }
}

export class AbortedError extends GeoMonitorError {
  readonly kind = "aborted";

  constructor(message = "Operation aborted") {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return `Schema validation failed: ${error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join(", ")}`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}

/** Wrap a ZodError raised at a boundary into a ConfigurationError. */
export function toConfigurationError(error: unknown, context: string): ConfigurationError {
  return new ConfigurationError(`${context}: ${errorMessage(error)}`, { cause: error });
}

const TRANSIENT_STATUS = new Set([408, 409, 425, 429]);
const PERMANENT_STATUS = new Set([400, 401, 403, 404, 405, 413, 422]);

const TRANSIENT_PATTERNS = [
  /rate.?limit/i,
  /quota/i,
  /timed? ?out/i,
  /timeout/i,
  /overloaded/i,
  /temporarily unavailable/i,
  /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up/,
  /\b(429|5\d\d)\b/,
];

const PERMANENT_PATTERNS = [
  /invalid[ _-]?api[ _-]?key/i,
  /incorrect api key/i,
  /unauthori[sz]ed/i,
  /permission denied/i,
  /invalid request/i,
  /model .*not found/i,
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  const status = error.status;
  return typeof status === "number" ? status : undefined;
}

/**
 * Decide whether a provider failure is worth another attempt.
 * Unknown failures are treated as transient.
 */
export function classifyProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = errorMessage(error);
  const status = readStatus(error);

  if (status !== undefined) {
    if (TRANSIENT_STATUS.has(status) || status >= 500) {
      return new ProviderError(message, { retryable: true, status, cause: error });
    }
    if (PERMANENT_STATUS.has(status)) {
      return new ProviderError(message, { retryable: false, status, cause: error });
    }
  }

  if (PERMANENT_PATTERNS.some((p) => p.test(message))) {
    return new ProviderError(message, { retryable: false, status, cause: error });
  }
  if (TRANSIENT_PATTERNS.some((p) => p.test(message))) {
    return new ProviderError(message, { retryable: true, status, cause: error });
  }
  return new ProviderError(message, { retryable: true, status, cause: error });
}
