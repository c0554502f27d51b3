import pino, { type Logger } from "pino";

/**
 * Named pino logger. The level comes from LOG_LEVEL so tests can run silent.
 */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env["LOG_LEVEL"] ?? "info" });
}

/** Mask a credential for log output: "sk-t...1234". */
export function maskApiKey(apiKey: string | undefined): string {
  if (!apiKey) return "(not set)";
  if (apiKey.length <= 8) return "***";
  return `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}`;
}
