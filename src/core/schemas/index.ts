import { z } from "zod";

// ── Shared ────────────────────────────────────────────────────────────
const IsoDateSchema = z.string().datetime();

export const RANDOM_TEMPERATURE = "random" as const;

export const TemperatureSchema = z.number().min(0).max(1);

/** Fixed sampling temperature, or "random" to draw one per prompt. */
export const ScheduleTemperatureSchema = z.union([
  TemperatureSchema,
  z.literal(RANDOM_TEMPERATURE),
]);
export type ScheduleTemperature = z.infer<typeof ScheduleTemperatureSchema>;

// ── LLM configuration ─────────────────────────────────────────────────
export const LLMConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  provider: z.string().min(1),
  model: z.string().min(1),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  config: z.record(z.string()).default({}),
  enabled: z.boolean(),
  createdAt: IsoDateSchema,
  updatedAt: IsoDateSchema,
});
export type LLMConfig = z.infer<typeof LLMConfigSchema>;

// ── Prompt ────────────────────────────────────────────────────────────
export const PromptSchema = z.object({
  id: z.string().min(1),
  template: z.string().min(1),
  tags: z.array(z.string()).default([]),
  enabled: z.boolean(),
  createdAt: IsoDateSchema,
  updatedAt: IsoDateSchema,
});
export type Prompt = z.infer<typeof PromptSchema>;

// ── Schedule ──────────────────────────────────────────────────────────
export const ScheduleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  promptIds: z.array(z.string().min(1)),
  llmIds: z.array(z.string().min(1)),
  cronExpr: z.string().min(1),
  temperature: ScheduleTemperatureSchema,
  enabled: z.boolean(),
  lastRun: IsoDateSchema.optional(),
  nextRun: IsoDateSchema.optional(),
  createdAt: IsoDateSchema,
  updatedAt: IsoDateSchema,
});
export type Schedule = z.infer<typeof ScheduleSchema>;

// ── Response ──────────────────────────────────────────────────────────
export const ResponseSchema = z.object({
  id: z.string().min(1),
  promptId: z.string().min(1),
  /** Verbatim prompt text at execution time. */
  promptText: z.string(),
  llmId: z.string().min(1),
  llmName: z.string(),
  llmProvider: z.string(),
  llmModel: z.string(),
  responseText: z.string(),
  tokensUsed: z.number().int().nonnegative(),
  latencyMs: z.number().nonnegative(),
  temperature: z.number(),
  attempts: z.number().int().positive(),
  error: z.string().optional(),
  groundingSources: z.array(z.string()).optional(),
  scheduleId: z.string().optional(),
  createdAt: IsoDateSchema,
});
export type Response = z.infer<typeof ResponseSchema>;

// ── Execution ─────────────────────────────────────────────────────────
export const ExecutionConfigSchema = z.object({
  temperature: TemperatureSchema,
  maxRetries: z.number().int().nonnegative(),
  retryDelayMs: z.number().int().nonnegative(),
});
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;

export function defaultExecutionConfig(): ExecutionConfig {
  return { temperature: 0.7, maxRetries: 3, retryDelayMs: 30_000 };
}

export const ExecutionErrorSchema = z.object({
  promptId: z.string(),
  llmId: z.string(),
  error: z.string(),
});
export type ExecutionError = z.infer<typeof ExecutionErrorSchema>;

export const ExecutionResultSchema = z.object({
  runId: z.string().uuid(),
  scheduleId: z.string().optional(),
  scheduleName: z.string(),
  totalExecutions: z.number().int().nonnegative(),
  successfulExecutions: z.number().int().nonnegative(),
  failedExecutions: z.number().int().nonnegative(),
  skippedExecutions: z.number().int().nonnegative(),
  responses: z.array(ResponseSchema),
  errors: z.array(ExecutionErrorSchema),
  startedAt: IsoDateSchema,
  completedAt: IsoDateSchema,
  durationMs: z.number().nonnegative(),
});
export type ExecutionResult = z.infer<typeof ExecutionResultSchema>;

// ── Provider models ───────────────────────────────────────────────────
export const ModelInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
});
export type ModelInfo = z.infer<typeof ModelInfoSchema>;

// ── Stats ─────────────────────────────────────────────────────────────
/** Inclusive bounds on Response.createdAt. */
export interface TimeWindow {
  start?: Date;
  end?: Date;
}

export interface KeywordCount {
  keyword: string;
  count: number;
}

export interface KeywordStats {
  keyword: string;
  totalMentions: number;
  uniquePrompts: number;
  uniqueLLMs: number;
  byPrompt: Record<string, number>;
  byLLM: Record<string, number>;
  byProvider: Record<string, number>;
  firstSeen?: string;
  lastSeen?: string;
}

export interface PromptStats {
  promptId: string;
  totalResponses: number;
  uniqueLLMs: number;
  llmCounts: Record<string, number>;
  avgTokens: number;
}

export interface LLMStats {
  llmId: string;
  totalResponses: number;
  uniquePrompts: number;
  promptCounts: Record<string, number>;
  avgTokens: number;
}

export interface OverviewStats {
  totalPrompts: number;
  enabledPrompts: number;
  totalLLMs: number;
  enabledLLMs: number;
  totalSchedules: number;
  enabledSchedules: number;
  totalResponses: number;
}

export interface ProviderStats {
  provider: string;
  totalResponses: number;
  totalTokens: number;
  totalLatencyMs: number;
  avgTokens: number;
  avgLatencyMs: number;
  uniquePrompts: number;
  uniqueLLMs: number;
}

/** A prompt or LLM ranked by how many keyword mentions its responses carry. */
export interface MentionRank {
  id: string;
  /** Prompt template, or `name (provider)` for an LLM. */
  name: string;
  mentions: number;
}

export interface SearchMatch {
  responseId: string;
  promptId: string;
  promptText: string;
  llmName: string;
  llmProvider: string;
  temperature: number;
  /** Text around the match. */
  context: string;
  createdAt: string;
}
