import type { LLMConfig, Prompt, Response, Schedule, TimeWindow } from "../schemas/index.js";

export interface ResponseFilter {
  promptId?: string;
  llmId?: string;
  scheduleId?: string;
  /** Case-insensitive substring of the response text. */
  keyword?: string;
  window?: TimeWindow;
  limit?: number;
}

/**
 * Storage capability used by the pipeline.
 * `get*` resolve to null when the record does not exist.
 */
export interface Store {
  listPrompts(enabled?: boolean): Promise<Prompt[]>;
  getPrompt(id: string): Promise<Prompt | null>;
  createPrompt(prompt: Prompt): Promise<void>;
  updatePrompt(prompt: Prompt): Promise<void>;
  deletePrompt(id: string): Promise<boolean>;

  listLLMs(enabled?: boolean): Promise<LLMConfig[]>;
  getLLM(id: string): Promise<LLMConfig | null>;
  createLLM(llm: LLMConfig): Promise<void>;
  updateLLM(llm: LLMConfig): Promise<void>;
  deleteLLM(id: string): Promise<boolean>;

  listSchedules(enabled?: boolean): Promise<Schedule[]>;
  getSchedule(id: string): Promise<Schedule | null>;
  createSchedule(schedule: Schedule): Promise<void>;
  updateSchedule(schedule: Schedule): Promise<void>;
  deleteSchedule(id: string): Promise<boolean>;

  createResponse(response: Response): Promise<void>;
  getResponse(id: string): Promise<Response | null>;
  /** Newest first. */
  listResponses(filter?: ResponseFilter): Promise<Response[]>;
  countResponses(filter?: ResponseFilter): Promise<number>;
  deleteAllResponses(): Promise<number>;
}

export function inWindow(createdAt: string, window?: TimeWindow): boolean {
  if (!window) return true;
  const t = Date.parse(createdAt);
  if (window.start && t < window.start.getTime()) return false;
  if (window.end && t > window.end.getTime()) return false;
  return true;
}

export function matchesResponseFilter(response: Response, filter: ResponseFilter): boolean {
  if (filter.promptId !== undefined && response.promptId !== filter.promptId) return false;
  if (filter.llmId !== undefined && response.llmId !== filter.llmId) return false;
  if (filter.scheduleId !== undefined && response.scheduleId !== filter.scheduleId) return false;
  if (
    filter.keyword !== undefined &&
    !response.responseText.toLowerCase().includes(filter.keyword.toLowerCase())
  ) {
    return false;
  }
  return inWindow(response.createdAt, filter.window);
}

/** Filter, order newest first (id breaks ties), then apply the limit. */
export function applyResponseFilter(responses: Response[], filter: ResponseFilter = {}): Response[] {
  const matched = responses
    .filter((r) => matchesResponseFilter(r, filter))
    .sort((a, b) => {
      const byTime = Date.parse(b.createdAt) - Date.parse(a.createdAt);
      return byTime !== 0 ? byTime : a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
  return filter.limit !== undefined && filter.limit > 0 ? matched.slice(0, filter.limit) : matched;
}

export function byEnabled<T extends { enabled: boolean }>(items: T[], enabled?: boolean): T[] {
  return enabled === undefined ? items : items.filter((i) => i.enabled === enabled);
}
