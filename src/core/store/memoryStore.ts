import { NotFoundError, StorageError } from "../errors.js";
import type { LLMConfig, Prompt, Response, Schedule } from "../schemas/index.js";
import {
  applyResponseFilter,
  byEnabled,
  type ResponseFilter,
  type Store,
} from "./store.js";

/**
 * Collection of records keyed by id. Values are cloned in and out so
 * callers never share references with the store.
 */
class Collection<T extends { id: string }> {
  private readonly items = new Map<string, T>();

  constructor(private readonly label: string) {}

  all(): T[] {
    return Array.from(this.items.values(), (v) => structuredClone(v));
  }

  get(id: string): T | null {
    const item = this.items.get(id);
    return item ? structuredClone(item) : null;
  }

  create(item: T): void {
    if (this.items.has(item.id)) {
      throw new StorageError(`${this.label} ${item.id} already exists`);
    }
    this.items.set(item.id, structuredClone(item));
  }

  update(item: T): void {
    if (!this.items.has(item.id)) {
      throw new NotFoundError(`${this.label} ${item.id} not found`);
    }
    this.items.set(item.id, structuredClone(item));
  }

  delete(id: string): boolean {
    return this.items.delete(id);
  }

  clear(): number {
    const n = this.items.size;
    this.items.clear();
    return n;
  }
}

/** Process-local Store for tests and throwaway runs. */
export class InMemoryStore implements Store {
  private readonly prompts = new Collection<Prompt>("Prompt");
  private readonly llms = new Collection<LLMConfig>("LLM");
  private readonly schedules = new Collection<Schedule>("Schedule");
  private readonly responses = new Collection<Response>("Response");

  async listPrompts(enabled?: boolean): Promise<Prompt[]> {
    return byEnabled(this.prompts.all(), enabled);
  }
  async getPrompt(id: string): Promise<Prompt | null> {
    return this.prompts.get(id);
  }
  async createPrompt(prompt: Prompt): Promise<void> {
    this.prompts.create(prompt);
  }
  async updatePrompt(prompt: Prompt): Promise<void> {
    this.prompts.update(prompt);
  }
  async deletePrompt(id: string): Promise<boolean> {
    return this.prompts.delete(id);
  }

  async listLLMs(enabled?: boolean): Promise<LLMConfig[]> {
    return byEnabled(this.llms.all(), enabled);
  }
  async getLLM(id: string): Promise<LLMConfig | null> {
    return this.llms.get(id);
  }
  async createLLM(llm: LLMConfig): Promise<void> {
    this.llms.create(llm);
  }
  async updateLLM(llm: LLMConfig): Promise<void> {
    this.llms.update(llm);
  }
  async deleteLLM(id: string): Promise<boolean> {
    return this.llms.delete(id);
  }

  async listSchedules(enabled?: boolean): Promise<Schedule[]> {
    return byEnabled(this.schedules.all(), enabled);
  }
  async getSchedule(id: string): Promise<Schedule | null> {
    return this.schedules.get(id);
  }
  async createSchedule(schedule: Schedule): Promise<void> {
    this.schedules.create(schedule);
  }
  async updateSchedule(schedule: Schedule): Promise<void> {
    this.schedules.update(schedule);
  }
  async deleteSchedule(id: string): Promise<boolean> {
    return this.schedules.delete(id);
  }

  async createResponse(response: Response): Promise<void> {
    this.responses.create(response);
  }
  async getResponse(id: string): Promise<Response | null> {
    return this.responses.get(id);
  }
  async listResponses(filter?: ResponseFilter): Promise<Response[]> {
    return applyResponseFilter(this.responses.all(), filter);
  }
  async countResponses(filter?: ResponseFilter): Promise<number> {
    return applyResponseFilter(this.responses.all(), { ...filter, limit: undefined }).length;
  }
  async deleteAllResponses(): Promise<number> {
    return this.responses.clear();
  }
}
