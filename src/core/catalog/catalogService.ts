import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { createLogger, maskApiKey } from "../logger.js";
import { NotFoundError, toConfigurationError } from "../errors.js";
import type { LLMConfig, Prompt } from "../schemas/index.js";
import type { Store } from "../store/store.js";

const logger = createLogger("catalog");

export const PromptInputSchema = z.object({
  template: z.string().trim().min(1, "prompt template is required"),
  tags: z.array(z.string().min(1)).default([]),
  enabled: z.boolean().default(true),
});
export type PromptInput = z.input<typeof PromptInputSchema>;

export const LLMInputSchema = z.object({
  name: z.string().trim().min(1, "LLM name is required"),
  provider: z.string().trim().min(1, "provider is required"),
  model: z.string().trim().min(1, "model is required"),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  config: z.record(z.string()).default({}),
  enabled: z.boolean().default(true),
});
export type LLMInput = z.input<typeof LLMInputSchema>;

/** Registration of prompts and LLM configurations. */
export class CatalogService {
  constructor(
    private readonly store: Store,
    private readonly now: () => Date = () => new Date(),
    /** Called after an LLM configuration is created or toggled. */
    private readonly onLLMChanged: (llm: LLMConfig) => void = () => {},
  ) {}

  async createPrompt(input: PromptInput): Promise<Prompt> {
    const parsed = PromptInputSchema.safeParse(input);
    if (!parsed.success) {
      throw toConfigurationError(parsed.error, "Invalid prompt");
    }
    const timestamp = this.now().toISOString();
    const prompt: Prompt = { id: uuidv4(), ...parsed.data, createdAt: timestamp, updatedAt: timestamp };
    await this.store.createPrompt(prompt);
    logger.info({ promptId: prompt.id }, "Prompt created");
    return prompt;
  }

  async setPromptEnabled(id: string, enabled: boolean): Promise<Prompt> {
    const prompt = await this.store.getPrompt(id);
    if (!prompt) {
      throw new NotFoundError(`Prompt ${id} not found`);
    }
    const updated = { ...prompt, enabled, updatedAt: this.now().toISOString() };
    await this.store.updatePrompt(updated);
    return updated;
  }

  async createLLM(input: LLMInput): Promise<LLMConfig> {
    const parsed = LLMInputSchema.safeParse(input);
    if (!parsed.success) {
      throw toConfigurationError(parsed.error, "Invalid LLM configuration");
    }
    const timestamp = this.now().toISOString();
    const llm: LLMConfig = { id: uuidv4(), ...parsed.data, createdAt: timestamp, updatedAt: timestamp };
    await this.store.createLLM(llm);
    logger.info(
      { llmId: llm.id, provider: llm.provider, model: llm.model, apiKey: maskApiKey(llm.apiKey) },
      "LLM created",
    );
    this.onLLMChanged(llm);
    return llm;
  }

  async setLLMEnabled(id: string, enabled: boolean): Promise<LLMConfig> {
    const llm = await this.store.getLLM(id);
    if (!llm) {
      throw new NotFoundError(`LLM ${id} not found`);
    }
    const updated = { ...llm, enabled, updatedAt: this.now().toISOString() };
    await this.store.updateLLM(updated);
    this.onLLMChanged(updated);
    return updated;
  }
}
