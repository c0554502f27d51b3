import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { z } from "zod";
import { createLogger } from "../logger.js";
import { NotFoundError, StorageError, errorMessage } from "../errors.js";
import {
  LLMConfigSchema,
  PromptSchema,
  ResponseSchema,
  ScheduleSchema,
  type LLMConfig,
  type Prompt,
  type Response,
  type Schedule,
} from "../schemas/index.js";
import { applyResponseFilter, byEnabled, type ResponseFilter, type Store } from "./store.js";

const logger = createLogger("file-store");

type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * File-based store.
 * Keeps one JSON file per record under <baseDir>/<collection>/<id>.json,
 * with the id percent-encoded.
 * Records are validated against their schema when read back.
 */
export class FileStore implements Store {
  private readonly promptsDir: string;
  private readonly llmsDir: string;
  private readonly schedulesDir: string;
  private readonly responsesDir: string;

  constructor(baseDir: string) {
    this.promptsDir = path.join(baseDir, "prompts");
    this.llmsDir = path.join(baseDir, "llms");
    this.schedulesDir = path.join(baseDir, "schedules");
    this.responsesDir = path.join(baseDir, "responses");
  }

  /** Ensure all collection directories exist. */
  async initialize(): Promise<void> {
    await fs.mkdir(this.promptsDir, { recursive: true });
    await fs.mkdir(this.llmsDir, { recursive: true });
    await fs.mkdir(this.schedulesDir, { recursive: true });
    await fs.mkdir(this.responsesDir, { recursive: true });
  }

  // ── Prompts ───────────────────────────────────────────────────────

  async listPrompts(enabled?: boolean): Promise<Prompt[]> {
    return byEnabled(await this.readJsonDir(this.promptsDir, PromptSchema), enabled);
  }
  async getPrompt(id: string): Promise<Prompt | null> {
    return this.readRecord(this.promptsDir, id, PromptSchema);
  }
  async createPrompt(prompt: Prompt): Promise<void> {
    await this.writeRecord(this.promptsDir, prompt, "create");
  }
  async updatePrompt(prompt: Prompt): Promise<void> {
    await this.writeRecord(this.promptsDir, prompt, "update");
  }
  async deletePrompt(id: string): Promise<boolean> {
    return this.removeRecord(this.promptsDir, id);
  }

  // ── LLM configurations ────────────────────────────────────────────

  async listLLMs(enabled?: boolean): Promise<LLMConfig[]> {
    return byEnabled(await this.readJsonDir(this.llmsDir, LLMConfigSchema), enabled);
  }
  async getLLM(id: string): Promise<LLMConfig | null> {
    return this.readRecord(this.llmsDir, id, LLMConfigSchema);
  }
  async createLLM(llm: LLMConfig): Promise<void> {
    await this.writeRecord(this.llmsDir, llm, "create");
  }
  async updateLLM(llm: LLMConfig): Promise<void> {
    await this.writeRecord(this.llmsDir, llm, "update");
  }
  async deleteLLM(id: string): Promise<boolean> {
    return this.removeRecord(this.llmsDir, id);
  }

  // ── Schedules ─────────────────────────────────────────────────────

  async listSchedules(enabled?: boolean): Promise<Schedule[]> {
    return byEnabled(await this.readJsonDir(this.schedulesDir, ScheduleSchema), enabled);
  }
  async getSchedule(id: string): Promise<Schedule | null> {
    return this.readRecord(this.schedulesDir, id, ScheduleSchema);
  }
  async createSchedule(schedule: Schedule): Promise<void> {
    await this.writeRecord(this.schedulesDir, schedule, "create");
  }
  async updateSchedule(schedule: Schedule): Promise<void> {
    await this.writeRecord(this.schedulesDir, schedule, "update");
  }
  async deleteSchedule(id: string): Promise<boolean> {
    return this.removeRecord(this.schedulesDir, id);
  }

  // ── Responses ─────────────────────────────────────────────────────

  async createResponse(response: Response): Promise<void> {
    await this.writeRecord(this.responsesDir, response, "create");
  }
  async getResponse(id: string): Promise<Response | null> {
    return this.readRecord(this.responsesDir, id, ResponseSchema);
  }
  async listResponses(filter?: ResponseFilter): Promise<Response[]> {
    return applyResponseFilter(await this.readJsonDir(this.responsesDir, ResponseSchema), filter);
  }
  async countResponses(filter?: ResponseFilter): Promise<number> {
    const all = await this.readJsonDir(this.responsesDir, ResponseSchema);
    return applyResponseFilter(all, { ...filter, limit: undefined }).length;
  }
  async deleteAllResponses(): Promise<number> {
    const files = await this.listFiles(this.responsesDir, ".json");
    await Promise.all(files.map((f) => fs.rm(f, { force: true })));
    return files.length;
  }

  // ── Helpers ───────────────────────────────────────────────────────

  private fileFor(dir: string, id: string): string {
    return path.join(dir, `${fileNameFor(id)}.json`);
  }

  private async writeRecord<T extends { id: string }>(
    dir: string,
    record: T,
    mode: "create" | "update",
  ): Promise<void> {
    const filepath = this.fileFor(dir, record.id);
    const exists = await fileExists(filepath);
    if (mode === "create" && exists) {
      throw new StorageError(`Record ${record.id} already exists in ${path.basename(dir)}`);
    }
    if (mode === "update" && !exists) {
      throw new NotFoundError(`Record ${record.id} not found in ${path.basename(dir)}`);
    }
    try {
      await fs.writeFile(filepath, JSON.stringify(record, null, 2), "utf-8");
    } catch (error) {
      throw new StorageError(`Failed to write ${filepath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async readRecord<T>(dir: string, id: string, schema: RecordSchema<T>): Promise<T | null> {
    const filepath = this.fileFor(dir, id);
    let data: string;
    try {
      data = await fs.readFile(filepath, "utf-8");
    } catch (error) {
      if (isMissing(error)) return null;
      throw new StorageError(`Failed to read ${filepath}: ${errorMessage(error)}`, { cause: error });
    }
    return this.parse(filepath, data, schema);
  }

  private async removeRecord(dir: string, id: string): Promise<boolean> {
    const filepath = this.fileFor(dir, id);
    if (!(await fileExists(filepath))) return false;
    await fs.unlink(filepath);
    return true;
  }

  private parse<T>(filepath: string, data: string, schema: RecordSchema<T>): T {
    try {
      return schema.parse(JSON.parse(data));
    } catch (error) {
      throw new StorageError(`Corrupt record ${filepath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async listFiles(dir: string, ext: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(ext))
        .map((e) => path.join(dir, e.name));
    } catch (error) {
      if (isMissing(error)) return [];
      throw new StorageError(`Failed to list ${dir}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async readJsonDir<T>(dir: string, schema: RecordSchema<T>): Promise<T[]> {
    const files = await this.listFiles(dir, ".json");
    const results: T[] = [];
    for (const file of files) {
      let data: string;
      try {
        data = await fs.readFile(file, "utf-8");
      } catch (error) {
        // Deleted between the listing and the read.
        if (isMissing(error)) continue;
        throw new StorageError(`Failed to read ${file}: ${errorMessage(error)}`, { cause: error });
      }
      try {
        results.push(this.parse(file, data, schema));
      } catch (error) {
        logger.warn({ file, error: errorMessage(error) }, "Skipping unreadable record");
      }
    }
    return results;
  }
}

async function fileExists(filepath: string): Promise<boolean> {
  try {
    await fs.access(filepath);
    return true;
  } catch {
    return false;
  }
}

function isMissing(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** Reversible: distinct ids never share a file, and no id leaves its directory. */
function fileNameFor(id: string): string {
  return encodeURIComponent(id).replace(/\./g, "%2E").replace(/\*/g, "%2A");
}
