import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { ConfigurationError, GeoMonitorError } from "../core/errors.js";
import { maskApiKey } from "../core/logger.js";
import type { GeoMonitor } from "../core/pipeline/monitor.js";
import type { LLMInput, PromptInput } from "../core/catalog/catalogService.js";
import type { ScheduleInput } from "../core/scheduler/scheduleService.js";
import type { LLMConfig, ScheduleTemperature, TimeWindow } from "../core/schemas/index.js";

export interface ServerOptions {
  /** Fastify request logging (default true). */
  logger?: boolean;
}

interface WindowQuery {
  start?: string;
  end?: string;
}

const temperatureSchema = {
  anyOf: [
    { type: "number", minimum: 0, maximum: 1 },
    { type: "string", enum: ["random"] },
  ],
} as const;

const windowQuerySchema = {
  type: "object",
  properties: {
    start: { type: "string" },
    end: { type: "string" },
  },
} as const;

const rankQuerySchema = {
  type: "object",
  properties: {
    keyword: { type: "string" },
    limit: { type: "integer", minimum: 1 },
  },
} as const;

export function buildServer(monitor: GeoMonitor, options: ServerOptions = {}): FastifyInstance {
  const fastify = Fastify({ logger: options.logger ?? true });

  fastify.setErrorHandler((error: FastifyError, req, reply) => {
    const status = httpStatusFor(error);
    if (status >= 500) {
      req.log.error({ err: error }, "Request failed");
    }
    return reply.code(status).send({ error: error.message });
  });

  // ── Health check ──────────────────────────────────────────────────
  fastify.get("/health", async () => {
    return {
      status: "ok",
      scheduler: monitor.status(),
      providers: monitor.registry.list(),
      timestamp: new Date().toISOString(),
    };
  });

  // ── Prompts ───────────────────────────────────────────────────────
  fastify.get("/prompts/enabled", async () => {
    const prompts = await monitor.getEnabledPrompts();
    return { prompts, count: prompts.length };
  });

  fastify.post<{ Body: PromptInput }>("/prompts", {
    schema: {
      body: {
        type: "object",
        required: ["template"],
        properties: {
          template: { type: "string", minLength: 1 },
          tags: { type: "array", items: { type: "string" } },
          enabled: { type: "boolean" },
        },
      },
    },
    handler: async (req, reply) => {
      const prompt = await monitor.catalog.createPrompt(req.body);
      return reply.code(201).send(prompt);
    },
  });

  fastify.patch<{ Params: { id: string }; Body: { enabled: boolean } }>("/prompts/:id", {
    schema: {
      body: {
        type: "object",
        required: ["enabled"],
        properties: { enabled: { type: "boolean" } },
      },
    },
    handler: async (req) => monitor.catalog.setPromptEnabled(req.params.id, req.body.enabled),
  });

  // ── LLMs ──────────────────────────────────────────────────────────
  fastify.get("/llms/enabled", async () => {
    const llms = (await monitor.getEnabledLLMs()).map(redactLLM);
    return { llms, count: llms.length };
  });

  fastify.post<{ Body: LLMInput }>("/llms", {
    schema: {
      body: {
        type: "object",
        required: ["name", "provider", "model"],
        properties: {
          name: { type: "string", minLength: 1 },
          provider: { type: "string", minLength: 1 },
          model: { type: "string", minLength: 1 },
          apiKey: { type: "string" },
          baseUrl: { type: "string" },
          config: { type: "object", additionalProperties: { type: "string" } },
          enabled: { type: "boolean" },
        },
      },
    },
    handler: async (req, reply) => {
      const llm = await monitor.catalog.createLLM(req.body);
      return reply.code(201).send(redactLLM(llm));
    },
  });

  fastify.patch<{ Params: { id: string }; Body: { enabled: boolean } }>("/llms/:id", {
    schema: {
      body: {
        type: "object",
        required: ["enabled"],
        properties: { enabled: { type: "boolean" } },
      },
    },
    handler: async (req) => redactLLM(await monitor.catalog.setLLMEnabled(req.params.id, req.body.enabled)),
  });

  fastify.get<{ Params: { id: string } }>("/llms/:id/models", async (req) => {
    const models = await monitor.listModels(req.params.id);
    return { models, count: models.length };
  });

  // ── POST /run ─────────────────────────────────────────────────────
  fastify.post<{
    Body: { newOnly?: boolean; temperature?: ScheduleTemperature; maxRetries?: number; retryDelayMs?: number };
  }>("/run", {
    schema: {
      body: {
        type: "object",
        properties: {
          newOnly: { type: "boolean" },
          temperature: temperatureSchema,
          maxRetries: { type: "integer", minimum: 0 },
          retryDelayMs: { type: "integer", minimum: 0 },
        },
      },
    },
    handler: async (req) => monitor.runEnabled(req.body ?? {}),
  });

  // ── Schedules ─────────────────────────────────────────────────────
  fastify.get("/schedules", async () => {
    const schedules = await monitor.schedules.listSchedules();
    return { schedules, count: schedules.length };
  });

  fastify.post<{ Body: ScheduleInput }>("/schedules", async (req, reply) => {
    const schedule = await monitor.schedules.createSchedule(req.body);
    return reply.code(201).send(schedule);
  });

  fastify.get<{ Params: { id: string }; Querystring: { upcoming?: number } }>("/schedules/:id", {
    schema: {
      querystring: {
        type: "object",
        properties: { upcoming: { type: "integer", minimum: 0, maximum: 50, default: 5 } },
      },
    },
    handler: async (req) => monitor.scheduleDetail(req.params.id, req.query.upcoming),
  });

  fastify.patch<{ Params: { id: string }; Body: Partial<ScheduleInput> }>("/schedules/:id", async (req) => {
    return monitor.schedules.updateSchedule(req.params.id, req.body);
  });

  fastify.delete<{ Params: { id: string } }>("/schedules/:id", async (req, reply) => {
    const deleted = await monitor.schedules.deleteSchedule(req.params.id);
    if (!deleted) {
      return reply.code(404).send({ error: `Schedule ${req.params.id} not found` });
    }
    return reply.code(204).send();
  });

  fastify.post<{ Params: { id: string } }>("/schedules/:id/execute", async (req) => {
    return monitor.executeNow(req.params.id);
  });

  // ── Exclusions ────────────────────────────────────────────────────
  fastify.post("/exclusions/reload", async () => {
    const words = await monitor.reloadExclusionWords();
    return { words, file: monitor.exclusions.path };
  });

  // ── Stats ─────────────────────────────────────────────────────────
  fastify.get<{ Querystring: WindowQuery & { limit?: number } }>("/stats/keywords", {
    schema: {
      querystring: {
        type: "object",
        properties: {
          ...windowQuerySchema.properties,
          limit: { type: "integer", minimum: 1 },
        },
      },
    },
    handler: async (req) => {
      const keywords = await monitor.stats.topKeywords(req.query.limit, parseWindow(req.query));
      return { keywords, count: keywords.length };
    },
  });

  fastify.get<{ Params: { keyword: string }; Querystring: WindowQuery }>("/stats/keywords/:keyword", {
    schema: { querystring: windowQuerySchema },
    handler: async (req) => monitor.stats.keywordDetail(req.params.keyword, parseWindow(req.query)),
  });

  fastify.get("/stats/overview", async () => monitor.stats.overview());

  fastify.get<{ Querystring: { keyword?: string; limit?: number } }>("/stats/prompts/top", {
    schema: { querystring: rankQuerySchema },
    handler: async (req) => {
      const prompts = await monitor.stats.topPromptsByMentions(req.query.keyword, req.query.limit);
      return { prompts, count: prompts.length };
    },
  });

  fastify.get<{ Querystring: { keyword?: string; limit?: number } }>("/stats/llms/top", {
    schema: { querystring: rankQuerySchema },
    handler: async (req) => {
      const llms = await monitor.stats.topLLMsByMentions(req.query.keyword, req.query.limit);
      return { llms, count: llms.length };
    },
  });

  fastify.get<{ Params: { id: string } }>("/stats/prompts/:id", async (req) => monitor.stats.promptStats(req.params.id));

  fastify.get<{ Params: { id: string } }>("/stats/llms/:id", async (req) => monitor.stats.llmStats(req.params.id));

  fastify.get<{ Params: { provider: string } }>("/stats/providers/:provider", async (req) =>
    monitor.stats.providerStats(req.params.provider),
  );

  // ── Search ────────────────────────────────────────────────────────
  fastify.get<{ Querystring: { q: string; caseSensitive?: boolean; contextLength?: number; limit?: number } }>(
    "/search",
    {
      schema: {
        querystring: {
          type: "object",
          required: ["q"],
          properties: {
            q: { type: "string" },
            caseSensitive: { type: "boolean" },
            contextLength: { type: "integer", minimum: 0 },
            limit: { type: "integer", minimum: 1 },
          },
        },
      },
      handler: async (req) => {
        const { q, ...options } = req.query;
        const matches = await monitor.stats.searchResponses(q, options);
        return { matches, count: matches.length };
      },
    },
  );

  // ── Responses ─────────────────────────────────────────────────────
  fastify.get<{ Querystring: { promptId?: string; llmId?: string; keyword?: string; limit?: number } }>(
    "/responses",
    {
      schema: {
        querystring: {
          type: "object",
          properties: {
            promptId: { type: "string" },
            llmId: { type: "string" },
            keyword: { type: "string" },
            limit: { type: "integer", minimum: 1, default: 50 },
          },
        },
      },
      handler: async (req) => {
        const responses = await monitor.store.listResponses(req.query);
        return { responses, count: responses.length };
      },
    },
  );

  fastify.get<{ Params: { id: string } }>("/responses/:id", async (req) => monitor.getResponse(req.params.id));

  fastify.delete("/responses", async () => ({ deleted: await monitor.clearResponses() }));

  return fastify;
}

function httpStatusFor(error: FastifyError): number {
  if (error instanceof GeoMonitorError) {
    switch (error.kind) {
      case "configuration":
        return 400;
      case "not_found":
        return 404;
      case "busy":
        return 409;
      case "aborted":
        return 503;
      default:
        return 500;
    }
  }
  if (error.validation) return 400;
  return error.statusCode ?? 500;
}

function parseWindow(query: WindowQuery): TimeWindow | undefined {
  const start = parseDate(query.start, "start");
  const end = parseDate(query.end, "end");
  if (!start && !end) return undefined;
  return { start, end };
}

function parseDate(value: string | undefined, field: string): Date | undefined {
  if (value === undefined || value === "") return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid ${field} date: ${value}`);
  }
  return date;
}

function redactLLM(llm: LLMConfig): LLMConfig {
  return llm.apiKey === undefined ? llm : { ...llm, apiKey: maskApiKey(llm.apiKey) };
}
