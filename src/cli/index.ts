#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/index.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import { parseArgs, parseTemperature, type ParsedArgs } from "./args.js";
import { createMonitor, type GeoMonitor } from "../core/pipeline/monitor.js";
import type { ExecutionResult } from "../core/schemas/index.js";

const USAGE = `Usage: geo-monitor <command>

Commands:
  run [--new] [--temperature <0..1|random>]   Run enabled prompts with enabled LLMs
  prompt add <template> [--tag <tag>]...       Register a prompt
  llm add <name> <provider> <model> [--base-url <url>] [--api-key <key>]
  llm models <id>                              Models offered by an LLM's endpoint
  schedule add <name> <cron> --prompt <id>... --llm <id>... [--temperature <0..1|random>]
  schedule list                                List schedules
  schedule show <id>                           A schedule with its next runs
  schedule run <id>                            Execute a schedule now
  scheduler                                    Run the cron loop until interrupted
  stats top [limit]                            Most mentioned keywords
  stats keyword <word>                         Mentions of one keyword
  stats overview                               Entity and response counts
  stats prompt <id> | stats llm <id>           Responses per prompt or LLM
  stats provider <name>                        Tokens and latency for a provider
  stats prompts [keyword] | stats llms [keyword]
                                               Prompts or LLMs ranked by mentions
  search <text> [--case-sensitive]             Find text in responses
  responses show <id>                          Print one stored response
  responses clear                              Delete every stored response
  exclusions reload                            Reload the exclusion word list`;

function printResult(result: ExecutionResult): void {
  console.log("\n── Execution ──────────────────────────────────────");
  console.log(`  Run ID:     ${result.runId}`);
  console.log(`  Schedule:   ${result.scheduleName}`);
  console.log(`  Total:      ${result.totalExecutions}`);
  console.log(`  Succeeded:  ${result.successfulExecutions}`);
  console.log(`  Failed:     ${result.failedExecutions}`);
  console.log(`  Skipped:    ${result.skippedExecutions}`);
  console.log(`  Duration:   ${result.durationMs}ms`);
  for (const e of result.errors) {
    console.log(`  ✗ ${e.promptId} × ${e.llmId}: ${e.error}`);
  }
}

async function runCommand(monitor: GeoMonitor, args: ParsedArgs): Promise<void> {
  const [command, sub, ...rest] = args.positional;
  const flag = (name: string) => args.flags.get(name)?.at(-1);
  const flagList = (name: string) => args.flags.get(name) ?? [];

  switch (command) {
    case "run": {
      const result = await monitor.runEnabled({
        newOnly: flag("new") === "true",
        temperature: parseTemperature(flag("temperature")),
      });
      printResult(result);
      return;
    }

    case "prompt": {
      if (sub !== "add" || rest.length === 0) break;
      const prompt = await monitor.catalog.createPrompt({ template: rest.join(" "), tags: flagList("tag") });
      console.log(`✅ Prompt created: ${prompt.id}`);
      return;
    }

    case "llm": {
      const [name, provider, model] = rest;
      if (sub === "models" && name) {
        for (const m of await monitor.listModels(name)) {
          console.log(`  ${m.id}${m.description ? `  ${m.description}` : ""}`);
        }
        return;
      }
      if (sub !== "add" || !name || !provider || !model) break;
      const llm = await monitor.catalog.createLLM({
        name,
        provider,
        model,
        baseUrl: flag("base-url"),
        apiKey: flag("api-key"),
      });
      console.log(`✅ LLM created: ${llm.id}`);
      return;
    }

    case "schedule": {
      if (sub === "list") {
        for (const s of await monitor.schedules.listSchedules()) {
          const state = s.enabled ? `next ${s.nextRun ?? "-"}` : "disabled";
          console.log(`  ${s.id}  ${s.name}  "${s.cronExpr}"  ${state}`);
        }
        return;
      }
      if (sub === "add") {
        const [name, cronExpr] = rest;
        if (!name || !cronExpr) break;
        const schedule = await monitor.schedules.createSchedule({
          name,
          cronExpr,
          promptIds: flagList("prompt"),
          llmIds: flagList("llm"),
          temperature: parseTemperature(flag("temperature")),
        });
        console.log(`✅ Schedule created: ${schedule.id} (next run ${schedule.nextRun ?? "-"})`);
        return;
      }
      const [id] = rest;
      if (sub === "show" && id) {
        console.log(JSON.stringify(await monitor.scheduleDetail(id), null, 2));
        return;
      }
      if (sub !== "run" || !id) break;
      printResult(await monitor.executeNow(id));
      return;
    }

    case "scheduler": {
      monitor.start();
      console.log("⏱  Scheduler running. Press Ctrl+C to stop.");
      await new Promise<void>((resolve) => {
        process.once("SIGINT", resolve);
        process.once("SIGTERM", resolve);
      });
      await monitor.stop();
      return;
    }

    case "stats": {
      const [arg] = rest;
      if (sub === "top") {
        const limit = arg === undefined ? undefined : Number.parseInt(arg, 10);
        if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
          throw new ConfigurationError(`Invalid limit "${arg}"`);
        }
        const keywords = await monitor.stats.topKeywords(limit);
        keywords.forEach((k, i) => console.log(`  ${String(i + 1).padStart(3)}. ${k.keyword}  ${k.count}`));
        return;
      }
      if (sub === "keyword" && arg) {
        console.log(JSON.stringify(await monitor.stats.keywordDetail(arg), null, 2));
        return;
      }
      if (sub === "overview") {
        console.log(JSON.stringify(await monitor.stats.overview(), null, 2));
        return;
      }
      if (sub === "prompt" && arg) {
        console.log(JSON.stringify(await monitor.stats.promptStats(arg), null, 2));
        return;
      }
      if (sub === "llm" && arg) {
        console.log(JSON.stringify(await monitor.stats.llmStats(arg), null, 2));
        return;
      }
      if (sub === "provider" && arg) {
        console.log(JSON.stringify(await monitor.stats.providerStats(arg), null, 2));
        return;
      }
      if (sub === "prompts" || sub === "llms") {
        const ranks =
          sub === "prompts"
            ? await monitor.stats.topPromptsByMentions(arg)
            : await monitor.stats.topLLMsByMentions(arg);
        ranks.forEach((r, i) => console.log(`  ${String(i + 1).padStart(3)}. ${r.name}  ${r.mentions}`));
        return;
      }
      break;
    }

    case "search": {
      const query = [sub, ...rest].join(" ").trim();
      const matches = await monitor.stats.searchResponses(query, { caseSensitive: flag("case-sensitive") === "true" });
      for (const m of matches) {
        console.log(`\n🔎 ${m.llmName} (${m.llmProvider}) · ${m.createdAt}`);
        console.log(`  …${m.context.replace(/\s+/g, " ")}…`);
      }
      console.log(`\n${matches.length} match(es)`);
      return;
    }

    case "responses": {
      const [id] = rest;
      if (sub === "show" && id) {
        console.log(JSON.stringify(await monitor.getResponse(id), null, 2));
        return;
      }
      if (sub === "clear") {
        console.log(`✅ Deleted ${await monitor.clearResponses()} responses`);
        return;
      }
      break;
    }

    case "exclusions": {
      if (sub !== "reload") break;
      const count = await monitor.reloadExclusionWords();
      console.log(`✅ Loaded ${count} exclusion words from ${monitor.exclusions.path}`);
      return;
    }
  }

  console.error(USAGE);
  process.exitCode = 1;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.positional.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  const monitor = await createMonitor(loadConfig());
  try {
    await runCommand(monitor, args);
  } catch (error) {
    console.error(`\n❌ ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`\n❌ ${errorMessage(error)}`);
  process.exit(1);
});
