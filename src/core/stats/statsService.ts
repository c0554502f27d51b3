import { countOccurrences, extractKeywords } from "../keywords/extractor.js";
import type { ExclusionList } from "../keywords/exclusionList.js";
import { ConfigurationError } from "../errors.js";
import type {
  KeywordCount,
  KeywordStats,
  LLMStats,
  MentionRank,
  OverviewStats,
  PromptStats,
  ProviderStats,
  Response,
  SearchMatch,
  TimeWindow,
} from "../schemas/index.js";
import type { ResponseFilter, Store } from "../store/store.js";

export const DEFAULT_TOP_KEYWORDS = 20;
export const DEFAULT_TOP_RANKS = 10;

export interface SearchOptions {
  caseSensitive?: boolean;
  /** Characters kept on each side of a match (default 100). */
  contextLength?: number;
  /** Maximum matches returned (default 50). */
  limit?: number;
}

export interface StatsAggregatorConfig {
  store: Store;
  exclusions: ExclusionList;
}

/**
 * Keyword and usage statistics derived from stored responses.
 * Failed responses (those carrying an error) never count.
 */
export class StatsAggregator {
  private readonly store: Store;
  private readonly exclusions: ExclusionList;

  constructor(config: StatsAggregatorConfig) {
    this.store = config.store;
    this.exclusions = config.exclusions;
  }

  /** Most frequent keywords, count descending, ties by keyword. */
  async topKeywords(limit: number = DEFAULT_TOP_KEYWORDS, window?: TimeWindow): Promise<KeywordCount[]> {
    if (limit <= 0) return [];
    const responses = await this.successful({ window });
    const exclusions = await this.activeExclusions();

    const totals = new Map<string, number>();
    for (const response of responses) {
      for (const [keyword, count] of extractKeywords(response.responseText, exclusions)) {
        totals.set(keyword, (totals.get(keyword) ?? 0) + count);
      }
    }

    return [...totals]
      .map(([keyword, count]) => ({ keyword, count }))
      .sort((a, b) => b.count - a.count || compareCodePoints(a.keyword, b.keyword))
      .slice(0, limit);
  }

  /** Where and how often a keyword is mentioned. */
  async keywordDetail(keyword: string, window?: TimeWindow): Promise<KeywordStats> {
    const stats: KeywordStats = {
      keyword,
      totalMentions: 0,
      uniquePrompts: 0,
      uniqueLLMs: 0,
      byPrompt: {},
      byLLM: {},
      byProvider: {},
    };
    if (keyword.trim() === "") return stats;

    const prompts = new Set<string>();
    const llms = new Set<string>();
    let firstSeen: number | undefined;
    let lastSeen: number | undefined;

    for (const response of await this.successful({ keyword, window })) {
      const mentions = countOccurrences(response.responseText, keyword);
      if (mentions === 0) continue;

      stats.totalMentions += mentions;
      increment(stats.byPrompt, response.promptId, mentions);
      increment(stats.byLLM, response.llmId, mentions);
      increment(stats.byProvider, response.llmProvider, mentions);
      prompts.add(response.promptId);
      llms.add(response.llmId);

      const at = Date.parse(response.createdAt);
      if (firstSeen === undefined || at < firstSeen) firstSeen = at;
      if (lastSeen === undefined || at > lastSeen) lastSeen = at;
    }

    stats.uniquePrompts = prompts.size;
    stats.uniqueLLMs = llms.size;
    if (firstSeen !== undefined) stats.firstSeen = new Date(firstSeen).toISOString();
    if (lastSeen !== undefined) stats.lastSeen = new Date(lastSeen).toISOString();
    return stats;
  }

  async promptStats(promptId: string): Promise<PromptStats> {
    const responses = await this.successful({ promptId });
    const llmCounts: Record<string, number> = {};
    for (const r of responses) increment(llmCounts, r.llmId, 1);
    return {
      promptId,
      totalResponses: responses.length,
      uniqueLLMs: Object.keys(llmCounts).length,
      llmCounts,
      avgTokens: averageTokens(responses),
    };
  }

  async llmStats(llmId: string): Promise<LLMStats> {
    const responses = await this.successful({ llmId });
    const promptCounts: Record<string, number> = {};
    for (const r of responses) increment(promptCounts, r.promptId, 1);
    return {
      llmId,
      totalResponses: responses.length,
      uniquePrompts: Object.keys(promptCounts).length,
      promptCounts,
      avgTokens: averageTokens(responses),
    };
  }

  async providerStats(provider: string): Promise<ProviderStats> {
    const responses = (await this.successful({})).filter((r) => r.llmProvider === provider);
    const totalTokens = responses.reduce((sum, r) => sum + r.tokensUsed, 0);
    const totalLatencyMs = responses.reduce((sum, r) => sum + r.latencyMs, 0);
    return {
      provider,
      totalResponses: responses.length,
      totalTokens,
      totalLatencyMs,
      avgTokens: responses.length === 0 ? 0 : totalTokens / responses.length,
      avgLatencyMs: responses.length === 0 ? 0 : totalLatencyMs / responses.length,
      uniquePrompts: new Set(responses.map((r) => r.promptId)).size,
      uniqueLLMs: new Set(responses.map((r) => r.llmId)).size,
    };
  }

  /**
   * Prompts ranked by mentions in their responses: occurrences of `keyword`
   * when given, otherwise every extracted keyword.
   */
  async topPromptsByMentions(keyword?: string, limit: number = DEFAULT_TOP_RANKS): Promise<MentionRank[]> {
    const totals = await this.mentionsBy((r) => r.promptId, keyword);
    const ranks: MentionRank[] = [];
    for (const [id, mentions] of totals) {
      const prompt = await this.store.getPrompt(id);
      ranks.push({ id, name: prompt?.template ?? `Unknown prompt (${id.slice(0, 8)})`, mentions });
    }
    return rank(ranks, limit);
  }

  /** LLMs ranked the same way as {@link topPromptsByMentions}. */
  async topLLMsByMentions(keyword?: string, limit: number = DEFAULT_TOP_RANKS): Promise<MentionRank[]> {
    const totals = await this.mentionsBy((r) => r.llmId, keyword);
    const ranks: MentionRank[] = [];
    for (const [id, mentions] of totals) {
      const llm = await this.store.getLLM(id);
      ranks.push({ id, name: llm ? `${llm.name} (${llm.provider})` : `Unknown LLM (${id.slice(0, 8)})`, mentions });
    }
    return rank(ranks, limit);
  }

  /** Every occurrence of `query` in successful responses, newest response first. */
  async searchResponses(query: string, options: SearchOptions = {}): Promise<SearchMatch[]> {
    if (query.trim() === "") {
      throw new ConfigurationError("search query is required");
    }
    const contextLength = options.contextLength ?? 100;
    const limit = options.limit ?? 50;
    const matches: SearchMatch[] = [];

    for (const response of await this.successful({ keyword: query })) {
      for (const index of matchIndexes(response.responseText, query, options.caseSensitive ?? false)) {
        if (matches.length >= limit) return matches;
        const start = Math.max(0, index - contextLength);
        const end = Math.min(response.responseText.length, index + query.length + contextLength);
        matches.push({
          responseId: response.id,
          promptId: response.promptId,
          promptText: response.promptText,
          llmName: response.llmName,
          llmProvider: response.llmProvider,
          temperature: response.temperature,
          context: response.responseText.slice(start, end),
          createdAt: response.createdAt,
        });
      }
    }
    return matches;
  }

  async overview(): Promise<OverviewStats> {
    const [prompts, llms, schedules, totalResponses] = await Promise.all([
      this.store.listPrompts(),
      this.store.listLLMs(),
      this.store.listSchedules(),
      this.store.countResponses(),
    ]);
    return {
      totalPrompts: prompts.length,
      enabledPrompts: prompts.filter((p) => p.enabled).length,
      totalLLMs: llms.length,
      enabledLLMs: llms.filter((l) => l.enabled).length,
      totalSchedules: schedules.length,
      enabledSchedules: schedules.filter((s) => s.enabled).length,
      totalResponses,
    };
  }

  private async mentionsBy(key: (r: Response) => string, keyword?: string): Promise<Map<string, number>> {
    const needle = keyword !== undefined && keyword.trim() !== "" ? keyword : undefined;
    const responses = await this.successful(needle === undefined ? {} : { keyword: needle });
    const exclusions = await this.activeExclusions();

    const totals = new Map<string, number>();
    for (const response of responses) {
      let mentions = 0;
      if (needle !== undefined) {
        mentions = countOccurrences(response.responseText, needle);
      } else {
        for (const count of extractKeywords(response.responseText, exclusions).values()) mentions += count;
      }
      const id = key(response);
      if (mentions > 0) totals.set(id, (totals.get(id) ?? 0) + mentions);
    }
    return totals;
  }

  /** Picks up edits to the exclusion file before reading the word set. */
  private async activeExclusions(): Promise<ReadonlySet<string>> {
    await this.exclusions.reloadIfChanged();
    return this.exclusions.snapshot();
  }

  private async successful(filter: ResponseFilter): Promise<Response[]> {
    const responses = await this.store.listResponses(filter);
    return responses.filter((r) => r.error === undefined || r.error === "");
  }
}

function increment(counts: Record<string, number>, key: string, by: number): void {
  counts[key] = (counts[key] ?? 0) + by;
}

function averageTokens(responses: Response[]): number {
  if (responses.length === 0) return 0;
  const total = responses.reduce((sum, r) => sum + r.tokensUsed, 0);
  return total / responses.length;
}

function rank(ranks: MentionRank[], limit: number): MentionRank[] {
  if (limit <= 0) return [];
  return ranks.sort((a, b) => b.mentions - a.mentions || compareCodePoints(a.id, b.id)).slice(0, limit);
}

function matchIndexes(text: string, query: string, caseSensitive: boolean): number[] {
  const haystack = caseSensitive ? text : text.toLowerCase();
  const needle = caseSensitive ? query : query.toLowerCase();
  const indexes: number[] = [];
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    indexes.push(index);
    index = haystack.indexOf(needle, index + needle.length);
  }
  return indexes;
}

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
