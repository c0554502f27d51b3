import { createLogger } from "../core/logger.js";
import { ConfigurationError } from "../core/errors.js";
import type { LLMProvider } from "./llm-provider.js";

const logger = createLogger("provider-registry");

/**
 * ProviderRegistry – in-memory catalog of LLM providers keyed by name.
 *
 * Registration is last-write-wins: a provider registered again under the
 * same name (e.g. with freshly loaded credentials) replaces the old entry.
 * Runs only read from the registry.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, LLMProvider>();

  /**
   * Register a provider under its own name, or under an explicit one.
   */
  register(provider: LLMProvider): void;
  register(name: string, provider: LLMProvider): void;
  register(nameOrProvider: string | LLMProvider, maybeProvider?: LLMProvider): void {
    const provider = typeof nameOrProvider === "string" ? maybeProvider : nameOrProvider;
    const name = typeof nameOrProvider === "string" ? nameOrProvider : nameOrProvider.name;

    if (!provider) {
      throw new ConfigurationError(`No provider given for "${name}"`);
    }
    if (!name.trim()) {
      throw new ConfigurationError("Provider name must not be empty");
    }

    const replaced = this.providers.has(name);
    this.providers.set(name, provider);
    logger.info({ provider: name, replaced }, replaced ? "Provider replaced" : "Provider registered");
  }

  /** Returns undefined if not found. */
  get(name: string): LLMProvider | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /** Registered provider names, sorted. */
  list(): string[] {
    return Array.from(this.providers.keys()).sort();
  }

  unregister(name: string): boolean {
    const removed = this.providers.delete(name);
    if (removed) {
      logger.info({ provider: name }, "Provider unregistered");
    }
    return removed;
  }

  /** Point-in-time copy; later registrations do not show up in it. */
  snapshot(): ReadonlyMap<string, LLMProvider> {
    return new Map(this.providers);
  }

  get size(): number {
    return this.providers.size;
  }
}
