import * as fs from "node:fs/promises";
import { createLogger } from "../logger.js";
import { StorageError, errorMessage } from "../errors.js";
import { extractKeywords } from "./extractor.js";

const logger = createLogger("exclusion-list");

interface Snapshot {
  readonly words: ReadonlySet<string>;
  /** mtime of the file the words came from, 0 when it did not exist. */
  readonly mtimeMs: number;
}

const EMPTY: Snapshot = { words: new Set<string>(), mtimeMs: 0 };

/** Parse a word list: one word per line, `#` comments and blanks ignored. */
export function parseExclusionWords(content: string): Set<string> {
  const words = new Set<string>();
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) continue;
    words.add(line.toLowerCase());
  }
  return words;
}

/**
 * Hot-reloadable set of words suppressed from keyword extraction.
 *
 * Each load builds a fresh immutable snapshot and publishes it with one
 * reference assignment; readers holding an older snapshot keep a complete
 * list.
 */
export class ExclusionList {
  private current: Snapshot = EMPTY;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /** The active word set. */
  snapshot(): ReadonlySet<string> {
    return this.current.words;
  }

  /** Active words, sorted. */
  words(): string[] {
    return [...this.current.words].sort();
  }

  /**
   * Read the file and swap in the new set. A missing file yields an empty
   * list; any other read failure leaves the active set untouched.
   */
  async reload(): Promise<number> {
    this.current = await this.load();
    logger.info({ file: this.filePath, words: this.current.words.size }, "Exclusion words loaded");
    return this.current.words.size;
  }

  /** Reload only when the file changed since the last load. */
  async reloadIfChanged(): Promise<boolean> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.filePath)).mtimeMs;
    } catch {
      return false;
    }
    if (mtimeMs <= this.current.mtimeMs) return false;
    await this.reload();
    return true;
  }

  /** Extract keywords against the snapshot active at call time. */
  extract(text: string): Map<string, number> {
    return extractKeywords(text, this.current.words);
  }

  private async load(): Promise<Snapshot> {
    let content: string;
    let mtimeMs: number;
    try {
      const stat = await fs.stat(this.filePath);
      mtimeMs = stat.mtimeMs;
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        logger.warn({ file: this.filePath }, "Exclusion file not found, using an empty list");
        return EMPTY;
      }
      throw new StorageError(
        `Failed to read exclusion file ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    return { words: parseExclusionWords(content), mtimeMs };
  }
}
