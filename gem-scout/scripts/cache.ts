import { readdir } from "node:fs/promises";
import path from "node:path";
import { isNotFound, readJsonFile, toSafeRepoFileName, writeJsonAtomic } from "./artifacts";
import { CacheEntrySchema } from "./schemas";
import type { CacheEntry, RepositoryRecord } from "./types";

export interface RepoCacheOptions {
  rootDir: string;
  stalenessMs: number;
  now?: () => number;
  onCacheEvent?: (event: "CACHE_HIT" | "CACHE_MISS" | "CACHE_STALE" | "CACHE_CORRUPT", data: { repo: string }) => void;
}

export interface RepoCacheStats {
  entries: number;
  fresh: number;
  stale: number;
  probed: number;
}

/**
 * Typed store of repository records keyed by `owner/name`, one JSON document per
 * identity. Entries are never evicted; a stale entry stays readable until the
 * next upsert for that identity replaces it.
 */
export class RepoCache {
  private readonly now: () => number;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly options: RepoCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get stalenessMs(): number {
    return this.options.stalenessMs;
  }

  async get(fullName: string): Promise<CacheEntry | undefined> {
    const key = identityKey(fullName);
    const entry = await this.readEntry(this.pathFor(key), fullName);
    if (entry && identityKey(entry.record.full_name) !== key) {
      this.options.onCacheEvent?.("CACHE_CORRUPT", { repo: fullName });
      return undefined;
    }
    return entry;
  }

  isFresh(entry: CacheEntry, now = this.now()): boolean {
    const cachedAt = Date.parse(entry.cached_at);
    if (entry.stale || Number.isNaN(cachedAt)) {
      return false;
    }
    return now - cachedAt < entry.stale_after_ms;
  }

  async getFresh(fullName: string): Promise<CacheEntry | undefined> {
    const entry = await this.get(fullName);
    if (entry && this.isFresh(entry)) {
      this.options.onCacheEvent?.("CACHE_HIT", { repo: fullName });
      return entry;
    }
    this.options.onCacheEvent?.(entry ? "CACHE_STALE" : "CACHE_MISS", { repo: fullName });
    return undefined;
  }

  /**
   * Read-modify-write for one identity. Concurrent upserts of the same identity run
   * one after another; different identities do not wait on each other.
   */
  async upsert(
    fullName: string,
    update: (previous: CacheEntry | undefined) => RepositoryRecord,
  ): Promise<CacheEntry> {
    const key = identityKey(fullName);
    return this.withLock(key, async () => {
      const previous = await this.get(fullName);
      const record = update(previous);
      if (identityKey(record.full_name) !== key) {
        throw new Error(`Cache upsert for ${fullName} returned record ${record.full_name}`);
      }
      const entry: CacheEntry = {
        record,
        cached_at: new Date(this.now()).toISOString(),
        stale_after_ms: this.options.stalenessMs,
        stale: false,
      };
      await writeJsonAtomic(this.pathFor(key), entry);
      return entry;
    });
  }

  async markStale(fullName: string): Promise<boolean> {
    const key = identityKey(fullName);
    return this.withLock(key, async () => {
      const entry = await this.get(fullName);
      if (!entry || entry.stale) {
        return false;
      }
      await writeJsonAtomic(this.pathFor(key), { ...entry, stale: true });
      return true;
    });
  }

  async list(): Promise<CacheEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.options.rootDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    const entries: CacheEntry[] = [];
    for (const file of files.filter((name) => name.endsWith(".json")).sort()) {
      const entry = await this.readEntry(path.join(this.options.rootDir, file), file);
      if (entry) entries.push(entry);
    }
    return entries;
  }

  async stats(): Promise<RepoCacheStats> {
    const entries = await this.list();
    const now = this.now();
    const fresh = entries.filter((entry) => this.isFresh(entry, now)).length;
    return {
      entries: entries.length,
      fresh,
      stale: entries.length - fresh,
      probed: entries.filter((entry) => entry.record.signals.probe_state !== "unprobed").length,
    };
  }

  /** A document that is not JSON, or not a cache entry, reads as absent. */
  private async readEntry(filePath: string, repo: string): Promise<CacheEntry | undefined> {
    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      this.options.onCacheEvent?.("CACHE_CORRUPT", { repo });
      return undefined;
    }
    if (raw === undefined) return undefined;
    const parsed = CacheEntrySchema.safeParse(raw);
    if (!parsed.success) {
      this.options.onCacheEvent?.("CACHE_CORRUPT", { repo });
      return undefined;
    }
    return parsed.data;
  }

  private pathFor(key: string): string {
    return path.join(this.options.rootDir, `${toSafeRepoFileName(key)}.json`);
  }

  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }
}

export function identityKey(fullName: string): string {
  return fullName.trim().toLowerCase();
}
