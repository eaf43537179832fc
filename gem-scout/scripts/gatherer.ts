import { identityKey, type RepoCache } from "./cache";
import { InvalidInputError, UpstreamUnavailableError, errorMessage } from "./errors";
import type { RepoSearchService } from "./github";
import { isProcessed } from "./ledger";
import type { ScoutLogger } from "./logger";
import { buildQueries } from "./queries";
import type { GatherReport, GatheredCandidate, ProcessedLedger, RepositoryRecord } from "./types";

export interface CandidateGathererOptions {
  search: RepoSearchService;
  cache: RepoCache;
  maxCandidates: number;
  perPage: number;
  maxPagesPerTopic: number;
  longTail: { enabled: boolean; maxStars: number };
  licenses: string[];
  ledger?: ProcessedLedger;
  logger?: ScoutLogger;
  signal?: AbortSignal;
  now?: () => number;
}

function emptyReport(): GatherReport {
  return {
    queries: [],
    pages_fetched: 0,
    items_seen: 0,
    duplicates: 0,
    malformed: 0,
    skipped_license: 0,
    skipped_processed: 0,
    cache_hits: 0,
    stale_marked: 0,
    failed_topics: [],
    failed_pages: [],
  };
}

/**
 * Turns topics into a single pass over search results. Identities are deduplicated
 * across all topics and pages (first occurrence wins); fresh probed cache entries are
 * reused and everything else is flagged for probing.
 */
export class CandidateGatherer {
  private readonly stats = emptyReport();
  private started = false;

  constructor(private readonly options: CandidateGathererOptions) {}

  report(): GatherReport {
    return {
      ...this.stats,
      queries: [...this.stats.queries],
      failed_topics: [...this.stats.failed_topics],
      failed_pages: [...this.stats.failed_pages],
    };
  }

  async *gather(topics: string[], sinceDays: number): AsyncGenerator<GatheredCandidate, void, undefined> {
    if (this.started) {
      throw new Error("CandidateGatherer.gather can only be consumed once");
    }
    this.started = true;

    const { search, cache, logger, signal } = this.options;
    const licenses = new Set(this.options.licenses.map((license) => license.toUpperCase()));
    const queries = buildQueries(topics, {
      sinceDays,
      longTail: this.options.longTail,
      requireLicense: licenses.size > 0,
      now: this.options.now?.(),
    });
    if (queries.length === 0) {
      throw new InvalidInputError("At least one non-empty topic is required");
    }

    const seen = new Set<string>();
    let emitted = 0;
    let attempted = 0;

    for (const { topic, query } of queries) {
      if (emitted >= this.options.maxCandidates) break;
      attempted += 1;
      this.stats.queries.push(query);
      logger?.log({ node: "gathering", level: "info", event: "GATHER_QUERY", data: { topic, query } });

      for (let page = 1; page <= this.options.maxPagesPerTopic; page += 1) {
        if (emitted >= this.options.maxCandidates) break;
        signal?.throwIfAborted();

        let items: RepositoryRecord[];
        let totalCount: number;
        try {
          const result = await search.searchRepositories(query, page, this.options.perPage, signal);
          items = result.items;
          totalCount = result.total_count;
          this.stats.malformed += result.malformed;
        } catch (error) {
          if (signal?.aborted) throw error;
          if (page === 1) {
            this.stats.failed_topics.push({ topic, error: errorMessage(error) });
            logger?.log({ node: "gathering", level: "warn", event: "GATHER_TOPIC_FAILED", data: { topic, error: errorMessage(error) } });
            break;
          }
          this.stats.failed_pages.push({ topic, page, error: errorMessage(error) });
          logger?.log({ node: "gathering", level: "warn", event: "GATHER_PAGE_FAILED", data: { topic, page, error: errorMessage(error) } });
          continue;
        }

        this.stats.pages_fetched += 1;
        this.stats.items_seen += items.length;

        for (const record of items) {
          if (emitted >= this.options.maxCandidates) break;
          const key = identityKey(record.full_name);
          if (seen.has(key)) {
            this.stats.duplicates += 1;
            continue;
          }
          seen.add(key);

          if (licenses.size > 0 && !licenses.has((record.license_spdx_id ?? "").toUpperCase())) {
            this.stats.skipped_license += 1;
            continue;
          }
          if (this.options.ledger && isProcessed(this.options.ledger, record.full_name)) {
            this.stats.skipped_processed += 1;
            continue;
          }

          const candidate = await this.resolveAgainstCache(cache, record, topic);
          emitted += 1;
          yield candidate;
        }

        if (items.length < this.options.perPage || page * this.options.perPage >= totalCount) break;
      }
    }

    if (emitted === 0 && attempted > 0 && this.stats.failed_topics.length === attempted) {
      throw new UpstreamUnavailableError("Search failed on the first page of every topic", {
        endpoint: "search_repositories",
      });
    }
  }

  private async resolveAgainstCache(cache: RepoCache, record: RepositoryRecord, topic: string): Promise<GatheredCandidate> {
    const cached = await cache.get(record.full_name);
    if (cached && cache.isFresh(cached) && cached.record.signals.probe_state !== "unprobed") {
      this.stats.cache_hits += 1;
      this.options.logger?.log({ node: "gathering", repo: record.full_name, level: "info", event: "CACHE_HIT" });
      return {
        record: {
          ...record,
          signals: cached.record.signals,
          concepts: cached.record.concepts,
          embedding: cached.record.embedding,
        },
        topic,
        source: "cache",
        needs_probe: false,
      };
    }
    if (cached && (await cache.markStale(record.full_name))) {
      this.stats.stale_marked += 1;
      this.options.logger?.log({ node: "gathering", repo: record.full_name, level: "info", event: "CACHE_STALE" });
    }
    return { record, topic, source: "network", needs_probe: true };
  }
}
