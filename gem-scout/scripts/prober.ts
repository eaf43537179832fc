import type { RepoCache } from "./cache";
import { mapLimit } from "./concurrency";
import { extractConcepts, mergeConcepts } from "./concepts";
import { errorMessage } from "./errors";
import type { RepoProbeService } from "./github";
import type { ScoutLogger } from "./logger";
import type { GatheredCandidate, ProbeReport, ProbeSignalName, ProbeSignals, RepositoryRecord } from "./types";

const MANIFEST_FILES = new Set([
  "package.json",
  "cargo.toml",
  "pyproject.toml",
  "setup.py",
  "go.mod",
  "pom.xml",
  "build.gradle",
  "build.gradle.kts",
  "gemfile",
  "composer.json",
  "mix.exs",
  "package.swift",
  "cmakelists.txt",
  "deno.json",
]);

const TEST_DIRS = new Set(["test", "tests", "__tests__", "spec", "specs"]);

export interface DeepProberOptions {
  probe: RepoProbeService;
  cache: RepoCache;
  concurrency: number;
  readmeMaxChars: number;
  authorSignal: boolean;
  logger?: ScoutLogger;
  signal?: AbortSignal;
  now?: () => number;
}

export interface ProbeOutcome {
  records: RepositoryRecord[];
  report: ProbeReport;
}

function settledValue<T>(result: PromiseSettledResult<T>, name: ProbeSignalName, missing: ProbeSignalName[]): T | undefined {
  if (result.status === "fulfilled") return result.value;
  missing.push(name);
  return undefined;
}

/**
 * Fetches secondary signals for the first `limit` candidates that need them. One
 * candidate's failures never fail the batch: whatever arrived is kept and the
 * rest is listed in `signals.missing`.
 */
export class DeepProber {
  constructor(private readonly options: DeepProberOptions) {}

  async probe(candidates: GatheredCandidate[], limit: number): Promise<ProbeOutcome> {
    const { logger, signal } = this.options;
    const bounded = Math.max(0, Math.min(limit, candidates.length));
    const report: ProbeReport = { probed: 0, reused: 0, unprobed: 0, partial: [] };

    const head = candidates.slice(0, bounded);
    const tail = candidates.slice(bounded);
    logger?.log({
      node: "probing",
      level: "info",
      event: "PROBE_START",
      data: { candidates: candidates.length, limit: bounded, concurrency: this.options.concurrency },
    });

    const probed = await mapLimit(
      head,
      this.options.concurrency,
      async (candidate) => {
        if (!candidate.needs_probe) {
          report.reused += 1;
          return candidate.record;
        }
        const record = await this.probeOne(candidate.record);
        report.probed += 1;
        if (record.signals.probe_state === "partial") {
          report.partial.push({ repo: record.full_name, missing: record.signals.missing });
        }
        return record;
      },
      signal,
    );

    for (const candidate of tail) {
      if (candidate.needs_probe) report.unprobed += 1;
      else report.reused += 1;
    }

    logger?.log({ node: "probing", level: "info", event: "PROBE_DONE", data: { ...report, partial: report.partial.length } });
    return { records: [...probed, ...tail.map((candidate) => candidate.record)], report };
  }

  private async probeOne(record: RepositoryRecord): Promise<RepositoryRecord> {
    const { probe, signal, logger } = this.options;
    const fullName = record.full_name;

    const [readme, ci, rootFiles, release, followers] = await Promise.allSettled([
      probe.fetchReadme(fullName, this.options.readmeMaxChars, signal),
      probe.hasCiConfig(fullName, signal),
      probe.listRootFiles(fullName, signal),
      probe.latestReleaseAt(fullName, signal),
      this.options.authorSignal ? probe.ownerFollowers(record.owner, signal) : Promise.resolve(null),
    ]);

    const missing: ProbeSignalName[] = [];
    const readmeText = settledValue(readme, "readme", missing) ?? null;
    const hasCi = settledValue(ci, "ci", missing) ?? false;
    const files = rootFiles.status === "fulfilled" ? rootFiles.value.map((file) => file.toLowerCase()) : undefined;
    if (!files) missing.push("manifest");
    const latestRelease = settledValue(release, "release", missing) ?? null;
    const ownerFollowers = settledValue(followers, "author", missing) ?? null;

    let hasTests = false;
    if (files?.some((file) => TEST_DIRS.has(file))) {
      hasTests = true;
    } else {
      try {
        hasTests = await probe.hasTestFiles(fullName, signal);
      } catch (error) {
        missing.push("tests");
        logger?.log({ node: "probing", repo: fullName, level: "warn", event: "PROBE_SIGNAL_FAILED", data: { signal: "tests", error: errorMessage(error) } });
      }
    }

    signal?.throwIfAborted();

    const signals: ProbeSignals = {
      probe_state: missing.length > 0 ? "partial" : "complete",
      has_ci: hasCi,
      has_tests: hasTests,
      has_manifest: files?.some((file) => MANIFEST_FILES.has(file)) ?? false,
      latest_release_at: latestRelease,
      readme_excerpt: readmeText,
      owner_followers: ownerFollowers,
      missing,
    };
    if (missing.length > 0) {
      logger?.log({ node: "probing", repo: fullName, level: "warn", event: "PROBE_PARTIAL", data: { missing } });
    }

    const enriched: RepositoryRecord = {
      ...record,
      signals,
      concepts: mergeConcepts(record.topics, extractConcepts(`${record.description ?? ""}\n${readmeText ?? ""}`)),
      fetched_at: new Date(this.options.now?.() ?? Date.now()).toISOString(),
    };

    try {
      const entry = await this.options.cache.upsert(fullName, () => enriched);
      return entry.record;
    } catch (error) {
      logger?.log({ node: "probing", repo: fullName, level: "warn", event: "CACHE_WRITE_FAILED", data: { error: errorMessage(error) } });
      return enriched;
    }
  }
}
