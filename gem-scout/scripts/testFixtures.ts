import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { unprobedSignals } from "./github";
import type { RepoProbeService, RepoSearchPage, RepoSearchService } from "./github";
import type { ProbeSignals, RepositoryRecord } from "./types";

export function makeRecord(fullName: string, overrides: Partial<RepositoryRecord> = {}): RepositoryRecord {
  const [owner, name] = fullName.split("/");
  return {
    full_name: fullName,
    owner,
    name,
    html_url: `https://github.com/${fullName}`,
    description: `${name} description`,
    language: "Rust",
    license_spdx_id: "MIT",
    topics: [],
    stargazers_count: 10,
    forks_count: 0,
    fork: false,
    archived: false,
    owner_type: "User",
    pushed_at: "2026-10-01T00:00:00Z",
    created_at: "2026-06-01T00:00:00Z",
    signals: unprobedSignals(),
    concepts: [],
    fetched_at: "2026-10-01T00:00:00Z",
    ...overrides,
  };
}

export function probedSignals(overrides: Partial<ProbeSignals> = {}): ProbeSignals {
  return {
    probe_state: "complete",
    has_ci: true,
    has_tests: true,
    has_manifest: true,
    latest_release_at: "2026-09-01T00:00:00Z",
    readme_excerpt: "# readme",
    owner_followers: 10,
    missing: [],
    ...overrides,
  };
}

export async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "gem-scout-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Serves fixed pages per query; a page mapped to an Error rejects. */
export class FakeSearchService implements RepoSearchService {
  readonly calls: Array<{ query: string; page: number }> = [];

  constructor(private readonly pages: (query: string, page: number) => RepositoryRecord[] | Error) {}

  async searchRepositories(query: string, page: number, perPage: number): Promise<RepoSearchPage> {
    this.calls.push({ query, page });
    const result = this.pages(query, page);
    if (result instanceof Error) throw result;
    return { total_count: 1000, items: result.slice(0, perPage), malformed: 0 };
  }
}

export interface FakeProbeData {
  readme?: string | null;
  ci?: boolean;
  rootFiles?: string[];
  tests?: boolean;
  release?: string | null;
  followers?: number | null;
}

/** In-memory probe service; `fail` lists "<repo>:<method>" pairs that reject. */
export class FakeProbeService implements RepoProbeService {
  calls = 0;
  readmesInFlight = 0;
  peakReadmesInFlight = 0;

  constructor(
    private readonly data: Record<string, FakeProbeData> = {},
    private readonly fail: Set<string> = new Set(),
  ) {}

  private async answer<T>(repo: string, method: string, value: T): Promise<T> {
    this.calls += 1;
    const tracked = method === "readme";
    if (tracked) {
      this.readmesInFlight += 1;
      this.peakReadmesInFlight = Math.max(this.peakReadmesInFlight, this.readmesInFlight);
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
    if (tracked) this.readmesInFlight -= 1;
    if (this.fail.has(`${repo}:${method}`)) {
      throw new Error(`${method} failed for ${repo}`);
    }
    return value;
  }

  fetchReadme(fullName: string, maxChars: number): Promise<string | null> {
    const readme = this.data[fullName]?.readme ?? null;
    return this.answer(fullName, "readme", readme === null ? null : readme.slice(0, maxChars));
  }

  hasCiConfig(fullName: string): Promise<boolean> {
    return this.answer(fullName, "ci", this.data[fullName]?.ci ?? false);
  }

  listRootFiles(fullName: string): Promise<string[]> {
    return this.answer(fullName, "manifest", this.data[fullName]?.rootFiles ?? []);
  }

  hasTestFiles(fullName: string): Promise<boolean> {
    return this.answer(fullName, "tests", this.data[fullName]?.tests ?? false);
  }

  latestReleaseAt(fullName: string): Promise<string | null> {
    return this.answer(fullName, "release", this.data[fullName]?.release ?? null);
  }

  ownerFollowers(owner: string): Promise<number | null> {
    return this.answer(owner, "author", this.data[owner]?.followers ?? null);
  }
}
