import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { RepoCache } from "./cache";
import type { RepositoryRecord } from "./types";

function record(fullName: string, overrides: Partial<RepositoryRecord> = {}): RepositoryRecord {
  const [owner, name] = fullName.split("/");
  return {
    full_name: fullName,
    owner,
    name,
    html_url: `https://github.com/${fullName}`,
    description: "embedded vector index",
    language: "Rust",
    license_spdx_id: "MIT",
    topics: ["vector-database"],
    stargazers_count: 12,
    forks_count: 1,
    fork: false,
    archived: false,
    owner_type: "User",
    pushed_at: "2026-10-01T00:00:00Z",
    created_at: "2026-06-01T00:00:00Z",
    signals: {
      probe_state: "complete",
      has_ci: true,
      has_tests: false,
      has_manifest: true,
      latest_release_at: null,
      readme_excerpt: "# demo",
      owner_followers: 4,
      missing: [],
    },
    concepts: ["vector-database"],
    fetched_at: "2026-10-01T00:00:00Z",
    ...overrides,
  };
}

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "gem-scout-cache-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("an entry is fresh until the staleness threshold and then stale", async () => {
  await withTempDir(async (dir) => {
    let now = Date.parse("2026-10-10T00:00:00Z");
    const events: string[] = [];
    const cache = new RepoCache({
      rootDir: dir,
      stalenessMs: 60_000,
      now: () => now,
      onCacheEvent: (event) => events.push(event),
    });

    await cache.upsert("acme/vec", () => record("acme/vec"));
    now += 59_999;
    const hit = await cache.getFresh("ACME/vec");
    assert.deepEqual(hit?.record.signals, record("acme/vec").signals);

    now += 1;
    assert.equal(await cache.getFresh("acme/vec"), undefined);
    assert.equal(await cache.getFresh("acme/other"), undefined);
    assert.deepEqual(events, ["CACHE_HIT", "CACHE_STALE", "CACHE_MISS"]);
  });
});

test("markStale keeps the entry readable but not reusable", async () => {
  await withTempDir(async (dir) => {
    const cache = new RepoCache({ rootDir: dir, stalenessMs: 3_600_000 });
    await cache.upsert("acme/vec", () => record("acme/vec"));

    assert.equal(await cache.markStale("acme/vec"), true);
    assert.equal(await cache.markStale("acme/vec"), false);
    const entry = await cache.get("acme/vec");
    assert.equal(entry?.stale, true);
    assert.equal(await cache.getFresh("acme/vec"), undefined);

    const refreshed = await cache.upsert("acme/vec", (previous) => previous?.record ?? record("acme/vec"));
    assert.equal(refreshed.stale, false);
  });
});

test("concurrent upserts of one identity see each other's writes", async () => {
  await withTempDir(async (dir) => {
    const cache = new RepoCache({ rootDir: dir, stalenessMs: 3_600_000 });
    await Promise.all(
      Array.from({ length: 8 }, () =>
        cache.upsert("acme/vec", (previous) =>
          record("acme/vec", { stargazers_count: (previous?.record.stargazers_count ?? 0) + 1 }),
        ),
      ),
    );
    const entry = await cache.get("acme/vec");
    assert.equal(entry?.record.stargazers_count, 8);
  });
});

test("upsert refuses a record for another identity", async () => {
  await withTempDir(async (dir) => {
    const cache = new RepoCache({ rootDir: dir, stalenessMs: 1_000 });
    await assert.rejects(() => cache.upsert("acme/vec", () => record("acme/other")), /returned record acme\/other/);
  });
});

test("corrupt documents read as misses and are left out of stats", async () => {
  await withTempDir(async (dir) => {
    const now = Date.parse("2026-10-10T00:00:00Z");
    const events: string[] = [];
    const cache = new RepoCache({
      rootDir: dir,
      stalenessMs: 60_000,
      now: () => now,
      onCacheEvent: (event) => events.push(event),
    });
    await writeFile(path.join(dir, "acme__broken.json"), JSON.stringify({ record: { full_name: "acme/broken" } }));
    await writeFile(path.join(dir, "acme__torn.json"), '{"record": {"full_name": "acme/to');
    await cache.upsert("acme/vec", () => record("acme/vec"));
    await cache.upsert("acme/raw", () =>
      record("acme/raw", { signals: { ...record("acme/raw").signals, probe_state: "unprobed" } }),
    );
    await cache.markStale("acme/raw");

    assert.equal(await cache.get("acme/broken"), undefined);
    assert.equal(await cache.get("acme/torn"), undefined);
    assert.deepEqual(events, ["CACHE_CORRUPT", "CACHE_CORRUPT"]);
    assert.deepEqual(await cache.stats(), { entries: 2, fresh: 1, stale: 1, probed: 1 });
    assert.deepEqual(events, ["CACHE_CORRUPT", "CACHE_CORRUPT", "CACHE_CORRUPT", "CACHE_CORRUPT"]);
  });
});

test("list on a missing directory is empty", async () => {
  const cache = new RepoCache({ rootDir: path.join(os.tmpdir(), "gem-scout-missing-dir-for-list"), stalenessMs: 1 });
  assert.deepEqual(await cache.list(), []);
});
