import assert from "node:assert/strict";
import { readdir, rm } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { RepoCache } from "./cache";
import { parseConfig } from "./config";
import type { Embedder } from "./embeddings";
import { ConfigurationError } from "./errors";
import type { RepoSearchPage, RepoSearchService } from "./github";
import { isProcessed, loadLedger, saveLedger } from "./ledger";
import { MissionStore, getPhaseResult } from "./mission";
import { MissionOrchestrator, type MissionDependencies } from "./orchestrator";
import type { Refiner } from "./refine";
import { FakeProbeService, FakeSearchService, makeRecord, withTempDir } from "./testFixtures";
import type { Mission, RefinementPayload, ScoutConfig } from "./types";

const now = Date.parse("2026-10-19T00:00:00Z");

const candidates = [
  makeRecord("acme/popular-mid", {
    stargazers_count: 6000,
    created_at: "2026-10-18T00:00:00Z",
    pushed_at: "2026-10-18T00:00:00Z",
  }),
  makeRecord("acme/quiet-healthy", {
    stargazers_count: 1,
    created_at: "2016-10-19T00:00:00Z",
    pushed_at: "2026-10-18T00:00:00Z",
  }),
  makeRecord("acme/twin-mid", {
    stargazers_count: 5000,
    created_at: "2026-10-18T00:00:00Z",
    pushed_at: "2026-10-18T00:00:00Z",
  }),
];

function searchService(): FakeSearchService {
  return new FakeSearchService((_query, page) => (page === 1 ? candidates : []));
}

function probeService(): FakeProbeService {
  return new FakeProbeService({
    "acme/popular-mid": { ci: true },
    "acme/twin-mid": { ci: true },
    "acme/quiet-healthy": { ci: true, tests: true, rootFiles: ["Cargo.toml"], release: "2026-10-01T00:00:00Z" },
  });
}

function testConfig(dir: string, overrides: Record<string, unknown> = {}): ScoutConfig {
  return parseConfig({
    goal: "streaming vector search",
    topics: ["vector-database"],
    selectionSize: 3,
    paths: {
      cacheDir: path.join(dir, "cache"),
      missionsDir: path.join(dir, "missions"),
      ledgerPath: path.join(dir, "processed.json"),
    },
    ...overrides,
  });
}

function orchestrator(dir: string, overrides: Partial<MissionDependencies> = {}): MissionOrchestrator {
  const config = overrides.config ?? testConfig(dir);
  return new MissionOrchestrator({
    config,
    search: searchService(),
    probe: probeService(),
    cache: new RepoCache({ rootDir: config.paths.cacheDir, stalenessMs: 3_600_000, now: () => now }),
    store: new MissionStore(config.paths.missionsDir),
    now: () => now,
    ...overrides,
  });
}

function sourceNames(mission: Mission): string[] {
  return mission.result?.sources.map((source) => source.name) ?? [];
}

test("without embeddings candidates rank by health and novelty, ties by stars", async () => {
  await withTempDir(async (dir) => {
    const config = testConfig(dir);
    const mission = await orchestrator(dir, { config }).run({ missionId: "m-a" });

    assert.equal(mission.status, "finalized");
    assert.deepEqual(sourceNames(mission), ["acme/popular-mid", "acme/twin-mid", "acme/quiet-healthy"]);
    const [first, second, third] = mission.result?.sources ?? [];
    assert.equal(first?.scores.relevance, 0.5);
    assert.equal(first?.scores.composite, second?.scores.composite);
    assert.equal(third?.scores.health, 1);
    assert.equal(first?.scores.health, 0.25);
    assert.equal(mission.result?.metrics.candidates, 3);
    assert.equal(mission.result?.metrics.probed, 3);
    assert.equal(mission.result?.refinement, null);

    assert.deepEqual((await readdir(path.join(config.paths.missionsDir, "m-a"))).sort(), [
      "0001_gathering.json",
      "0002_probing.json",
      "0003_scoring.json",
      "0004_finalized.json",
      "0005_finalized.json",
    ]);
    const ledger = await loadLedger(config.paths.ledgerPath);
    assert.equal(isProcessed(ledger, "ACME/twin-mid"), true);
    assert.equal(Object.keys(ledger.repos).length, 3);
  });
});

test("ledger entries past the retention window are purged at finalize", async () => {
  await withTempDir(async (dir) => {
    const config = testConfig(dir, { ledgerRetentionDays: 30 });
    await saveLedger(config.paths.ledgerPath, {
      version: 1,
      updated_at: "2026-01-01T00:00:00Z",
      repos: {
        "old/repo": { processed_at: "2026-01-01T00:00:00Z", mission_id: "m0" },
        "recent/repo": { processed_at: "2026-10-01T00:00:00Z", mission_id: "m1" },
      },
    });
    const mission = await orchestrator(dir, { config }).run({ missionId: "m-p" });

    const ledger = await loadLedger(config.paths.ledgerPath);
    assert.equal(isProcessed(ledger, "old/repo"), false);
    assert.equal(isProcessed(ledger, "recent/repo"), true);
    assert.equal(Object.keys(ledger.repos).length, 4);
    const purged = mission.events.find((event) => event.event === "LEDGER_PURGED");
    assert.deepEqual(purged?.data, { purged: 1, retention_days: 30 });
  });
});

test("a mission interrupted after probing resumes at scoring without network calls", async () => {
  await withTempDir(async (dir) => {
    const config = testConfig(dir);
    const first = await orchestrator(dir, { config }).run({ missionId: "m-r" });
    const missionDir = path.join(config.paths.missionsDir, "m-r");
    await rm(path.join(missionDir, "0004_finalized.json"));
    await rm(path.join(missionDir, "0005_finalized.json"));

    const search = searchService();
    const probe = probeService();
    const resumed = await orchestrator(dir, { config, search, probe }).run({ missionId: "m-r" });

    assert.equal(search.calls.length, 0);
    assert.equal(probe.calls, 0);
    assert.equal(resumed.status, "finalized");
    assert.deepEqual(sourceNames(resumed), sourceNames(first));
    assert.equal(resumed.events.filter((event) => event.event === "MISSION_RESUME").length, 1);
  });
});

test("a finalized mission is returned as stored", async () => {
  await withTempDir(async (dir) => {
    const config = testConfig(dir);
    const first = await orchestrator(dir, { config }).run({ missionId: "m-f" });
    const search = searchService();
    const again = await orchestrator(dir, { config, search }).run({ missionId: "m-f" });
    assert.equal(again.seq, first.seq);
    assert.equal(search.calls.length, 0);
  });
});

class AbortAfterGathering extends MissionStore {
  constructor(
    rootDir: string,
    private readonly controller: AbortController,
  ) {
    super(rootDir);
  }

  override async persist(mission: Mission): Promise<Mission> {
    const stored = await super.persist(mission);
    if (stored.cursor === "gathering") this.controller.abort();
    return stored;
  }
}

test("cancellation between phases fails the mission and a later run resumes it", async () => {
  await withTempDir(async (dir) => {
    const config = testConfig(dir);
    const controller = new AbortController();
    const probe = probeService();
    const cancelled = await orchestrator(dir, {
      config,
      probe,
      store: new AbortAfterGathering(config.paths.missionsDir, controller),
    }).run({ missionId: "m-c", signal: controller.signal });

    assert.equal(cancelled.status, "failed");
    assert.equal(cancelled.cursor, "gathering");
    assert.equal(cancelled.failure?.kind, "CANCELLED");
    assert.equal(cancelled.failure?.phase, "probing");
    assert.equal(cancelled.failure?.completed_count, 3);
    assert.equal(probe.calls, 0);

    const search = searchService();
    const resumed = await orchestrator(dir, { config, search }).run({ missionId: "m-c" });
    assert.equal(search.calls.length, 0);
    assert.equal(resumed.status, "finalized");
    assert.equal(resumed.failure, null);
    assert.equal(resumed.result?.sources.length, 3);
  });
});

const payload: RefinementPayload = {
  project: { name: "Vecstream", tagline: "Streaming vectors", vision: "Index while ingesting" },
  concepts: [{ problem: "Full reindexing", solution: "Incremental segments", why_it_works: ["small deltas"] }],
};

test("a refiner adds its payload to the result", async () => {
  await withTempDir(async (dir) => {
    const seen: string[][] = [];
    const refiner: Refiner = {
      async refine(_goal, selection) {
        seen.push(selection.map((candidate) => candidate.record.full_name));
        return payload;
      },
    };
    const mission = await orchestrator(dir, { refiner }).run({ missionId: "m-ok" });
    assert.equal(mission.status, "finalized");
    assert.deepEqual(mission.result?.refinement, payload);
    assert.deepEqual(seen, [["acme/popular-mid", "acme/twin-mid", "acme/quiet-healthy"]]);
  });
});

test("a failing refiner leaves the mission finalized without a payload", async () => {
  await withTempDir(async (dir) => {
    const refiner: Refiner = {
      async refine() {
        throw new Error("llm down");
      },
    };
    const mission = await orchestrator(dir, { refiner }).run({ missionId: "m-llm" });
    assert.equal(mission.status, "finalized");
    assert.equal(mission.result?.refinement, null);
    assert.equal(mission.result?.sources.length, 3);
    assert.equal(getPhaseResult(mission, "refining")?.error, "llm down");
    assert.equal(mission.events.some((event) => event.event === "REFINE_FAILED"), true);
  });
});

test("a refiner over its budget does not fail the mission", async () => {
  await withTempDir(async (dir) => {
    const refiner: Refiner = {
      refine: (_goal, _selection, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
        }),
    };
    const config = testConfig(dir, {
      phaseTimeoutsMs: { gathering: 5_000, probing: 5_000, scoring: 5_000, refining: 20 },
    });
    const mission = await orchestrator(dir, { config, refiner }).run({ missionId: "m-slow" });
    assert.equal(mission.status, "finalized");
    assert.equal(mission.result?.refinement, null);
    assert.equal(getPhaseResult(mission, "refining")?.error, "Phase refining exceeded its 20ms budget");
  });
});

test("an embedding failure falls back to neutral relevance", async () => {
  await withTempDir(async (dir) => {
    const embedder: Embedder = {
      async embed() {
        throw new Error("embeddings offline");
      },
    };
    const config = testConfig(dir, { useEmbeddings: true });
    const mission = await orchestrator(dir, { config, embedder }).run({ missionId: "m-emb" });
    assert.equal(mission.status, "finalized");
    assert.equal(getPhaseResult(mission, "scoring")?.embeddings_used, false);
    assert.deepEqual(
      mission.result?.sources.map((source) => source.scores.relevance),
      [0.5, 0.5, 0.5],
    );
    assert.equal(mission.events.some((event) => event.event === "EMBEDDINGS_UNAVAILABLE"), true);
  });
});

test("invalid weights fail before any network call or snapshot", async () => {
  await withTempDir(async (dir) => {
    const base = testConfig(dir);
    const config: ScoutConfig = {
      ...base,
      weights: { novelty: 0.5, health: 0.3, relevance: 0.2, author: 0.05, diversity: 0.1 },
    };
    const search = searchService();
    const store = new MissionStore(config.paths.missionsDir);
    await assert.rejects(() => orchestrator(dir, { config, search, store }).run(), ConfigurationError);
    assert.equal(search.calls.length, 0);
    assert.deepEqual(await store.listMissions(), []);
  });
});

class HangingSearch implements RepoSearchService {
  calls = 0;

  searchRepositories(_query: string, _page: number, _perPage: number, signal?: AbortSignal): Promise<RepoSearchPage> {
    this.calls += 1;
    return new Promise((_resolve, reject) => {
      signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
  }
}

test("a phase over its budget fails the mission with a timeout", async () => {
  await withTempDir(async (dir) => {
    const config = testConfig(dir, {
      phaseTimeoutsMs: { gathering: 20, probing: 1_000, scoring: 1_000, refining: 1_000 },
    });
    const search = new HangingSearch();
    const mission = await orchestrator(dir, { config, search }).run({ missionId: "m-t" });

    assert.equal(search.calls, 1);
    assert.equal(mission.status, "failed");
    assert.equal(mission.cursor, null);
    assert.equal(mission.failure?.kind, "TIMEOUT");
    assert.equal(mission.failure?.phase, "gathering");
    assert.equal(mission.failure?.completed_count, 0);
    assert.deepEqual((await readdir(path.join(config.paths.missionsDir, "m-t"))).sort(), [
      "0001_gathering.json",
      "0002_failed.json",
    ]);
  });
});
