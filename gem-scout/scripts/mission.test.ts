import assert from "node:assert/strict";
import { readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { test } from "node:test";
import { PersistenceError } from "./errors";
import { MissionStore, assertTransition, getPhaseResult, nextPhase, recordPhase } from "./mission";
import { withTempDir } from "./testFixtures";
import type { PhaseResult } from "./types";

const probingResult: PhaseResult = {
  phase: "probing",
  completed_at: "2026-10-19T00:00:00Z",
  records: [],
  report: { probed: 0, reused: 0, unprobed: 0, partial: [] },
};

test("phases advance in order and refining is optional", () => {
  assert.equal(nextPhase(null, false), "gathering");
  assert.equal(nextPhase("gathering", false), "probing");
  assert.equal(nextPhase("probing", true), "scoring");
  assert.equal(nextPhase("scoring", false), "finalized");
  assert.equal(nextPhase("scoring", true), "refining");
  assert.equal(nextPhase("refining", true), "finalized");

  assert.doesNotThrow(() => assertTransition("scoring", "finalized"));
  assert.doesNotThrow(() => assertTransition("failed", "scoring"));
  assert.throws(() => assertTransition("gathering", "scoring"), /Illegal mission transition/);
  assert.throws(() => assertTransition("finalized", "failed"), /Illegal mission transition/);
});

test("each persist appends a snapshot and loadLatest returns the newest", async () => {
  await withTempDir(async (dir) => {
    const store = new MissionStore(dir);
    let mission = await store.persist(store.create("goal", ["rag"], "m-1"));
    mission = await store.persist({ ...mission, status: "probing", cursor: "gathering" });
    mission = await store.persist(recordPhase({ ...mission }, probingResult, false));

    assert.deepEqual((await readdir(path.join(dir, "m-1"))).sort(), ["0001_gathering.json", "0002_probing.json", "0003_scoring.json"]);
    const latest = await store.loadLatest("m-1");
    assert.equal(latest?.seq, 3);
    assert.equal(latest?.cursor, "probing");
    assert.equal(latest?.status, "scoring");
    assert.deepEqual(latest && getPhaseResult(latest, "probing"), probingResult);
    assert.equal(latest && getPhaseResult(latest, "scoring"), undefined);
    assert.deepEqual(await store.listMissions(), ["m-1"]);
  });
});

test("latest resolves to the newest mission id", async () => {
  await withTempDir(async (dir) => {
    const store = new MissionStore(dir);
    assert.equal(await store.resolveMissionId("latest"), undefined);
    await store.persist(store.create("goal", ["rag"], "20261018T000000Z-aaaaaaaa"));
    await store.persist(store.create("goal", ["rag"], "20261019T000000Z-bbbbbbbb"));
    assert.equal(await store.resolveMissionId("latest"), "20261019T000000Z-bbbbbbbb");
    assert.equal(await store.resolveMissionId("m-explicit"), "m-explicit");
    assert.equal(await store.resolveMissionId(undefined), undefined);
  });
});

test("an unknown mission loads as undefined", async () => {
  await withTempDir(async (dir) => {
    assert.equal(await new MissionStore(dir).loadLatest("missing"), undefined);
  });
});

test("an unwritable store fails with PersistenceError", async () => {
  await withTempDir(async (dir) => {
    const blocker = path.join(dir, "not-a-dir");
    await writeFile(blocker, "x");
    const store = new MissionStore(blocker);
    await assert.rejects(
      () => store.persist(store.create("goal", ["rag"], "m-2")),
      (error: unknown) => error instanceof PersistenceError,
    );
  });
});

test("a malformed snapshot is a persistence error", async () => {
  await withTempDir(async (dir) => {
    const store = new MissionStore(dir);
    await store.persist(store.create("goal", ["rag"], "m-3"));
    await writeFile(path.join(dir, "m-3", "0002_probing.json"), JSON.stringify({ mission_id: "m-3" }));
    await assert.rejects(() => store.loadLatest("m-3"), (error: unknown) => error instanceof PersistenceError);
  });
});
