import assert from "node:assert/strict";
import { test } from "node:test";
import { select } from "./selector";
import { makeRecord } from "./testFixtures";
import type { ScoreWeights, ScoredCandidate } from "./types";

const noveltyOnly: ScoreWeights = { novelty: 0.9, health: 0, relevance: 0, author: 0, diversity: 0.1 };

function candidate(fullName: string, novelty: number, concepts: string[], stars = 10): ScoredCandidate {
  return {
    record: makeRecord(fullName, { concepts, stargazers_count: stars }),
    scores: { novelty, health: 0, relevance: 0.5, author: 0, diversity_penalty: 0, composite: 0 },
  };
}

test("two identical candidates for one slot: the tiebreak decides", () => {
  const picked = select(
    [candidate("acme/fewer", 0.7, ["rag", "vector"], 5), candidate("acme/more", 0.7, ["rag", "vector"], 9)],
    1,
    noveltyOnly,
  );
  assert.deepEqual(
    picked.map((entry) => entry.record.full_name),
    ["acme/more"],
  );
  assert.equal(picked[0]?.scores.diversity_penalty, 0);
});

test("a near-duplicate yields to a weaker but different candidate", () => {
  const picked = select(
    [
      candidate("acme/a", 1, ["rag", "vector"]),
      candidate("acme/b", 0.95, ["rag", "vector"]),
      candidate("acme/c", 0.85, ["wasm"]),
    ],
    3,
    noveltyOnly,
  );
  assert.deepEqual(
    picked.map((entry) => entry.record.full_name),
    ["acme/a", "acme/c", "acme/b"],
  );
  assert.equal(picked[2]?.scores.diversity_penalty, 1);
  assert.ok(Math.abs((picked[2]?.scores.composite ?? 0) - 0.755) < 1e-12);
});

test("identical input gives identical output regardless of input order", () => {
  const pool = [
    candidate("acme/d", 0.5, ["x"], 3),
    candidate("acme/b", 0.5, ["x"], 3),
    candidate("acme/c", 0.5, ["y"], 7),
    candidate("acme/a", 0.5, ["z"], 3),
  ];
  const first = select(pool, 4, noveltyOnly);
  const second = select([...pool].reverse(), 4, noveltyOnly);
  assert.equal(JSON.stringify(first), JSON.stringify(second));
  assert.deepEqual(
    first.map((entry) => entry.record.full_name),
    ["acme/c", "acme/a", "acme/b", "acme/d"],
  );
});

test("selection size bounds the output", () => {
  const pool = [candidate("acme/a", 0.4, []), candidate("acme/b", 0.3, [])];
  assert.equal(select(pool, 0, noveltyOnly).length, 0);
  assert.equal(select(pool, 5, noveltyOnly).length, 2);
});
