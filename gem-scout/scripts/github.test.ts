import assert from "node:assert/strict";
import { test } from "node:test";
import { UpstreamUnavailableError } from "./errors";
import { GitHubClient, type GitHubEvent } from "./github";
import { RateLimitScheduler, createQuotaBudgets, type Clock } from "./planner";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function fakeClock(): Clock {
  let now = 0;
  return {
    now: () => now,
    sleep: async (ms) => {
      now += ms;
    },
  };
}

function createClient(clock: Clock, events: GitHubEvent[] = []): GitHubClient {
  const scheduler = new RateLimitScheduler(
    createQuotaBudgets({
      search: { capacity: 30, windowMs: 60_000 },
      "code-search": { capacity: 10, windowMs: 60_000 },
      core: { capacity: 5000, windowMs: 3_600_000 },
    }),
    { clock, skewMs: 0 },
  );
  return new GitHubClient({
    scheduler,
    token: "test-token",
    jitter: false,
    sleep: async () => {},
    onEvent: (event) => events.push(event),
  });
}

const searchItem = {
  full_name: "acme/vec",
  html_url: "https://github.com/acme/vec",
  description: "vector store",
  language: "Rust",
  license: { spdx_id: "MIT" },
  topics: ["vector-database"],
  stargazers_count: 42,
  forks_count: 3,
  fork: false,
  archived: false,
  owner: { login: "acme", type: "Organization" },
  pushed_at: "2026-10-01T00:00:00Z",
  created_at: "2026-05-01T00:00:00Z",
};

async function withFetch(stub: typeof fetch, run: () => Promise<void>): Promise<void> {
  const originalFetch = global.fetch;
  global.fetch = stub;
  try {
    await run();
  } finally {
    global.fetch = originalFetch;
  }
}

test("5xx responses are retried and malformed items are counted, not returned", async () => {
  let calls = 0;
  const events: GitHubEvent[] = [];
  await withFetch(
    async () => {
      calls += 1;
      if (calls === 1) return jsonResponse({ message: "server err" }, 500);
      return jsonResponse({ total_count: 2, items: [searchItem, { full_name: "broken" }] });
    },
    async () => {
      const page = await createClient(fakeClock(), events).searchRepositories("vector", 1, 30);
      assert.equal(calls, 2);
      assert.deepEqual(events, ["GITHUB_RETRY"]);
      assert.equal(page.malformed, 1);
      assert.equal(page.items.length, 1);
      assert.equal(page.items[0]?.owner_type, "Organization");
      assert.equal(page.items[0]?.license_spdx_id, "MIT");
      assert.equal(page.items[0]?.signals.probe_state, "unprobed");
      assert.deepEqual(page.items[0]?.concepts, ["vector-database"]);
    },
  );
});

test("a plain 403 fails once without retrying", async () => {
  let calls = 0;
  const events: GitHubEvent[] = [];
  await withFetch(
    async () => {
      calls += 1;
      return jsonResponse({ message: "forbidden" }, 403);
    },
    async () => {
      await assert.rejects(
        () => createClient(fakeClock(), events).listRootFiles("acme/vec"),
        (error: unknown) => error instanceof UpstreamUnavailableError && error.status === 403,
      );
      assert.equal(calls, 1);
      assert.deepEqual(events, ["GITHUB_RETRY_GIVEUP"]);
    },
  );
});

test("a rate-limited response waits for the reported reset instead of failing", async () => {
  const clock = fakeClock();
  const events: GitHubEvent[] = [];
  let calls = 0;
  const callTimes: number[] = [];
  await withFetch(
    async () => {
      calls += 1;
      callTimes.push(clock.now());
      if (calls === 1) {
        return jsonResponse({ message: "API rate limit exceeded" }, 403, {
          "x-ratelimit-limit": "30",
          "x-ratelimit-remaining": "0",
          "x-ratelimit-reset": "120",
        });
      }
      return jsonResponse({ followers: 250 });
    },
    async () => {
      const followers = await createClient(clock, events).ownerFollowers("acme");
      assert.equal(followers, 250);
      assert.deepEqual(callTimes, [0, 120_000]);
      assert.deepEqual(events, ["GITHUB_RATE_LIMITED"]);
    },
  );
});

test("missing resources resolve to empty values", async () => {
  await withFetch(
    async () => jsonResponse({ message: "Not Found" }, 404),
    async () => {
      const client = createClient(fakeClock());
      assert.equal(await client.fetchReadme("acme/gone", 100), null);
      assert.equal(await client.hasCiConfig("acme/gone"), false);
      assert.equal(await client.latestReleaseAt("acme/gone"), null);
    },
  );
});

test("readme text is truncated and code search checks both qualifiers", async () => {
  const queries: string[] = [];
  await withFetch(
    async (input) => {
      const url = new URL(input instanceof Request ? input.url : input);
      if (url.pathname.endsWith("/readme")) return new Response("# Title\nlong body");
      queries.push(url.searchParams.get("q") ?? "");
      return jsonResponse({ total_count: queries.length === 1 ? 0 : 3 });
    },
    async () => {
      const client = createClient(fakeClock());
      assert.equal(await client.fetchReadme("acme/vec", 7), "# Title");
      assert.equal(await client.hasTestFiles("acme/vec"), true);
      assert.deepEqual(queries, ["repo:acme/vec path:tests", "repo:acme/vec filename:test"]);
    },
  );
});
