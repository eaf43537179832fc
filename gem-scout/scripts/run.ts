import "dotenv/config";
import path from "node:path";
import { RepoCache } from "./cache";
import { loadConfig } from "./config";
import { createOpenAICompatibleEmbedder, type Embedder } from "./embeddings";
import { errorMessage } from "./errors";
import { classifyFailure } from "./failures";
import { GitHubClient } from "./github";
import { createLogger } from "./logger";
import { MissionStore } from "./mission";
import { MissionOrchestrator } from "./orchestrator";
import { RateLimitScheduler, createQuotaBudgets } from "./planner";
import { createLlmRefiner, type Refiner } from "./refine";
import type { Mission } from "./types";

const CONFIG_PATH = process.env.SCOUT_CONFIG ?? path.join("gem-scout", "config", "scout.config.json");
const HOUR_MS = 60 * 60 * 1000;

function summarize(mission: Mission): string {
  if (mission.status === "failed") {
    return `Mission ${mission.mission_id} failed in ${mission.failure?.phase ?? "?"} (${mission.failure?.kind ?? "UNKNOWN"}): ${mission.failure?.message ?? ""}`;
  }
  const names = mission.result?.sources.map((source) => source.name) ?? [];
  return `Mission ${mission.mission_id} ${mission.status}: ${names.length} selected [${names.join(", ")}]`;
}

async function main() {
  const runtime = createLogger("runtime");
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const loaded = await loadConfig(CONFIG_PATH);
    const config = {
      ...loaded,
      paths: {
        cacheDir: path.resolve(loaded.paths.cacheDir),
        missionsDir: path.resolve(loaded.paths.missionsDir),
        ledgerPath: path.resolve(loaded.paths.ledgerPath),
      },
    };

    const scheduler = new RateLimitScheduler(createQuotaBudgets(config.quotas), {
      safetyMarginRatio: config.safetyMarginRatio,
      minIntervalMs: config.minIntervalMs,
      onWait: ({ endpointClass, waitMs, queued }) =>
        runtime.log({ node: "scheduler", level: "info", event: "QUOTA_WAIT", data: { endpointClass, waitMs, queued } }),
    });
    const github = new GitHubClient({
      scheduler,
      token: process.env.GITHUB_TOKEN ?? process.env.GITHUB_PERSONAL_ACCESS_TOKEN,
      onEvent: (event, data) =>
        runtime.log({ node: "github", repo: data.repo, level: event === "GITHUB_RETRY" ? "info" : "warn", event, data }),
    });
    const cache = new RepoCache({
      rootDir: config.paths.cacheDir,
      stalenessMs: config.cacheStalenessHours * HOUR_MS,
      onCacheEvent: (event, data) =>
        runtime.log({ node: "cache", repo: data.repo, level: event === "CACHE_CORRUPT" ? "warn" : "info", event }),
    });

    const embedder: Embedder | undefined = config.useEmbeddings ? createOpenAICompatibleEmbedder() : undefined;
    const refiner: Refiner | undefined = config.refine.enabled
      ? createLlmRefiner({
          provider: config.refine.provider,
          model: config.refine.model,
          temperature: config.refine.temperature,
          onAudit: (audit) =>
            runtime.log({ node: "refining", level: audit.error ? "warn" : "info", event: "LLM_AUDIT", data: { ...audit } }),
        })
      : undefined;

    const cacheStats = await cache.stats();
    runtime.log({ node: "cache", level: "info", event: "CACHE_STATS", data: { ...cacheStats } });

    const store = new MissionStore(config.paths.missionsDir);
    const missionId = await store.resolveMissionId(process.env.MISSION_ID);
    const orchestrator = new MissionOrchestrator({
      config,
      search: github,
      probe: github,
      cache,
      store,
      embedder,
      refiner,
    });
    const mission = await orchestrator.run({ missionId, signal: controller.signal });

    const rateLimited = runtime.getEvents().filter((event) => event.event === "GITHUB_RATE_LIMITED").length;
    console.log(
      `${summarize(mission)} (rate-limit waits: ${rateLimited}; cache at start: ${cacheStats.fresh} fresh, ${cacheStats.stale} stale)`,
    );
    if (mission.status === "failed") {
      for (const hint of mission.failure?.hints ?? []) console.error(`  hint: ${hint}`);
      process.exitCode = 1;
    }
  } catch (error) {
    const { kind, hints } = classifyFailure(error);
    console.error(`Run failed (${kind}): ${errorMessage(error)}`);
    for (const hint of hints) console.error(`  hint: ${hint}`);
    process.exitCode = 1;
  }
}

void main();
