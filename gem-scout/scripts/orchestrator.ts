import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { RepoCache } from "./cache";
import { withTimeout } from "./concurrency";
import type { Embedder } from "./embeddings";
import { CancelledError, InvalidInputError, TimeoutError, errorMessage } from "./errors";
import { classifyFailure } from "./failures";
import { CandidateGatherer } from "./gatherer";
import type { RepoProbeService, RepoSearchService } from "./github";
import { loadLedger, markProcessed, purgeOlderThan, saveLedger } from "./ledger";
import { createLogger, type ScoutLogger } from "./logger";
import { MissionStore, assertTransition, getPhaseResult, nextPhase, recordPhase } from "./mission";
import { DeepProber } from "./prober";
import type { Refiner } from "./refine";
import { scoreAll, validateWeights } from "./scorer";
import { select } from "./selector";
import type {
  GatheredCandidate,
  Mission,
  MissionPhase,
  MissionResult,
  PhaseResult,
  RepositoryRecord,
  ScoutConfig,
} from "./types";

export interface MissionDependencies {
  config: ScoutConfig;
  search: RepoSearchService;
  probe: RepoProbeService;
  cache: RepoCache;
  store: MissionStore;
  embedder?: Embedder;
  refiner?: Refiner;
  now?: () => number;
}

export interface RunOptions {
  missionId?: string;
  signal?: AbortSignal;
}

type RunnablePhase = Exclude<MissionPhase, "finalized">;

const README_SNIPPET_CHARS = 400;

const MissionStateAnnotation = Annotation.Root({
  mission: Annotation<Mission>(),
});

type MissionState = typeof MissionStateAnnotation.State;

function route(state: MissionState): RunnablePhase | "finalize" | typeof END {
  const { mission } = state;
  if (mission.status === "failed") return END;
  if (mission.status === "finalized") return mission.result ? END : "finalize";
  return mission.status;
}

function embeddingText(record: RepositoryRecord, maxChars: number): string {
  return `${record.description ?? ""}\n${record.signals.readme_excerpt ?? ""}`.slice(0, maxChars);
}

function completedCount(mission: Mission): number {
  const probing = getPhaseResult(mission, "probing");
  if (probing) return probing.records.length;
  return getPhaseResult(mission, "gathering")?.candidates.length ?? 0;
}

/**
 * Drives one mission through gathering, probing, scoring and the optional refining
 * phase. Every phase result is persisted before the next phase starts, so a later
 * run with the same mission id picks up after the last completed phase.
 */
export class MissionOrchestrator {
  private readonly now: () => number;
  private readonly refineEnabled: boolean;

  constructor(private readonly deps: MissionDependencies) {
    this.now = deps.now ?? Date.now;
    this.refineEnabled = deps.refiner !== undefined;
  }

  async run(options: RunOptions = {}): Promise<Mission> {
    const { config, store } = this.deps;
    validateWeights(config.weights);
    if (config.topics.every((topic) => topic.trim() === "")) {
      throw new InvalidInputError("At least one non-empty topic is required");
    }

    const stored = options.missionId ? await store.loadLatest(options.missionId) : undefined;
    if (stored?.status === "finalized" && stored.result) {
      return stored;
    }
    let mission = stored ?? store.create(config.goal, config.topics, options.missionId);
    const logger = createLogger(mission.mission_id, mission.events);

    if (!stored) {
      logger.log({ node: "mission", level: "info", event: "MISSION_START", data: { mission_id: mission.mission_id, topics: config.topics } });
    } else {
      const resumeAt = nextPhase(mission.cursor, this.refineEnabled);
      if (mission.status === "failed") {
        assertTransition("failed", resumeAt);
      }
      mission = { ...mission, status: resumeAt, failure: null };
      logger.log({
        node: "mission",
        level: "info",
        event: "MISSION_RESUME",
        data: { mission_id: mission.mission_id, cursor: mission.cursor, resume_at: resumeAt },
      });
    }
    mission = await this.persist(mission, logger);

    const graph = this.buildGraph(logger, options.signal);
    const finalState = await graph.invoke({ mission });
    return finalState.mission;
  }

  private buildGraph(logger: ScoutLogger, signal: AbortSignal | undefined) {
    const phaseNode = (phase: RunnablePhase) => async (state: MissionState): Promise<MissionState> => ({
      mission: await this.runPhase(state.mission, phase, logger, signal),
    });

    return new StateGraph(MissionStateAnnotation)
      .addNode("gathering", phaseNode("gathering"))
      .addNode("probing", phaseNode("probing"))
      .addNode("scoring", phaseNode("scoring"))
      .addNode("refining", phaseNode("refining"))
      .addNode("finalize", async (state: MissionState): Promise<MissionState> => ({
        mission: await this.finalize(state.mission, logger),
      }))
      .addConditionalEdges(START, route)
      .addConditionalEdges("gathering", route)
      .addConditionalEdges("probing", route)
      .addConditionalEdges("scoring", route)
      .addConditionalEdges("refining", route)
      .addEdge("finalize", END)
      .compile();
  }

  private async runPhase(
    mission: Mission,
    phase: RunnablePhase,
    logger: ScoutLogger,
    signal: AbortSignal | undefined,
  ): Promise<Mission> {
    const budgetMs = this.deps.config.phaseTimeoutsMs[phase];
    const startedAt = this.now();
    logger.log({ node: phase, level: "info", event: "PHASE_START", data: { budget_ms: budgetMs } });
    try {
      if (signal?.aborted) {
        throw new CancelledError(phase);
      }
      const result = await withTimeout(
        budgetMs,
        (phaseSignal) => this.execute(mission, phase, logger, phaseSignal),
        () => new TimeoutError(phase, budgetMs),
        signal,
      );
      logger.log({ node: phase, level: "info", event: "PHASE_DONE", data: { duration_ms: this.now() - startedAt } });
      return await this.persist(recordPhase(mission, result, this.refineEnabled), logger);
    } catch (error) {
      if (phase === "refining" && error instanceof TimeoutError) {
        logger.log({ node: phase, level: "warn", event: "REFINE_FAILED", data: { error: error.message } });
        const skipped: PhaseResult = {
          phase: "refining",
          completed_at: new Date(this.now()).toISOString(),
          refinement: null,
          error: error.message,
        };
        return this.persist(recordPhase(mission, skipped, this.refineEnabled), logger);
      }
      const cause = signal?.aborted && !(error instanceof TimeoutError) ? new CancelledError(phase) : error;
      return this.fail(mission, phase, cause, logger);
    }
  }

  private execute(mission: Mission, phase: RunnablePhase, logger: ScoutLogger, signal: AbortSignal): Promise<PhaseResult> {
    switch (phase) {
      case "gathering":
        return this.gather(mission, logger, signal);
      case "probing":
        return this.probe(mission, logger, signal);
      case "scoring":
        return this.score(mission, logger, signal);
      case "refining":
        return this.refine(mission, logger, signal);
    }
  }

  private async gather(mission: Mission, logger: ScoutLogger, signal: AbortSignal): Promise<PhaseResult> {
    const { config } = this.deps;
    const ledger = config.excludeProcessed ? await loadLedger(config.paths.ledgerPath) : undefined;
    const gatherer = new CandidateGatherer({
      search: this.deps.search,
      cache: this.deps.cache,
      maxCandidates: config.maxCandidates,
      perPage: config.perPage,
      maxPagesPerTopic: config.maxPagesPerTopic,
      longTail: config.longTail,
      licenses: config.licenses,
      ledger,
      logger,
      signal,
      now: this.now,
    });
    const candidates: GatheredCandidate[] = [];
    for await (const candidate of gatherer.gather(mission.topics, config.sinceDays)) {
      candidates.push(candidate);
    }
    const report = gatherer.report();
    logger.log({
      node: "gathering",
      level: "info",
      event: "GATHER_DONE",
      data: { candidates: candidates.length, duplicates: report.duplicates, cache_hits: report.cache_hits },
    });
    return { phase: "gathering", completed_at: new Date(this.now()).toISOString(), candidates, report };
  }

  private async probe(mission: Mission, logger: ScoutLogger, signal: AbortSignal): Promise<PhaseResult> {
    const { config } = this.deps;
    const candidates = getPhaseResult(mission, "gathering")?.candidates ?? [];
    const prober = new DeepProber({
      probe: this.deps.probe,
      cache: this.deps.cache,
      concurrency: config.probeConcurrency,
      readmeMaxChars: config.readmeMaxChars,
      authorSignal: config.authorSignal,
      logger,
      signal,
      now: this.now,
    });
    const { records, report } = await prober.probe(candidates, config.probeLimit);
    return { phase: "probing", completed_at: new Date(this.now()).toISOString(), records, report };
  }

  private async score(mission: Mission, logger: ScoutLogger, signal: AbortSignal): Promise<PhaseResult> {
    const { config } = this.deps;
    const records = getPhaseResult(mission, "probing")?.records ?? [];
    const now = this.now();
    const scoringOptions = { now, requireCi: config.requireCi, requireTests: config.requireTests };

    const { pool, goalEmbedding } = await this.attachEmbeddings(mission, records, logger, signal);
    const scored = scoreAll(pool, goalEmbedding, config.weights, scoringOptions).filter(
      (candidate) => candidate.scores.health >= config.minHealth,
    );
    const selection = select(scored, config.selectionSize, config.weights).map((candidate) => ({
      ...candidate,
      record: { ...candidate.record, embedding: null },
    }));
    logger.log({
      node: "scoring",
      level: "info",
      event: "SELECTION_DONE",
      data: { pool: scored.length, selected: selection.map((candidate) => candidate.record.full_name) },
    });
    return {
      phase: "scoring",
      completed_at: new Date(now).toISOString(),
      selection,
      pool_size: scored.length,
      embeddings_used: goalEmbedding !== null,
    };
  }

  private async attachEmbeddings(
    mission: Mission,
    records: RepositoryRecord[],
    logger: ScoutLogger,
    signal: AbortSignal,
  ): Promise<{ pool: RepositoryRecord[]; goalEmbedding: number[] | null }> {
    const { config, embedder } = this.deps;
    if (!config.useEmbeddings || !embedder || records.length === 0) {
      return { pool: records, goalEmbedding: null };
    }
    const goalText = mission.goal || mission.topics.join(", ");
    try {
      const vectors = await embedder.embed(
        [goalText, ...records.map((record) => embeddingText(record, config.readmeMaxChars))],
        signal,
      );
      const [goalEmbedding, ...recordEmbeddings] = vectors;
      if (!goalEmbedding || recordEmbeddings.length !== records.length) {
        throw new Error(`Expected ${records.length + 1} embeddings, got ${vectors.length}`);
      }
      return {
        pool: records.map((record, index) => ({ ...record, embedding: recordEmbeddings[index] })),
        goalEmbedding,
      };
    } catch (error) {
      signal.throwIfAborted();
      logger.log({ node: "scoring", level: "warn", event: "EMBEDDINGS_UNAVAILABLE", data: { error: errorMessage(error) } });
      return { pool: records, goalEmbedding: null };
    }
  }

  private async refine(mission: Mission, logger: ScoutLogger, signal: AbortSignal): Promise<PhaseResult> {
    const selection = getPhaseResult(mission, "scoring")?.selection ?? [];
    const completedAt = () => new Date(this.now()).toISOString();
    if (!this.deps.refiner) {
      return { phase: "refining", completed_at: completedAt(), refinement: null };
    }
    try {
      const refinement = await this.deps.refiner.refine(mission.goal, selection, signal);
      logger.log({ node: "refining", level: "info", event: "REFINE_DONE", data: { project: refinement.project.name } });
      return { phase: "refining", completed_at: completedAt(), refinement };
    } catch (error) {
      signal.throwIfAborted();
      logger.log({ node: "refining", level: "warn", event: "REFINE_FAILED", data: { error: errorMessage(error) } });
      return { phase: "refining", completed_at: completedAt(), refinement: null, error: errorMessage(error) };
    }
  }

  private async finalize(mission: Mission, logger: ScoutLogger): Promise<Mission> {
    const result = this.buildResult(mission);
    const { ledgerPath } = this.deps.config.paths;
    const retentionDays = this.deps.config.ledgerRetentionDays;
    try {
      const ledger = await loadLedger(ledgerPath);
      if (retentionDays !== undefined) {
        const purged = purgeOlderThan(ledger, retentionDays, this.now());
        if (purged > 0) {
          logger.log({ node: "finalize", level: "info", event: "LEDGER_PURGED", data: { purged, retention_days: retentionDays } });
        }
      }
      markProcessed(
        ledger,
        result.sources.map((source) => source.name),
        mission.mission_id,
      );
      await saveLedger(ledgerPath, ledger);
    } catch (error) {
      logger.log({ node: "finalize", level: "warn", event: "LEDGER_WRITE_FAILED", data: { error: errorMessage(error) } });
    }
    logger.log({
      node: "finalize",
      level: "info",
      event: "MISSION_FINALIZED",
      data: { selected: result.sources.length, refined: result.refinement !== null },
    });
    return this.persist({ ...mission, result }, logger);
  }

  private buildResult(mission: Mission): MissionResult {
    const { config } = this.deps;
    const gathering = getPhaseResult(mission, "gathering");
    const probing = getPhaseResult(mission, "probing");
    const selection = getPhaseResult(mission, "scoring")?.selection ?? [];
    return {
      goal: mission.goal,
      sources: selection.map(({ record, scores }) => ({
        name: record.full_name,
        url: record.html_url,
        description: record.description,
        language: record.language,
        license: record.license_spdx_id,
        stars: record.stargazers_count,
        concepts: record.concepts,
        readme_snippet: record.signals.readme_excerpt?.slice(0, README_SNIPPET_CHARS) ?? null,
        scores,
      })),
      refinement: getPhaseResult(mission, "refining")?.refinement ?? null,
      metrics: {
        topics: mission.topics,
        since_days: config.sinceDays,
        long_tail: config.longTail.enabled,
        candidates: gathering?.candidates.length ?? 0,
        probed: probing?.report.probed ?? 0,
        selected: selection.length,
        weights: config.weights,
      },
    };
  }

  private async fail(mission: Mission, phase: RunnablePhase, error: unknown, logger: ScoutLogger): Promise<Mission> {
    const { kind, message, hints } = classifyFailure(error);
    assertTransition(mission.status, "failed");
    logger.log({ node: phase, level: "error", event: "PHASE_FAILED", data: { kind, message } });
    return this.persist(
      {
        ...mission,
        status: "failed",
        failure: {
          phase,
          kind,
          message,
          hints,
          completed_count: completedCount(mission),
          failed_at: new Date(this.now()).toISOString(),
        },
      },
      logger,
    );
  }

  private persist(mission: Mission, logger: ScoutLogger): Promise<Mission> {
    return this.deps.store.persist({ ...mission, events: logger.getEvents() });
  }
}
