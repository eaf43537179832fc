import { cosineSimilarity } from "./embeddings";
import { ConfigurationError } from "./errors";
import type { RepositoryRecord, ScoreSet, ScoreWeights, ScoredCandidate } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;
const UNKNOWN_AGE_DAYS = 3650;
const WEIGHT_TOLERANCE = 1e-9;
const FORK_PENALTY = 0.2;
const HEALTH_INDICATOR = 0.25;
const RECENT_RELEASE_DAYS = 365;

export interface ScoringOptions {
  now: number;
  requireCi: boolean;
  requireTests: boolean;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function daysSince(iso: string | null, now: number): number {
  const parsed = iso === null ? Number.NaN : Date.parse(iso);
  if (Number.isNaN(parsed)) return UNKNOWN_AGE_DAYS;
  return Math.max((now - parsed) / DAY_MS, 1e-6);
}

/** Rejects any weight set that is not five values in [0,1] summing to 1. Never renormalizes. */
export function validateWeights(weights: ScoreWeights): ScoreWeights {
  const entries: Array<[keyof ScoreWeights, number]> = [
    ["novelty", weights.novelty],
    ["health", weights.health],
    ["relevance", weights.relevance],
    ["author", weights.author],
    ["diversity", weights.diversity],
  ];
  for (const [name, value] of entries) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(`Weight ${name} must be a number in [0, 1], got ${value}`, { weights });
    }
  }
  const sum = entries.reduce((total, [, value]) => total + value, 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`Score weights must sum to 1.0, got ${sum}`, { weights, sum });
  }
  return weights;
}

/** Star velocity and push freshness; forks are penalized. */
export function noveltyScore(record: RepositoryRecord, now: number): number {
  const createdDays = daysSince(record.created_at, now);
  const pushedDays = daysSince(record.pushed_at, now);
  const starVelocity = Math.tanh(record.stargazers_count / createdDays / 50);
  const freshness = 1 / (1 + pushedDays);
  const base = 0.55 * starVelocity + 0.4 * freshness + 0.05 * Math.tanh(record.forks_count / 50);
  return clamp01(base - (record.fork ? FORK_PENALTY : 0));
}

/**
 * Four indicators worth a quarter each. Absent or unprobed signals add nothing; an
 * old release counts half.
 */
export function healthScore(record: RepositoryRecord, options: ScoringOptions): number {
  const { signals } = record;
  if ((options.requireCi && !signals.has_ci) || (options.requireTests && !signals.has_tests)) {
    return 0;
  }
  let score = 0;
  if (signals.has_ci) score += HEALTH_INDICATOR;
  if (signals.has_tests) score += HEALTH_INDICATOR;
  if (signals.has_manifest) score += HEALTH_INDICATOR;
  if (signals.latest_release_at !== null) {
    const releaseDays = daysSince(signals.latest_release_at, options.now);
    score += releaseDays <= RECENT_RELEASE_DAYS ? HEALTH_INDICATOR : HEALTH_INDICATOR / 2;
  }
  return clamp01(score);
}

export function relevanceScore(embedding: number[] | null | undefined, goalEmbedding: number[] | null | undefined): number {
  if (!embedding || !goalEmbedding || embedding.length === 0 || embedding.length !== goalEmbedding.length) {
    return 0.5;
  }
  return clamp01((cosineSimilarity(embedding, goalEmbedding) + 1) / 2);
}

export function authorScore(record: RepositoryRecord): number {
  const followers = record.signals.owner_followers;
  if (followers === null || followers <= 0) return 0;
  return clamp01(Math.log10(followers + 1) / 3);
}

function conceptOverlap(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const concept of left) {
    if (right.has(concept)) shared += 1;
  }
  return shared / Math.sqrt(left.size * right.size);
}

function similarity(a: RepositoryRecord, b: RepositoryRecord): number {
  if (a.embedding && b.embedding && a.embedding.length > 0 && a.embedding.length === b.embedding.length) {
    return clamp01(cosineSimilarity(a.embedding, b.embedding));
  }
  return clamp01(conceptOverlap(a.concepts, b.concepts));
}

/** Highest similarity to anything already selected; vectors when both sides have one, concept sets otherwise. */
export function diversityPenalty(record: RepositoryRecord, selected: RepositoryRecord[]): number {
  let penalty = 0;
  for (const other of selected) {
    penalty = Math.max(penalty, similarity(record, other));
  }
  return penalty;
}

export function compositeScore(
  subScores: Pick<ScoreSet, "novelty" | "health" | "relevance" | "author" | "diversity_penalty">,
  weights: ScoreWeights,
): number {
  return clamp01(
    weights.novelty * subScores.novelty +
      weights.health * subScores.health +
      weights.relevance * subScores.relevance +
      weights.author * subScores.author -
      weights.diversity * subScores.diversity_penalty,
  );
}

export function score(
  record: RepositoryRecord,
  goalEmbedding: number[] | null,
  selectedSoFar: RepositoryRecord[],
  weights: ScoreWeights,
  options: ScoringOptions,
): ScoreSet {
  const subScores = {
    novelty: noveltyScore(record, options.now),
    health: healthScore(record, options),
    relevance: relevanceScore(record.embedding, goalEmbedding),
    author: authorScore(record),
    diversity_penalty: diversityPenalty(record, selectedSoFar),
  };
  return { ...subScores, composite: compositeScore(subScores, weights) };
}

export function scoreAll(
  records: RepositoryRecord[],
  goalEmbedding: number[] | null,
  weights: ScoreWeights,
  options: ScoringOptions,
): ScoredCandidate[] {
  return records.map((record) => ({ record, scores: score(record, goalEmbedding, [], weights, options) }));
}
