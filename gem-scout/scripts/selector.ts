import { identityKey } from "./cache";
import { compositeScore, diversityPenalty } from "./scorer";
import type { RepositoryRecord, ScoreWeights, ScoredCandidate } from "./types";

function outranks(a: ScoredCandidate, b: ScoredCandidate): boolean {
  if (a.scores.composite !== b.scores.composite) return a.scores.composite > b.scores.composite;
  if (a.record.stargazers_count !== b.record.stargazers_count) {
    return a.record.stargazers_count > b.record.stargazers_count;
  }
  return identityKey(a.record.full_name) < identityKey(b.record.full_name);
}

/**
 * Greedy diversified top-N. Each round re-scores the remaining candidates against
 * the picks so far and takes the best; ties go to more stars, then to the identity
 * that sorts first.
 */
export function select(candidates: ScoredCandidate[], n: number, weights: ScoreWeights): ScoredCandidate[] {
  const remaining = [...candidates];
  const picked: ScoredCandidate[] = [];
  const pickedRecords: RepositoryRecord[] = [];

  while (picked.length < n && remaining.length > 0) {
    let bestIndex = -1;
    let best: ScoredCandidate | undefined;
    for (let i = 0; i < remaining.length; i += 1) {
      const { record, scores } = remaining[i];
      const penalty = diversityPenalty(record, pickedRecords);
      const subScores = { ...scores, diversity_penalty: penalty };
      const rescored: ScoredCandidate = {
        record,
        scores: { ...subScores, composite: compositeScore(subScores, weights) },
      };
      if (!best || outranks(rescored, best)) {
        best = rescored;
        bestIndex = i;
      }
    }
    if (!best) break;
    remaining.splice(bestIndex, 1);
    picked.push(best);
    pickedRecords.push(best.record);
  }
  return picked;
}
