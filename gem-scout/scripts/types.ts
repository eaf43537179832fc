export type EndpointClass = "search" | "code-search" | "core";

export interface QuotaSpec {
  capacity: number;
  windowMs: number;
}

export interface ScoreWeights {
  novelty: number;
  health: number;
  relevance: number;
  author: number;
  diversity: number;
}

export type MissionPhase = "gathering" | "probing" | "scoring" | "refining" | "finalized";

export interface ScoutConfig {
  goal: string;
  topics: string[];
  sinceDays: number;
  maxCandidates: number;
  perPage: number;
  maxPagesPerTopic: number;
  probeLimit: number;
  probeConcurrency: number;
  selectionSize: number;
  weights: ScoreWeights;
  cacheStalenessHours: number;
  quotas: Record<EndpointClass, QuotaSpec>;
  safetyMarginRatio: number;
  minIntervalMs: number;
  longTail: {
    enabled: boolean;
    maxStars: number;
  };
  licenses: string[];
  minHealth: number;
  requireCi: boolean;
  requireTests: boolean;
  authorSignal: boolean;
  readmeMaxChars: number;
  useEmbeddings: boolean;
  refine: {
    enabled: boolean;
    provider?: "openai" | "anthropic" | "deepseek";
    model?: string;
    temperature: number;
  };
  excludeProcessed: boolean;
  ledgerRetentionDays?: number;
  phaseTimeoutsMs: Record<Exclude<MissionPhase, "finalized">, number>;
  paths: {
    cacheDir: string;
    missionsDir: string;
    ledgerPath: string;
  };
}

export type ProbeState = "unprobed" | "complete" | "partial";

export type ProbeSignalName = "readme" | "ci" | "tests" | "manifest" | "release" | "author";

export interface ProbeSignals {
  probe_state: ProbeState;
  has_ci: boolean;
  has_tests: boolean;
  has_manifest: boolean;
  latest_release_at: string | null;
  readme_excerpt: string | null;
  owner_followers: number | null;
  missing: ProbeSignalName[];
}

export interface RepositoryRecord {
  full_name: string;
  owner: string;
  name: string;
  html_url: string;
  description: string | null;
  language: string | null;
  license_spdx_id: string | null;
  topics: string[];
  stargazers_count: number;
  forks_count: number;
  fork: boolean;
  archived: boolean;
  owner_type: "User" | "Organization" | null;
  pushed_at: string;
  created_at: string;
  signals: ProbeSignals;
  concepts: string[];
  embedding?: number[] | null;
  fetched_at: string;
}

export interface CacheEntry {
  record: RepositoryRecord;
  cached_at: string;
  stale_after_ms: number;
  stale: boolean;
}

export interface ScoreSet {
  novelty: number;
  health: number;
  relevance: number;
  author: number;
  diversity_penalty: number;
  composite: number;
}

export interface ScoredCandidate {
  record: RepositoryRecord;
  scores: ScoreSet;
}

export interface GatheredCandidate {
  record: RepositoryRecord;
  topic: string;
  source: "network" | "cache";
  needs_probe: boolean;
}

export interface GatherReport {
  queries: string[];
  pages_fetched: number;
  items_seen: number;
  duplicates: number;
  malformed: number;
  skipped_license: number;
  skipped_processed: number;
  cache_hits: number;
  stale_marked: number;
  failed_topics: Array<{ topic: string; error: string }>;
  failed_pages: Array<{ topic: string; page: number; error: string }>;
}

export interface ProbeReport {
  probed: number;
  reused: number;
  unprobed: number;
  partial: Array<{ repo: string; missing: ProbeSignalName[] }>;
}

export interface RefinementPayload {
  project: {
    name: string;
    tagline: string;
    vision: string;
  };
  concepts: Array<{
    problem: string;
    solution: string;
    why_it_works: string[];
  }>;
}

export type PhaseResult =
  | {
      phase: "gathering";
      completed_at: string;
      candidates: GatheredCandidate[];
      report: GatherReport;
    }
  | {
      phase: "probing";
      completed_at: string;
      records: RepositoryRecord[];
      report: ProbeReport;
    }
  | {
      phase: "scoring";
      completed_at: string;
      selection: ScoredCandidate[];
      pool_size: number;
      embeddings_used: boolean;
    }
  | {
      phase: "refining";
      completed_at: string;
      refinement: RefinementPayload | null;
      error?: string;
    };

export type MissionStatus = MissionPhase | "failed";

export type FailKind =
  | "INVALID_INPUT"
  | "CONFIGURATION_ERROR"
  | "QUOTA_EXCEEDED"
  | "UPSTREAM_UNAVAILABLE"
  | "TIMEOUT"
  | "PERSISTENCE_ERROR"
  | "CANCELLED"
  | "UNKNOWN";

export interface MissionFailure {
  phase: MissionPhase;
  kind: FailKind;
  message: string;
  hints: string[];
  completed_count: number;
  failed_at: string;
}

export interface MissionSource {
  name: string;
  url: string;
  description: string | null;
  language: string | null;
  license: string | null;
  stars: number;
  concepts: string[];
  readme_snippet: string | null;
  scores: ScoreSet;
}

export interface MissionResult {
  goal: string;
  sources: MissionSource[];
  refinement: RefinementPayload | null;
  metrics: {
    topics: string[];
    since_days: number;
    long_tail: boolean;
    candidates: number;
    probed: number;
    selected: number;
    weights: ScoreWeights;
  };
}

export interface Mission {
  mission_id: string;
  seq: number;
  created_at: string;
  updated_at: string;
  goal: string;
  topics: string[];
  status: MissionStatus;
  cursor: MissionPhase | null;
  phases: PhaseResult[];
  result: MissionResult | null;
  failure: MissionFailure | null;
  events: ScoutEvent[];
}

export type EventLevel = "info" | "warn" | "error";

export interface ScoutEvent {
  ts: string;
  run_id: string;
  node: string;
  repo?: string | null;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface ProcessedLedgerEntry {
  processed_at: string;
  mission_id: string;
}

export interface ProcessedLedger {
  version: 1;
  updated_at: string;
  repos: Record<string, ProcessedLedgerEntry>;
}
