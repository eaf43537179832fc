import { z } from "zod";
import type {
  CacheEntry,
  GatherReport,
  GatheredCandidate,
  Mission,
  ProbeReport,
  ProbeSignals,
  ProcessedLedger,
  RefinementPayload,
  RepositoryRecord,
  ScoreSet,
  ScoutEvent,
} from "./types";

const ProbeSignalNameSchema = z.enum(["readme", "ci", "tests", "manifest", "release", "author"]);

export const ProbeSignalsSchema: z.ZodType<ProbeSignals> = z.object({
  probe_state: z.enum(["unprobed", "complete", "partial"]),
  has_ci: z.boolean(),
  has_tests: z.boolean(),
  has_manifest: z.boolean(),
  latest_release_at: z.string().nullable(),
  readme_excerpt: z.string().nullable(),
  owner_followers: z.number().nullable(),
  missing: z.array(ProbeSignalNameSchema),
});

export const RepositoryRecordSchema: z.ZodType<RepositoryRecord> = z.object({
  full_name: z.string(),
  owner: z.string(),
  name: z.string(),
  html_url: z.string(),
  description: z.string().nullable(),
  language: z.string().nullable(),
  license_spdx_id: z.string().nullable(),
  topics: z.array(z.string()),
  stargazers_count: z.number(),
  forks_count: z.number(),
  fork: z.boolean(),
  archived: z.boolean(),
  owner_type: z.enum(["User", "Organization"]).nullable(),
  pushed_at: z.string(),
  created_at: z.string(),
  signals: ProbeSignalsSchema,
  concepts: z.array(z.string()),
  embedding: z.array(z.number()).nullable().optional(),
  fetched_at: z.string(),
});

export const CacheEntrySchema: z.ZodType<CacheEntry> = z.object({
  record: RepositoryRecordSchema,
  cached_at: z.string(),
  stale_after_ms: z.number(),
  stale: z.boolean(),
});

const ScoreSetSchema: z.ZodType<ScoreSet> = z.object({
  novelty: z.number(),
  health: z.number(),
  relevance: z.number(),
  author: z.number(),
  diversity_penalty: z.number(),
  composite: z.number(),
});

export const RefinementPayloadSchema: z.ZodType<RefinementPayload> = z.object({
  project: z.object({
    name: z.string(),
    tagline: z.string(),
    vision: z.string(),
  }),
  concepts: z.array(
    z.object({
      problem: z.string(),
      solution: z.string(),
      why_it_works: z.array(z.string()),
    }),
  ),
});

const GatheredCandidateSchema: z.ZodType<GatheredCandidate> = z.object({
  record: RepositoryRecordSchema,
  topic: z.string(),
  source: z.enum(["network", "cache"]),
  needs_probe: z.boolean(),
});

const GatherReportSchema: z.ZodType<GatherReport> = z.object({
  queries: z.array(z.string()),
  pages_fetched: z.number(),
  items_seen: z.number(),
  duplicates: z.number(),
  malformed: z.number(),
  skipped_license: z.number(),
  skipped_processed: z.number(),
  cache_hits: z.number(),
  stale_marked: z.number(),
  failed_topics: z.array(z.object({ topic: z.string(), error: z.string() })),
  failed_pages: z.array(z.object({ topic: z.string(), page: z.number(), error: z.string() })),
});

const ProbeReportSchema: z.ZodType<ProbeReport> = z.object({
  probed: z.number(),
  reused: z.number(),
  unprobed: z.number(),
  partial: z.array(z.object({ repo: z.string(), missing: z.array(ProbeSignalNameSchema) })),
});

const ScoredCandidateSchema = z.object({
  record: RepositoryRecordSchema,
  scores: ScoreSetSchema,
});

const PhaseResultSchema = z.discriminatedUnion("phase", [
  z.object({
    phase: z.literal("gathering"),
    completed_at: z.string(),
    candidates: z.array(GatheredCandidateSchema),
    report: GatherReportSchema,
  }),
  z.object({
    phase: z.literal("probing"),
    completed_at: z.string(),
    records: z.array(RepositoryRecordSchema),
    report: ProbeReportSchema,
  }),
  z.object({
    phase: z.literal("scoring"),
    completed_at: z.string(),
    selection: z.array(ScoredCandidateSchema),
    pool_size: z.number(),
    embeddings_used: z.boolean(),
  }),
  z.object({
    phase: z.literal("refining"),
    completed_at: z.string(),
    refinement: RefinementPayloadSchema.nullable(),
    error: z.string().optional(),
  }),
]);

const MissionPhaseSchema = z.enum(["gathering", "probing", "scoring", "refining", "finalized"]);

const ScoutEventSchema: z.ZodType<ScoutEvent> = z.object({
  ts: z.string(),
  run_id: z.string(),
  node: z.string(),
  repo: z.string().nullable().optional(),
  level: z.enum(["info", "warn", "error"]),
  event: z.string(),
  data: z.record(z.unknown()).optional(),
});

export const MissionSchema: z.ZodType<Mission> = z.object({
  mission_id: z.string(),
  seq: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
  goal: z.string(),
  topics: z.array(z.string()),
  status: z.union([MissionPhaseSchema, z.literal("failed")]),
  cursor: MissionPhaseSchema.nullable(),
  phases: z.array(PhaseResultSchema),
  result: z
    .object({
      goal: z.string(),
      sources: z.array(
        z.object({
          name: z.string(),
          url: z.string(),
          description: z.string().nullable(),
          language: z.string().nullable(),
          license: z.string().nullable(),
          stars: z.number(),
          concepts: z.array(z.string()),
          readme_snippet: z.string().nullable(),
          scores: ScoreSetSchema,
        }),
      ),
      refinement: RefinementPayloadSchema.nullable(),
      metrics: z.object({
        topics: z.array(z.string()),
        since_days: z.number(),
        long_tail: z.boolean(),
        candidates: z.number(),
        probed: z.number(),
        selected: z.number(),
        weights: z.object({
          novelty: z.number(),
          health: z.number(),
          relevance: z.number(),
          author: z.number(),
          diversity: z.number(),
        }),
      }),
    })
    .nullable(),
  failure: z
    .object({
      phase: MissionPhaseSchema,
      kind: z.enum([
        "INVALID_INPUT",
        "CONFIGURATION_ERROR",
        "QUOTA_EXCEEDED",
        "UPSTREAM_UNAVAILABLE",
        "TIMEOUT",
        "PERSISTENCE_ERROR",
        "CANCELLED",
        "UNKNOWN",
      ]),
      message: z.string(),
      hints: z.array(z.string()),
      completed_count: z.number(),
      failed_at: z.string(),
    })
    .nullable(),
  events: z.array(ScoutEventSchema),
});

export const ProcessedLedgerSchema: z.ZodType<ProcessedLedger> = z.object({
  version: z.literal(1),
  updated_at: z.string(),
  repos: z.record(
    z.object({
      processed_at: z.string(),
      mission_id: z.string(),
    }),
  ),
});
