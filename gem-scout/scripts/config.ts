import { z } from "zod";
import { readJsonFile } from "./artifacts";
import { ConfigurationError, InvalidInputError, errorMessage } from "./errors";
import { validateWeights } from "./scorer";
import type { ScoutConfig } from "./types";

// Longest delay setTimeout honours; larger values fire after 1ms.
const MAX_TIMER_MS = 2_147_483_647;

const QuotaSchema = z.object({
  capacity: z.number().int().positive(),
  windowMs: z.number().int().positive().max(MAX_TIMER_MS),
});

const TimeoutSchema = z.number().int().positive().max(MAX_TIMER_MS);

export const ScoutConfigSchema = z.object({
  goal: z.string().default(""),
  topics: z.array(z.string()),
  sinceDays: z.number().int().positive().default(21),
  maxCandidates: z.number().int().positive().default(60),
  perPage: z.number().int().min(1).max(100).default(30),
  maxPagesPerTopic: z.number().int().positive().default(3),
  probeLimit: z.number().int().nonnegative().default(24),
  probeConcurrency: z.number().int().positive().default(3),
  selectionSize: z.number().int().nonnegative().default(6),
  weights: z
    .object({
      novelty: z.number(),
      health: z.number(),
      relevance: z.number(),
      author: z.number(),
      diversity: z.number(),
    })
    .default({ novelty: 0.4, health: 0.25, relevance: 0.2, author: 0.05, diversity: 0.1 }),
  cacheStalenessHours: z.number().positive().default(24),
  quotas: z
    .object({
      search: QuotaSchema.default({ capacity: 28, windowMs: 60_000 }),
      "code-search": QuotaSchema.default({ capacity: 8, windowMs: 60_000 }),
      core: QuotaSchema.default({ capacity: 5000, windowMs: 3_600_000 }),
    })
    .default({}),
  safetyMarginRatio: z.number().min(0).max(0.9).default(0.1),
  minIntervalMs: z.number().int().nonnegative().default(0),
  longTail: z
    .object({
      enabled: z.boolean().default(false),
      maxStars: z.number().int().default(20),
    })
    .default({}),
  licenses: z.array(z.string().min(1)).default([]),
  minHealth: z.number().min(0).max(1).default(0),
  requireCi: z.boolean().default(false),
  requireTests: z.boolean().default(false),
  authorSignal: z.boolean().default(true),
  readmeMaxChars: z.number().int().positive().default(8000),
  useEmbeddings: z.boolean().default(false),
  refine: z
    .object({
      enabled: z.boolean().default(false),
      provider: z.enum(["openai", "anthropic", "deepseek"]).optional(),
      model: z.string().min(1).optional(),
      temperature: z.number().min(0).max(2).default(0.2),
    })
    .default({}),
  excludeProcessed: z.boolean().default(false),
  ledgerRetentionDays: z.number().int().positive().optional(),
  phaseTimeoutsMs: z
    .object({
      gathering: TimeoutSchema.default(600_000),
      probing: TimeoutSchema.default(900_000),
      scoring: TimeoutSchema.default(120_000),
      refining: TimeoutSchema.default(180_000),
    })
    .default({}),
  paths: z
    .object({
      cacheDir: z.string().min(1).default("cache/repos"),
      missionsDir: z.string().min(1).default("missions"),
      ledgerPath: z.string().min(1).default("cache/processed.json"),
    })
    .default({}),
});

/**
 * Shape problems and an empty topic set are InvalidInputError; settings that
 * parse but cannot work together are ConfigurationError.
 */
export function parseConfig(raw: unknown): ScoutConfig {
  const parsed = ScoutConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new InvalidInputError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  const config: ScoutConfig = {
    ...parsed.data,
    topics: parsed.data.topics.map((topic) => topic.trim()).filter((topic) => topic !== ""),
  };
  if (config.topics.length === 0) {
    throw new InvalidInputError("At least one non-empty topic is required");
  }

  validateWeights(config.weights);

  const probeQuota = Math.min(config.quotas.core.capacity, config.quotas["code-search"].capacity);
  if (config.probeConcurrency >= probeQuota) {
    throw new ConfigurationError(
      `probeConcurrency ${config.probeConcurrency} must stay below the smallest probe quota (${probeQuota})`,
    );
  }
  if (config.probeLimit > config.maxCandidates) {
    throw new ConfigurationError(`probeLimit ${config.probeLimit} exceeds maxCandidates ${config.maxCandidates}`);
  }
  if (config.longTail.enabled && config.longTail.maxStars <= 0) {
    throw new ConfigurationError(`longTail.maxStars must be positive, got ${config.longTail.maxStars}`);
  }
  return config;
}

export async function loadConfig(filePath: string): Promise<ScoutConfig> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new InvalidInputError(`Cannot read configuration ${filePath}: ${errorMessage(error)}`);
  }
  if (raw === undefined) {
    throw new InvalidInputError(`Configuration file not found: ${filePath}`);
  }
  return parseConfig(raw);
}
