import { UpstreamUnavailableError, errorMessage } from "./errors";
import { chatJSONRaw, parseJsonContent, resolveProviderRuntimeConfig, type LLMProvider, type LlmAudit } from "./llm";
import { buildRefinePrompts } from "./prompts";
import { RefinementPayloadSchema } from "./schemas";
import type { RefinementPayload, ScoredCandidate } from "./types";

/** Optional text-generation step run once per mission over the final selection. */
export interface Refiner {
  refine(goal: string, selection: ScoredCandidate[], signal?: AbortSignal): Promise<RefinementPayload>;
}

export interface LlmRefinerOptions {
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
  env?: NodeJS.ProcessEnv;
  onAudit?: (audit: LlmAudit) => void;
}

/** Fails with ConfigurationError right away when the provider's key is missing. */
export function createLlmRefiner(options: LlmRefinerOptions = {}): Refiner {
  resolveProviderRuntimeConfig(options, options.env);
  return {
    async refine(goal, selection, signal) {
      const { systemPrompt, userPrompt } = buildRefinePrompts(goal, selection);
      const content = await chatJSONRaw({ ...options, systemPrompt, userPrompt, signal });
      let raw: unknown;
      try {
        raw = parseJsonContent(content);
      } catch (error) {
        throw new UpstreamUnavailableError(`Refinement output is not JSON: ${errorMessage(error)}`, { endpoint: "llm" });
      }
      const parsed = RefinementPayloadSchema.safeParse(raw);
      if (!parsed.success) {
        throw new UpstreamUnavailableError(
          `Refinement output failed validation: ${parsed.error.issues.map((issue) => issue.path.join(".")).join(", ")}`,
          { endpoint: "llm" },
        );
      }
      return parsed.data;
    },
  };
}
