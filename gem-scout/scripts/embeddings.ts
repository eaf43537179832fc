import { z } from "zod";
import { ConfigurationError, UpstreamUnavailableError } from "./errors";

export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

interface EmbeddingRuntimeConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

function resolveEmbeddingRuntimeConfig(env: NodeJS.ProcessEnv): EmbeddingRuntimeConfig {
  const apiKey = env.EMBEDDING_API_KEY ?? env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError("EMBEDDING_API_KEY (or OPENAI_API_KEY) is required when useEmbeddings is on.");
  }
  return {
    apiKey,
    baseUrl: (env.EMBEDDING_BASE_URL ?? env.OPENAI_BASE_URL ?? "https://api.openai.com/v1").replace(/\/+$/, ""),
    model: env.EMBEDDING_MODEL ?? "text-embedding-3-small",
  };
}

/** Embedder for any service that speaks the OpenAI `/embeddings` request shape. */
export function createOpenAICompatibleEmbedder(env: NodeJS.ProcessEnv = process.env): Embedder {
  const config = resolveEmbeddingRuntimeConfig(env);
  return {
    async embed(texts, signal) {
      if (texts.length === 0) return [];
      const response = await fetch(`${config.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: config.model, input: texts }),
        signal,
      });
      if (!response.ok) {
        const body = await response.text();
        throw new UpstreamUnavailableError(`Embedding HTTP ${response.status} ${response.statusText}: ${body.slice(0, 300)}`, {
          endpoint: "embeddings",
          status: response.status,
        });
      }
      const parsed = EmbeddingResponseSchema.safeParse(await response.json());
      if (!parsed.success || parsed.data.data.length !== texts.length) {
        throw new UpstreamUnavailableError("Embedding response has an unexpected shape", { endpoint: "embeddings" });
      }
      return [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    },
  };
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}
