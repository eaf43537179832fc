import { createHash } from "node:crypto";
import { z } from "zod";
import { ConfigurationError, UpstreamUnavailableError } from "./errors";

export type LLMProvider = "openai" | "anthropic" | "deepseek";

export interface LlmAudit {
  provider: LLMProvider;
  model: string;
  temperature: number;
  prompt_hash: string;
  duration_ms: number;
  prompt_chars: number;
  completion_chars: number;
  error?: string;
}

interface ChatJSONRawParams {
  systemPrompt: string;
  userPrompt: string;
  provider?: LLMProvider;
  model?: string;
  temperature?: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  onAudit?: (audit: LlmAudit) => void;
}

interface ProviderRuntimeConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
}

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.unknown() }).optional() })).optional(),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() })).optional(),
});

function extractContent(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (Array.isArray(raw)) {
    return raw
      .map((item: unknown) => {
        if (typeof item === "string") return item;
        if (typeof item === "object" && item !== null && "text" in item && typeof item.text === "string") {
          return item.text;
        }
        return "";
      })
      .join("");
  }
  return "";
}

export function resolveProvider(input: LLMProvider | undefined, env: NodeJS.ProcessEnv = process.env): LLMProvider {
  const envProvider = env.LLM_PROVIDER?.toLowerCase();
  if (envProvider === "openai" || envProvider === "anthropic" || envProvider === "deepseek") {
    return envProvider;
  }
  return input ?? "openai";
}

export function resolveProviderRuntimeConfig(
  params: { provider?: LLMProvider; model?: string; temperature?: number },
  env: NodeJS.ProcessEnv = process.env,
): ProviderRuntimeConfig {
  const provider = resolveProvider(params.provider, env);
  const temperature = params.temperature ?? 0.2;
  const normalizeBase = (base: string): string => base.replace(/\/+$/, "");

  if (provider === "openai") {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) throw new ConfigurationError("OPENAI_API_KEY is required when provider=openai.");
    return {
      provider,
      apiKey,
      baseUrl: normalizeBase(env.OPENAI_BASE_URL ?? "https://api.openai.com/v1"),
      model: env.OPENAI_MODEL ?? env.LLM_MODEL ?? params.model ?? "gpt-4o-mini",
      temperature,
    };
  }

  if (provider === "anthropic") {
    const apiKey = env.ANTHROPIC_API_KEY;
    if (!apiKey) throw new ConfigurationError("ANTHROPIC_API_KEY is required when provider=anthropic.");
    return {
      provider,
      apiKey,
      baseUrl: normalizeBase(env.ANTHROPIC_BASE_URL ?? "https://api.anthropic.com/v1"),
      model: env.ANTHROPIC_MODEL ?? env.LLM_MODEL ?? params.model ?? "claude-3-5-sonnet-latest",
      temperature,
    };
  }

  const apiKey = env.DEEPSEEK_API_KEY;
  if (!apiKey) throw new ConfigurationError("DEEPSEEK_API_KEY is required when provider=deepseek.");
  return {
    provider,
    apiKey,
    baseUrl: normalizeBase(env.DEEPSEEK_BASE_URL ?? "https://api.deepseek.com/v1"),
    model: env.DEEPSEEK_MODEL ?? env.LLM_MODEL ?? params.model ?? "deepseek-chat",
    temperature,
  };
}

async function failedResponse(response: Response): Promise<UpstreamUnavailableError> {
  const body = await response.text();
  return new UpstreamUnavailableError(`LLM HTTP ${response.status} ${response.statusText}: ${body.slice(0, 300)}`, {
    endpoint: "llm",
    status: response.status,
  });
}

async function callOpenAICompatible(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
): Promise<string> {
  const response = await fetch(`${config.baseUrl}/chat/completions`, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      model: config.model,
      temperature: config.temperature,
      messages: [
        { role: "system", content: `${systemPrompt}\nOutput JSON only.` },
        { role: "user", content: userPrompt },
      ],
    }),
    signal,
  });

  if (!response.ok) throw await failedResponse(response);

  const parsed = OpenAIResponseSchema.safeParse(await response.json());
  const content = parsed.success ? extractContent(parsed.data.choices?.[0]?.message?.content ?? "") : "";
  if (!content) throw new UpstreamUnavailableError("LLM returned empty content.", { endpoint: "llm" });
  return content;
}

async function callAnthropic(
  config: ProviderRuntimeConfig,
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
): Promise<string> {
  const response = await fetch(`${config.baseUrl}/messages`, {
    method: "POST",
    headers: {
      "x-api-key": config.apiKey,
      "anthropic-version": "2023-06-01",
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      model: config.model,
      max_tokens: 4096,
      temperature: config.temperature,
      system: `${systemPrompt}\nOutput JSON only.`,
      messages: [{ role: "user", content: userPrompt }],
    }),
    signal,
  });

  if (!response.ok) throw await failedResponse(response);

  const parsed = AnthropicResponseSchema.safeParse(await response.json());
  const content = parsed.success
    ? (parsed.data.content ?? [])
        .filter((part) => part.type === "text")
        .map((part) => part.text ?? "")
        .join("")
    : "";
  if (!content) throw new UpstreamUnavailableError("LLM returned empty content.", { endpoint: "llm" });
  return content;
}

export async function chatJSONRaw(params: ChatJSONRawParams): Promise<string> {
  const startedAt = Date.now();
  const config = resolveProviderRuntimeConfig(
    { provider: params.provider, model: params.model, temperature: params.temperature },
    params.env,
  );
  const promptHash = createHash("sha256")
    .update(params.systemPrompt)
    .update("\n\n")
    .update(params.userPrompt)
    .digest("hex");
  const promptChars = params.systemPrompt.length + params.userPrompt.length;

  const emitAudit = (completionChars: number, errorMessage?: string) => {
    params.onAudit?.({
      provider: config.provider,
      model: config.model,
      temperature: config.temperature,
      prompt_hash: promptHash,
      duration_ms: Date.now() - startedAt,
      prompt_chars: promptChars,
      completion_chars: completionChars,
      ...(errorMessage ? { error: errorMessage.slice(0, 200) } : {}),
    });
  };

  try {
    const content =
      config.provider === "anthropic"
        ? await callAnthropic(config, params.systemPrompt, params.userPrompt, params.signal)
        : await callOpenAICompatible(config, params.systemPrompt, params.userPrompt, params.signal);
    emitAudit(content.length);
    return content;
  } catch (error) {
    const reason = error instanceof Error ? error : new Error(String(error));
    emitAudit(0, reason.message);
    throw reason;
  }
}

/** Parses model output that may be wrapped in a ```json fence or surrounded by prose. */
export function parseJsonContent(content: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(content);
  const body = fenced ? fenced[1] : content;
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new SyntaxError("LLM output contains no JSON object");
  }
  return JSON.parse(body.slice(start, end + 1));
}
