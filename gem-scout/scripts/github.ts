import { z } from "zod";
import { mergeConcepts } from "./concepts";
import { UpstreamUnavailableError, errorMessage } from "./errors";
import { parseRateLimitHeaders, type RateLimitInfo, type RateLimitScheduler } from "./planner";
import { withRetry } from "./retry";
import type { EndpointClass, ProbeSignals, RepositoryRecord } from "./types";

const GITHUB_API = "https://api.github.com";

export interface RepoSearchPage {
  total_count: number;
  items: RepositoryRecord[];
  malformed: number;
}

export interface RepoSearchService {
  searchRepositories(query: string, page: number, perPage: number, signal?: AbortSignal): Promise<RepoSearchPage>;
}

export interface RepoProbeService {
  fetchReadme(fullName: string, maxChars: number, signal?: AbortSignal): Promise<string | null>;
  hasCiConfig(fullName: string, signal?: AbortSignal): Promise<boolean>;
  listRootFiles(fullName: string, signal?: AbortSignal): Promise<string[]>;
  hasTestFiles(fullName: string, signal?: AbortSignal): Promise<boolean>;
  latestReleaseAt(fullName: string, signal?: AbortSignal): Promise<string | null>;
  ownerFollowers(owner: string, signal?: AbortSignal): Promise<number | null>;
}

export type GitHubEvent = "GITHUB_RETRY" | "GITHUB_RETRY_GIVEUP" | "GITHUB_RATE_LIMITED";

export interface GitHubClientOptions {
  scheduler: RateLimitScheduler;
  token?: string;
  baseUrl?: string;
  retries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  sleep?: (ms: number) => Promise<void>;
  onEvent?: (
    event: GitHubEvent,
    data: { repo: string; endpoint: string; attempt?: number; status?: number; reason?: string; waitUntil?: number },
  ) => void;
}

const SearchItemSchema = z.object({
  full_name: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
  html_url: z.string(),
  description: z.string().nullable().optional(),
  language: z.string().nullable().optional(),
  license: z.object({ spdx_id: z.string().nullable().optional() }).nullable().optional(),
  topics: z.array(z.string()).optional(),
  stargazers_count: z.number().nonnegative(),
  forks_count: z.number().nonnegative().optional(),
  fork: z.boolean().optional(),
  archived: z.boolean().optional(),
  owner: z.object({ login: z.string(), type: z.string().optional() }).optional(),
  pushed_at: z.string(),
  created_at: z.string(),
});

const SearchResponseSchema = z.object({
  total_count: z.number(),
  items: z.array(z.unknown()),
});

const CodeSearchResponseSchema = z.object({ total_count: z.number() });
const ContentsListSchema = z.array(z.object({ name: z.string(), type: z.string().optional() }));
const ReleaseSchema = z.object({ published_at: z.string().nullable(), created_at: z.string().optional() });
const UserSchema = z.object({ followers: z.number().nonnegative() });

export function unprobedSignals(): ProbeSignals {
  return {
    probe_state: "unprobed",
    has_ci: false,
    has_tests: false,
    has_manifest: false,
    latest_release_at: null,
    readme_excerpt: null,
    owner_followers: null,
    missing: [],
  };
}

function toRecord(item: z.infer<typeof SearchItemSchema>, fetchedAt: string): RepositoryRecord {
  const [owner, name] = item.full_name.split("/");
  const ownerType = item.owner?.type;
  return {
    full_name: item.full_name,
    owner,
    name,
    html_url: item.html_url,
    description: item.description ?? null,
    language: item.language ?? null,
    license_spdx_id: item.license?.spdx_id ?? null,
    topics: item.topics ?? [],
    stargazers_count: item.stargazers_count,
    forks_count: item.forks_count ?? 0,
    fork: item.fork ?? false,
    archived: item.archived ?? false,
    owner_type: ownerType === "User" || ownerType === "Organization" ? ownerType : null,
    pushed_at: item.pushed_at,
    created_at: item.created_at,
    signals: unprobedSignals(),
    concepts: mergeConcepts(item.topics ?? [], []),
    fetched_at: fetchedAt,
  };
}

function isRateLimited(status: number, info: RateLimitInfo, body: string): boolean {
  if (status === 429) return true;
  if (status !== 403) return false;
  return info.remaining === 0 || info.retryAfterMs !== undefined || body.toLowerCase().includes("rate limit");
}

function isRetriableGitHubError(error: unknown): boolean {
  if (!(error instanceof UpstreamUnavailableError)) return false;
  if (error.status === undefined) return true;
  return error.status === 408 || (error.status >= 500 && error.status <= 599);
}

interface RequestParams {
  endpointClass: EndpointClass;
  path: string;
  query?: Record<string, string>;
  endpoint: string;
  repo: string;
  accept?: string;
  signal?: AbortSignal;
}

/**
 * GitHub REST client. Every call waits on the scheduler for its endpoint class and
 * reports the rate-limit headers back to it. A rate-limited response is retried after
 * the reported reset without spending a retry; 5xx and network failures are retried
 * with backoff and end in UpstreamUnavailableError.
 */
export class GitHubClient implements RepoSearchService, RepoProbeService {
  private readonly baseUrl: string;

  constructor(private readonly options: GitHubClientOptions) {
    this.baseUrl = options.baseUrl ?? GITHUB_API;
  }

  async searchRepositories(query: string, page: number, perPage: number, signal?: AbortSignal): Promise<RepoSearchPage> {
    const response = await this.request({
      endpointClass: "search",
      path: "/search/repositories",
      query: { q: query, sort: "stars", order: "desc", per_page: String(perPage), page: String(page) },
      endpoint: "search_repositories",
      repo: query,
      signal,
    });
    if (!response) {
      return { total_count: 0, items: [], malformed: 0 };
    }
    const parsed = SearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamUnavailableError("Search response has an unexpected shape", { endpoint: "search_repositories" });
    }
    const fetchedAt = new Date().toISOString();
    const items: RepositoryRecord[] = [];
    let malformed = 0;
    for (const raw of parsed.data.items) {
      const item = SearchItemSchema.safeParse(raw);
      if (item.success) {
        items.push(toRecord(item.data, fetchedAt));
      } else {
        malformed += 1;
      }
    }
    return { total_count: parsed.data.total_count, items, malformed };
  }

  async fetchReadme(fullName: string, maxChars: number, signal?: AbortSignal): Promise<string | null> {
    const response = await this.request({
      endpointClass: "core",
      path: `/repos/${fullName}/readme`,
      endpoint: "readme",
      repo: fullName,
      accept: "application/vnd.github.raw",
      signal,
    });
    if (!response) return null;
    const text = await response.text();
    return text.length > maxChars ? text.slice(0, maxChars) : text;
  }

  async hasCiConfig(fullName: string, signal?: AbortSignal): Promise<boolean> {
    const response = await this.request({
      endpointClass: "core",
      path: `/repos/${fullName}/contents/.github/workflows`,
      endpoint: "ci_workflows",
      repo: fullName,
      signal,
    });
    if (!response) return false;
    const parsed = ContentsListSchema.safeParse(await response.json());
    return parsed.success && parsed.data.length > 0;
  }

  async listRootFiles(fullName: string, signal?: AbortSignal): Promise<string[]> {
    const response = await this.request({
      endpointClass: "core",
      path: `/repos/${fullName}/contents`,
      endpoint: "root_files",
      repo: fullName,
      signal,
    });
    if (!response) return [];
    const parsed = ContentsListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamUnavailableError("Root contents response is not a list", { endpoint: "root_files", repo: fullName });
    }
    return parsed.data.slice(0, 100).map((item) => item.name);
  }

  async hasTestFiles(fullName: string, signal?: AbortSignal): Promise<boolean> {
    for (const qualifier of ["path:tests", "filename:test"]) {
      const response = await this.request({
        endpointClass: "code-search",
        path: "/search/code",
        query: { q: `repo:${fullName} ${qualifier}`, per_page: "1" },
        endpoint: "code_search_tests",
        repo: fullName,
        signal,
      });
      if (!response) return false;
      const parsed = CodeSearchResponseSchema.safeParse(await response.json());
      if (parsed.success && parsed.data.total_count > 0) return true;
    }
    return false;
  }

  async latestReleaseAt(fullName: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.request({
      endpointClass: "core",
      path: `/repos/${fullName}/releases/latest`,
      endpoint: "latest_release",
      repo: fullName,
      signal,
    });
    if (!response) return null;
    const parsed = ReleaseSchema.safeParse(await response.json());
    if (!parsed.success) return null;
    return parsed.data.published_at ?? parsed.data.created_at ?? null;
  }

  async ownerFollowers(owner: string, signal?: AbortSignal): Promise<number | null> {
    const response = await this.request({
      endpointClass: "core",
      path: `/users/${owner}`,
      endpoint: "user",
      repo: owner,
      signal,
    });
    if (!response) return null;
    const parsed = UserSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.followers : null;
  }

  private buildHeaders(accept = "application/vnd.github+json"): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: accept,
      "User-Agent": "gem-scout",
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    return headers;
  }

  /** Resolves null on 404. */
  private async request(params: RequestParams): Promise<Response | null> {
    const { scheduler, onEvent } = this.options;
    const url = new URL(`${this.baseUrl}${params.path}`);
    for (const [key, value] of Object.entries(params.query ?? {})) {
      url.searchParams.set(key, value);
    }

    return withRetry(
      async () => {
        for (;;) {
          await scheduler.acquire(params.endpointClass, params.signal);
          let response: Response;
          try {
            response = await fetch(url, {
              method: "GET",
              headers: this.buildHeaders(params.accept),
              signal: params.signal,
            });
          } catch (error) {
            if (params.signal?.aborted) throw error;
            throw new UpstreamUnavailableError(`GitHub ${params.endpoint} request failed: ${errorMessage(error)}`, {
              endpoint: params.endpoint,
              repo: params.repo,
            });
          }

          const info = parseRateLimitHeaders(response.headers);
          if (response.ok) {
            scheduler.reconcile(params.endpointClass, info);
            return response;
          }
          const body = await response.text();
          if (isRateLimited(response.status, info, body)) {
            scheduler.reconcile(params.endpointClass, info, true);
            const blocked = scheduler
              .snapshot()
              .find((entry) => entry.endpoint_class === params.endpointClass)?.blocked_until;
            onEvent?.("GITHUB_RATE_LIMITED", {
              repo: params.repo,
              endpoint: params.endpoint,
              status: response.status,
              waitUntil: blocked ?? undefined,
            });
            continue;
          }
          scheduler.reconcile(params.endpointClass, info);
          if (response.status === 404) {
            return null;
          }
          throw new UpstreamUnavailableError(
            `GitHub API ${response.status} ${response.statusText}: ${body.slice(0, 300)}`,
            { endpoint: params.endpoint, repo: params.repo, status: response.status },
          );
        }
      },
      {
        retries: this.options.retries ?? 2,
        baseDelayMs: this.options.baseDelayMs ?? 500,
        maxDelayMs: this.options.maxDelayMs ?? 4000,
        jitter: this.options.jitter ?? true,
        retryOn: isRetriableGitHubError,
        sleep: this.options.sleep,
        signal: params.signal,
        onRetry: ({ attempt, error }) => {
          onEvent?.("GITHUB_RETRY", {
            repo: params.repo,
            endpoint: params.endpoint,
            attempt,
            status: error instanceof UpstreamUnavailableError ? error.status : undefined,
          });
        },
        onGiveup: ({ attempt, error }) => {
          onEvent?.("GITHUB_RETRY_GIVEUP", {
            repo: params.repo,
            endpoint: params.endpoint,
            attempt,
            status: error instanceof UpstreamUnavailableError ? error.status : undefined,
            reason: errorMessage(error),
          });
        },
      },
    );
  }
}
