import { QuotaExceededError } from "./errors";
import type { EndpointClass, QuotaSpec } from "./types";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};

/**
 * Rolling-window quota for one endpoint class. `issued` holds the issue times of
 * the calls still inside the window, oldest first; its length is the consumed count.
 */
export interface QuotaBudget {
  endpointClass: EndpointClass;
  capacity: number;
  windowMs: number;
  issued: number[];
  lastIssuedAt: number | null;
  blockedUntil: number;
  remote: {
    limit: number | null;
    remaining: number | null;
    resetAt: number | null;
  };
}

export interface RateLimitInfo {
  limit?: number;
  remaining?: number;
  resetAtMs?: number;
  retryAfterMs?: number;
}

export interface Permit {
  endpoint_class: EndpointClass;
  issued_at: number;
  waited_ms: number;
}

export interface QuotaSnapshot {
  endpoint_class: EndpointClass;
  capacity: number;
  window_ms: number;
  consumed: number;
  window_start: number | null;
  blocked_until: number | null;
  remote_remaining: number | null;
  queued: number;
}

export interface SchedulerOptions {
  clock?: Clock;
  safetyMarginRatio?: number;
  minIntervalMs?: number;
  skewMs?: number;
  onWait?: (meta: { endpointClass: EndpointClass; waitMs: number; queued: number }) => void;
}

interface Waiter {
  enqueuedAt: number;
  resolve: (permit: Permit) => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

export function createQuotaBudget(endpointClass: EndpointClass, spec: QuotaSpec): QuotaBudget {
  if (!Number.isInteger(spec.capacity) || spec.capacity < 1) {
    throw new RangeError(`Quota capacity for ${endpointClass} must be a positive integer`);
  }
  if (!(spec.windowMs > 0)) {
    throw new RangeError(`Quota window for ${endpointClass} must be positive`);
  }
  return {
    endpointClass,
    capacity: spec.capacity,
    windowMs: spec.windowMs,
    issued: [],
    lastIssuedAt: null,
    blockedUntil: 0,
    remote: { limit: null, remaining: null, resetAt: null },
  };
}

export function createQuotaBudgets(specs: Record<EndpointClass, QuotaSpec>): Record<EndpointClass, QuotaBudget> {
  return {
    search: createQuotaBudget("search", specs.search),
    "code-search": createQuotaBudget("code-search", specs["code-search"]),
    core: createQuotaBudget("core", specs.core),
  };
}

function headerNumber(headers: Headers, name: string): number | undefined {
  const raw = headers.get(name);
  if (raw === null || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function parseRateLimitHeaders(headers: Headers): RateLimitInfo {
  const reset = headerNumber(headers, "x-ratelimit-reset");
  const retryAfter = headerNumber(headers, "retry-after");
  return {
    limit: headerNumber(headers, "x-ratelimit-limit"),
    remaining: headerNumber(headers, "x-ratelimit-remaining"),
    resetAtMs: reset === undefined ? undefined : reset * 1000,
    retryAfterMs: retryAfter === undefined ? undefined : retryAfter * 1000,
  };
}

/**
 * Gates outbound calls per endpoint class. Callers queue first-come-first-served;
 * a single pump per class issues permits, so the check-and-consume step is never
 * interleaved with another caller's.
 */
export class RateLimitScheduler {
  private readonly clock: Clock;
  private readonly safetyMarginRatio: number;
  private readonly minIntervalMs: number;
  private readonly skewMs: number;
  private readonly queues = new Map<EndpointClass, Waiter[]>();
  private readonly pumps = new Map<EndpointClass, AbortController>();

  constructor(
    private readonly budgets: Record<EndpointClass, QuotaBudget>,
    private readonly options: SchedulerOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.safetyMarginRatio = options.safetyMarginRatio ?? 0.1;
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.skewMs = options.skewMs ?? 1000;
  }

  acquire(endpointClass: EndpointClass, signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    const queue = this.queueFor(endpointClass);
    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        if (queue.length === 0) this.pumps.get(endpointClass)?.abort();
        reject(abortReason(signal));
      };
      const waiter: Waiter = {
        enqueuedAt: this.clock.now(),
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      queue.push(waiter);
      this.startPump(endpointClass);
    });
  }

  /** Non-blocking variant: issues a permit now or throws QuotaExceededError with the retry instant. */
  tryAcquire(endpointClass: EndpointClass): Permit {
    const budget = this.budgets[endpointClass];
    const now = this.clock.now();
    let waitMs = this.delayBeforeNext(budget, now);
    if (this.queueFor(endpointClass).length > 0) {
      // Queued callers go first.
      waitMs = Math.max(1, waitMs);
    }
    if (waitMs > 0) {
      throw new QuotaExceededError(endpointClass, now + waitMs);
    }
    return this.issue(budget, now, now);
  }

  /** Folds what the service reported into the local budget. */
  reconcile(endpointClass: EndpointClass, info: RateLimitInfo, rateLimited = false): void {
    const budget = this.budgets[endpointClass];
    const now = this.clock.now();
    if (info.limit !== undefined) budget.remote.limit = info.limit;
    if (info.remaining !== undefined) budget.remote.remaining = info.remaining;
    if (info.resetAtMs !== undefined) budget.remote.resetAt = info.resetAtMs;

    if (info.remaining !== undefined) {
      this.prune(budget, now);
      const localRemaining = budget.capacity - budget.issued.length;
      let padding = Math.min(localRemaining, localRemaining - info.remaining);
      if (padding > 0) {
        // Calls spent elsewhere: count them so they expire when the service resets.
        const resetAt = budget.remote.resetAt;
        const stamp = resetAt !== null ? Math.min(now, resetAt - budget.windowMs) : now;
        while (padding > 0) {
          budget.issued.push(stamp);
          padding -= 1;
        }
        budget.issued.sort((a, b) => a - b);
      }
    }

    if (rateLimited) {
      const until =
        info.retryAfterMs !== undefined
          ? now + info.retryAfterMs
          : info.resetAtMs !== undefined && info.resetAtMs > now
            ? info.resetAtMs
            : now + budget.windowMs;
      budget.blockedUntil = Math.max(budget.blockedUntil, until + this.skewMs);
      budget.remote.remaining = 0;
    }
  }

  snapshot(): QuotaSnapshot[] {
    const now = this.clock.now();
    return Object.values(this.budgets).map((budget) => {
      this.prune(budget, now);
      return {
        endpoint_class: budget.endpointClass,
        capacity: budget.capacity,
        window_ms: budget.windowMs,
        consumed: budget.issued.length,
        window_start: budget.issued[0] ?? null,
        blocked_until: budget.blockedUntil > now ? budget.blockedUntil : null,
        remote_remaining: budget.remote.remaining,
        queued: this.queueFor(budget.endpointClass).length,
      };
    });
  }

  private queueFor(endpointClass: EndpointClass): Waiter[] {
    let queue = this.queues.get(endpointClass);
    if (!queue) {
      queue = [];
      this.queues.set(endpointClass, queue);
    }
    return queue;
  }

  private startPump(endpointClass: EndpointClass): void {
    if (this.pumps.has(endpointClass)) return;
    const controller = new AbortController();
    this.pumps.set(endpointClass, controller);
    this.pump(endpointClass, controller)
      .catch((error: unknown) => {
        for (const waiter of this.queueFor(endpointClass).splice(0)) {
          waiter.detach();
          waiter.reject(error);
        }
      })
      .finally(() => {
        if (this.pumps.get(endpointClass) === controller) this.pumps.delete(endpointClass);
        if (this.queueFor(endpointClass).length > 0) this.startPump(endpointClass);
      });
  }

  private async pump(endpointClass: EndpointClass, controller: AbortController): Promise<void> {
    const budget = this.budgets[endpointClass];
    const queue = this.queueFor(endpointClass);
    while (queue.length > 0 && !controller.signal.aborted) {
      const now = this.clock.now();
      const waitMs = this.delayBeforeNext(budget, now);
      if (waitMs > 0) {
        this.options.onWait?.({ endpointClass, waitMs, queued: queue.length });
        await this.clock.sleep(waitMs, controller.signal);
        continue;
      }
      const waiter = queue.shift();
      if (!waiter) break;
      waiter.detach();
      waiter.resolve(this.issue(budget, now, waiter.enqueuedAt));
    }
  }

  private issue(budget: QuotaBudget, now: number, enqueuedAt: number): Permit {
    budget.issued.push(now);
    budget.lastIssuedAt = now;
    if (budget.remote.remaining !== null && budget.remote.remaining > 0) {
      budget.remote.remaining -= 1;
    }
    return { endpoint_class: budget.endpointClass, issued_at: now, waited_ms: now - enqueuedAt };
  }

  private prune(budget: QuotaBudget, now: number): void {
    while (budget.issued.length > 0 && budget.issued[0] + budget.windowMs <= now) {
      budget.issued.shift();
    }
    if (budget.remote.resetAt !== null && budget.remote.resetAt + this.skewMs <= now) {
      budget.remote = { limit: budget.remote.limit, remaining: null, resetAt: null };
    }
  }

  private delayBeforeNext(budget: QuotaBudget, now: number): number {
    this.prune(budget, now);
    let until = now;

    if (budget.blockedUntil > until) {
      until = budget.blockedUntil;
    }
    if (budget.issued.length >= budget.capacity) {
      const oldestBlocking = budget.issued[budget.issued.length - budget.capacity];
      until = Math.max(until, oldestBlocking + budget.windowMs);
    }
    if (this.minIntervalMs > 0 && budget.lastIssuedAt !== null) {
      until = Math.max(until, budget.lastIssuedAt + this.minIntervalMs);
    }

    const { limit, remaining, resetAt } = budget.remote;
    if (limit !== null && remaining !== null && resetAt !== null && resetAt > now) {
      const margin = Math.floor(limit * this.safetyMarginRatio);
      if (remaining <= 0) {
        until = Math.max(until, resetAt + this.skewMs);
      } else if (remaining <= margin && budget.lastIssuedAt !== null) {
        // Near the reported boundary: spread what is left across the time to reset.
        const pause = Math.ceil((resetAt + this.skewMs - now) / (remaining + 1));
        until = Math.max(until, budget.lastIssuedAt + pause);
      }
    }

    return Math.max(0, until - now);
  }
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("Aborted");
}
