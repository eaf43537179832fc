import type { FailKind, MissionPhase } from "./types";

export class ScoutError extends Error {
  readonly kind: FailKind;
  readonly context: Record<string, unknown>;

  constructor(kind: FailKind, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.context = context;
  }
}

export class InvalidInputError extends ScoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("INVALID_INPUT", message, context);
  }
}

export class ConfigurationError extends ScoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, context);
  }
}

// Raised only by local bookkeeping; the scheduler turns it into a wait.
export class QuotaExceededError extends ScoutError {
  readonly retryAtMs: number;

  constructor(endpointClass: string, retryAtMs: number) {
    super("QUOTA_EXCEEDED", `Quota exhausted for ${endpointClass}`, { endpointClass, retryAtMs });
    this.retryAtMs = retryAtMs;
  }
}

export class UpstreamUnavailableError extends ScoutError {
  readonly status?: number;

  constructor(message: string, context: { endpoint: string; repo?: string; status?: number }) {
    super("UPSTREAM_UNAVAILABLE", message, context);
    this.status = context.status;
  }
}

export class TimeoutError extends ScoutError {
  constructor(phase: MissionPhase, budgetMs: number) {
    super("TIMEOUT", `Phase ${phase} exceeded its ${budgetMs}ms budget`, { phase, budgetMs });
  }
}

export class PersistenceError extends ScoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("PERSISTENCE_ERROR", message, context);
  }
}

export class CancelledError extends ScoutError {
  constructor(phase: MissionPhase) {
    super("CANCELLED", `Mission cancelled before phase ${phase}`, { phase });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
