import type { ScoutEvent } from "./types";

const MAX_EVENTS = 2000;

function truncate(value: string, maxChars = 200): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, maxChars)}…`;
}

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return (
    normalized.includes("api_key") ||
    normalized.includes("apikey") ||
    normalized.includes("authorization") ||
    normalized.includes("token") ||
    normalized.includes("prompt") ||
    normalized === "readme_excerpt" ||
    normalized === "embedding"
  );
}

export function safeData(input: unknown): Record<string, unknown> | undefined {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return undefined;
  }

  const sanitize = (value: unknown, depth: number): unknown => {
    if (depth > 3) {
      return "[truncated-depth]";
    }
    if (typeof value === "string") {
      return truncate(value);
    }
    if (typeof value === "number" || typeof value === "boolean" || value === null) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.slice(0, 20).map((item) => sanitize(item, depth + 1));
    }
    if (typeof value === "object") {
      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value)) {
        out[key] = isSensitiveKey(key) ? "[redacted]" : sanitize(child, depth + 1);
      }
      return out;
    }
    return String(value);
  };

  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(input)) {
    out[key] = isSensitiveKey(key) ? "[redacted]" : sanitize(child, 1);
  }
  return out;
}

export interface ScoutLogger {
  log: (event: Omit<ScoutEvent, "ts" | "run_id">) => void;
  getEvents: () => ScoutEvent[];
}

export function createLogger(runId: string, previous: ScoutEvent[] = []): ScoutLogger {
  const events: ScoutEvent[] = [...previous];

  return {
    log(event) {
      events.push({
        ts: new Date().toISOString(),
        run_id: runId,
        node: event.node,
        repo: event.repo ?? null,
        level: event.level,
        event: event.event,
        data: safeData(event.data),
      });
      if (events.length > MAX_EVENTS) {
        events.splice(0, events.length - MAX_EVENTS);
      }
    },
    getEvents() {
      return [...events];
    },
  };
}
