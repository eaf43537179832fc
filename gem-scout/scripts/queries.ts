const DAY_MS = 24 * 60 * 60 * 1000;

/** Named shortcuts accepted in place of a topic. `{date}` is replaced with the push cutoff. */
export const QUERY_PRESETS: Record<string, string> = {
  "vector-rust": "pushed:>{date} language:Rust topic:vector",
  mamba: "pushed:>{date} language:Python topic:mamba",
  "gpu-kernel": "pushed:>{date} language:C++ topic:cuda",
  streaming: "pushed:>{date} language:TypeScript topic:webtransport",
};

export interface QueryOptions {
  sinceDays: number;
  longTail: { enabled: boolean; maxStars: number };
  requireLicense: boolean;
  now?: number;
}

export function sinceDate(sinceDays: number, now = Date.now()): string {
  return new Date(now - sinceDays * DAY_MS).toISOString().slice(0, 10);
}

export function buildTopicQuery(topic: string, options: QueryOptions): string {
  const term = topic.trim();
  const date = sinceDate(options.sinceDays, options.now);
  const preset = QUERY_PRESETS[term];
  const base = preset
    ? preset.replace("{date}", date)
    : `pushed:>${date} ${/\s/.test(term) ? `"${term}"` : term} in:name,description,readme`;

  if (options.longTail.enabled) {
    return `${base} stars:<${options.longTail.maxStars} forks:<2 fork:false archived:false`;
  }
  return options.requireLicense ? `${base} has:license` : base;
}

/** One query per non-blank topic, in input order, without repeats. */
export function buildQueries(topics: string[], options: QueryOptions): Array<{ topic: string; query: string }> {
  const seen = new Set<string>();
  const out: Array<{ topic: string; query: string }> = [];
  for (const raw of topics) {
    const topic = raw.trim();
    if (!topic || seen.has(topic)) continue;
    seen.add(topic);
    out.push({ topic, query: buildTopicQuery(topic, options) });
  }
  return out;
}
