import type { ScoredCandidate } from "./types";

const README_SNIPPET_CHARS = 600;

function safeExcerpt(text: string | null, maxChars: number): string {
  if (!text) return "";
  const compact = text.replace(/\s+/g, " ").trim();
  return compact.length > maxChars ? `${compact.slice(0, maxChars)}…` : compact;
}

function compactSource(candidate: ScoredCandidate): object {
  const { record, scores } = candidate;
  return {
    name: record.full_name,
    url: record.html_url,
    description: record.description,
    language: record.language,
    stars: record.stargazers_count,
    concepts: record.concepts,
    readme_excerpt: safeExcerpt(record.signals.readme_excerpt, README_SNIPPET_CHARS),
    gem_score: Number(scores.composite.toFixed(4)),
  };
}

export function buildRefinePrompts(goal: string, selection: ScoredCandidate[]): { systemPrompt: string; userPrompt: string } {
  return {
    systemPrompt: [
      "You are a product strategist combining ideas from small, recently active open-source projects.",
      "Output must be valid JSON only. No markdown, no explanations.",
      "Only reference projects listed in sources; never invent repositories.",
      "Every concept must name a concrete problem and a concrete solution.",
    ].join(" "),
    userPrompt: JSON.stringify(
      {
        task: "Recombine the sources into one project that serves the goal.",
        goal: goal || "Find an original project worth building from these sources.",
        sources: selection.map(compactSource),
        output_template: {
          project: { name: "string", tagline: "string", vision: "string" },
          concepts: [{ problem: "string", solution: "string", why_it_works: ["string"] }],
        },
      },
      null,
      2,
    ),
  };
}
