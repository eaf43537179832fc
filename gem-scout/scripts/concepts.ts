import { readFileSync } from "node:fs";
import { z } from "zod";

const MAX_CONCEPT_CHARS = 40;
const BIGRAM_WEIGHT = 1.5;

let stopwords: Set<string> | undefined;

function loadStopwords(): Set<string> {
  if (!stopwords) {
    const raw: unknown = JSON.parse(readFileSync(new URL("../config/stopwords.json", import.meta.url), "utf-8"));
    stopwords = new Set(z.array(z.string()).parse(raw));
  }
  return stopwords;
}

function tokenize(text: string, stop: Set<string>): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s\-+#./]/gu, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0 && !stop.has(token) && !/^\d+$/.test(token));
}

/**
 * Keyword heuristic over free text: unigrams and adjacent bigrams that occur at
 * least twice, bigrams weighted higher, highest first.
 */
export function extractConcepts(text: string, topK = 8): string[] {
  const stop = loadStopwords();
  const tokens = tokenize(text, stop);

  const unigrams = new Map<string, number>();
  for (const token of tokens) {
    unigrams.set(token, (unigrams.get(token) ?? 0) + 1);
  }
  const bigrams = new Map<string, number>();
  for (let i = 0; i < tokens.length - 1; i += 1) {
    const phrase = `${tokens[i]} ${tokens[i + 1]}`;
    bigrams.set(phrase, (bigrams.get(phrase) ?? 0) + 1);
  }

  const phrases: Array<[string, number]> = [];
  for (const [phrase, count] of bigrams) {
    if (count >= 2) phrases.push([phrase, count * BIGRAM_WEIGHT]);
  }
  for (const [token, count] of unigrams) {
    if (count >= 2) phrases.push([token, count]);
  }
  phrases.sort((a, b) => b[1] - a[1]);

  const out: string[] = [];
  for (const [phrase] of phrases) {
    if (out.length >= topK) break;
    const clipped = phrase.slice(0, MAX_CONCEPT_CHARS);
    if (!out.includes(clipped)) out.push(clipped);
  }
  return out;
}

/** Repository topics first, then extracted concepts, lower-cased and without repeats. */
export function mergeConcepts(topics: string[], extracted: string[], limit = 12): string[] {
  const out: string[] = [];
  for (const value of [...topics, ...extracted]) {
    const concept = value.trim().toLowerCase();
    if (concept && !out.includes(concept)) out.push(concept);
    if (out.length >= limit) break;
  }
  return out;
}
