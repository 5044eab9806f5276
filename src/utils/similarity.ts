import {entryKey, type Catalog} from "../runtime/catalog.js";
import {CAPABILITY_CATEGORIES} from "../types/mcp.js";

const STOP_WORDS = new Set(["the", "and", "for", "with", "what", "which", "are", "from", "that", "this", "you", "can", "please", "all", "about"]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

export function levenshtein(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  let previous = Array.from({length: b.length + 1}, (_value, index) => index);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/** 1 for identical strings, 0 for nothing in common. Case-insensitive. */
export function similarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - levenshtein(left, right) / longest;
}

/** Share of the target's tokens that also occur in the candidate. */
export function tokenOverlap(target: string, candidate: string): number {
  const wanted = new Set(tokenize(target));
  if (wanted.size === 0) {
    return 0;
  }
  const available = new Set(tokenize(candidate));
  let shared = 0;
  for (const token of wanted) {
    if (available.has(token)) {
      shared += 1;
    }
  }
  return shared / wanted.size;
}

/**
 * Closest names to a misspelled or invented one, best first. Used to
 * suggest alternatives when the classifier names a capability that does
 * not exist.
 */
export function nearestNames(target: string, names: readonly string[], limit = 3, threshold = 0.4): string[] {
  return names
    .map((name, order) => ({name, order, score: Math.max(similarity(target, name), tokenOverlap(target, name))}))
    .filter((candidate) => candidate.score >= threshold)
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, limit)
    .map((candidate) => candidate.name);
}

/**
 * Capabilities whose name or description shares words with a free-text
 * query, best first.
 */
export function nearestCapabilities(query: string, catalog: Catalog, limit = 3): string[] {
  const words = new Set(tokenize(query).filter((token) => token.length > 2 && !STOP_WORDS.has(token)));
  if (words.size === 0) {
    return [];
  }

  const scored: Array<{name: string; order: number; score: number}> = [];
  for (const category of CAPABILITY_CATEGORIES) {
    for (const entry of catalog.list(category)) {
      const haystack = new Set(tokenize(`${entryKey(entry)} ${entry.description}`));
      let score = 0;
      for (const word of words) {
        if (haystack.has(word)) {
          score += 1;
        }
      }
      if (score > 0) {
        scored.push({name: entryKey(entry), order: scored.length, score});
      }
    }
  }

  return scored
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, limit)
    .map((candidate) => candidate.name);
}
