import { normalize, tokenize, Token } from '../data/parser';
import { AllergenCatalog } from '../data/types';
import { bestWindow, Span } from './similarity';

export const DEFAULT_THRESHOLD = 0.8;

export interface MatchHit {
  /** Alias as written in the catalog. */
  term: string;
  score: number;
  /** Substring of the normalized text the alias was found at. */
  matched: string;
  start: number;
  end: number;
  /** Every location the alias reached `score` at, first one included. */
  spans: Span[];
}

export interface AllergenMatch {
  allergen: string;
  hits: MatchHit[];
  maxScore: number;
}

function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function byScoreThenTerm(a: MatchHit, b: MatchHit): number {
  return b.score - a.score || compareStrings(a.term, b.term);
}

function byMaxScoreThenName(a: AllergenMatch, b: AllergenMatch): number {
  return b.maxScore - a.maxScore || compareStrings(a.allergen, b.allergen);
}

function matchAllergen(
  allergen: string,
  aliases: readonly string[],
  text: string,
  tokens: Token[],
  threshold: number
): AllergenMatch | undefined {
  const seen = new Set<string>();
  const hits: MatchHit[] = [];

  for (const term of aliases) {
    const alias = normalize(term);
    if (!alias || seen.has(alias)) {
      continue;
    }
    seen.add(alias);

    const window = bestWindow(alias, text, tokens);
    if (window && window.score >= threshold) {
      hits.push({ term, ...window });
    }
  }

  if (hits.length === 0) {
    return undefined;
  }

  hits.sort(byScoreThenTerm);
  return { allergen, hits, maxScore: hits[0].score };
}

/**
 * Score every catalog alias against noisy label text and return the allergens
 * with at least one hit at or above `threshold`, strongest first.
 */
export function match(rawText: string, catalog: AllergenCatalog, threshold: number = DEFAULT_THRESHOLD): AllergenMatch[] {
  if (Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
    throw new RangeError(`threshold must be within [0, 1], got ${threshold}`);
  }

  const text = normalize(rawText);
  if (!text) {
    return [];
  }
  const tokens = tokenize(text);

  const matches: AllergenMatch[] = [];
  for (const [allergen, aliases] of catalog) {
    const found = matchAllergen(allergen, aliases, text, tokens, threshold);
    if (found) {
      matches.push(found);
    }
  }

  return matches.sort(byMaxScoreThenName);
}

/** Matches the profile declares, in their original order. */
export function filterByProfile<T extends AllergenMatch>(matches: T[], profile: ReadonlySet<string>): T[] {
  return matches.filter((found) => profile.has(found.allergen));
}
