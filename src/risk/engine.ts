import { clauseStarts, findPhrase, normalize } from '../data/parser';
import { AllergenMatch } from '../match/matcher';
import { Span } from '../match/similarity';

export type Severity = 'low' | 'medium' | 'high';

export interface AssessedMatch extends AllergenMatch {
  displayName: string;
  severity: Severity;
  reasons: string[];
}

export interface RiskAssessment {
  precautionary: boolean;
  highCount: number;
  mediumCount: number;
  lowCount: number;
  items: AssessedMatch[];
}

export interface AssessOptions {
  precautionaryPhrases: readonly string[];
  displayName?: (allergen: string) => string;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2
};

const SEVERITY_LABEL: Record<Severity, string> = {
  high: 'High risk',
  medium: 'Medium risk (precautionary statement)',
  low: 'Low risk (declared free from)'
};

const FREE_FROM_PREFIXES = ['free from ', 'free of '];
const FREE_FROM_SUFFIX = ' free';

interface Clause {
  start: number;
  /** Offset of the first precautionary phrase in this clause, or -1. */
  precautionAt: number;
}

function isFreeFrom(text: string, span: Span): boolean {
  const before = text.slice(0, span.start);
  if (FREE_FROM_PREFIXES.some((prefix) => before.endsWith(prefix))) {
    return true;
  }
  const after = text.slice(span.end);
  return after.startsWith(FREE_FROM_SUFFIX) && (after.length === FREE_FROM_SUFFIX.length || after[FREE_FROM_SUFFIX.length] === ' ');
}

function firstPrecaution(clause: string, phrases: readonly string[]): number {
  let first = -1;
  for (const phrase of phrases) {
    const at = findPhrase(clause, phrase);
    if (at >= 0 && (first < 0 || at < first)) {
      first = at;
    }
  }
  return first;
}

function locateClauses(rawText: string, text: string, phrases: readonly string[]): Clause[] {
  const starts = clauseStarts(rawText);
  return starts.map((start, index) => {
    const end = index + 1 < starts.length ? starts[index + 1] - 1 : text.length;
    const at = firstPrecaution(text.slice(start, end), phrases);
    return { start, precautionAt: at < 0 ? -1 : start + at };
  });
}

function clauseAt(clauses: Clause[], offset: number): Clause | undefined {
  let found: Clause | undefined;
  for (const clause of clauses) {
    if (clause.start > offset) {
      break;
    }
    found = clause;
  }
  return found;
}

function classifySpan(text: string, span: Span, clauses: Clause[]): { severity: Severity; reason: string } {
  const matched = text.slice(span.start, span.end);
  if (isFreeFrom(text, span)) {
    return { severity: 'low', reason: `Label declares it free from "${matched}".` };
  }
  const clause = clauseAt(clauses, span.start);
  if (clause && clause.precautionAt >= 0 && span.start > clause.precautionAt) {
    return { severity: 'medium', reason: `"${matched}" is named in a precautionary statement.` };
  }
  return { severity: 'high', reason: `"${matched}" is listed as an ingredient.` };
}

function evaluateMatch(text: string, found: AllergenMatch, clauses: Clause[], options: AssessOptions): AssessedMatch {
  const reasons: string[] = [];
  let severity: Severity = 'low';

  for (const hit of found.hits) {
    for (const span of hit.spans) {
      const classified = classifySpan(text, span, clauses);
      reasons.push(classified.reason);
      if (SEVERITY_ORDER[classified.severity] > SEVERITY_ORDER[severity]) {
        severity = classified.severity;
      }
    }
  }

  return {
    ...found,
    displayName: options.displayName?.(found.allergen) ?? found.allergen,
    severity,
    reasons: Array.from(new Set(reasons))
  };
}

/**
 * Grade each match by where its hits sit on the label. A precautionary
 * phrase only covers the rest of its own sentence or line. `rawText` must be
 * the text the matches were produced from, since hit offsets refer to its
 * normalized form.
 */
export function assessMatches(rawText: string, matches: AllergenMatch[], options: AssessOptions): RiskAssessment {
  const text = normalize(rawText);
  const clauses = locateClauses(rawText, text, options.precautionaryPhrases);
  const items = matches.map((found) => evaluateMatch(text, found, clauses, options));

  let highCount = 0;
  let mediumCount = 0;
  let lowCount = 0;

  for (const item of items) {
    if (item.severity === 'high') {
      highCount += 1;
    } else if (item.severity === 'medium') {
      mediumCount += 1;
    } else {
      lowCount += 1;
    }
  }

  return {
    precautionary: clauses.some((clause) => clause.precautionAt >= 0),
    highCount,
    mediumCount,
    lowCount,
    items
  };
}

export function summarize(assessment: RiskAssessment, profile: ReadonlySet<string>): string {
  if (assessment.items.length === 0) {
    return 'No allergens detected.';
  }

  const relevant = assessment.items.filter((item) => profile.has(item.allergen));
  if (relevant.length === 0) {
    return 'No allergens in your profile detected.';
  }

  const lines: string[] = [];
  for (const severity of ['high', 'medium', 'low'] as const) {
    const names = relevant.filter((item) => item.severity === severity).map((item) => item.displayName);
    if (names.length > 0) {
      lines.push(`${SEVERITY_LABEL[severity]}: ${names.join(', ')}`);
    }
  }
  return lines.join('\n');
}
