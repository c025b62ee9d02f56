export type TokenType = 'ecode' | 'number' | 'word';

export interface Token {
  raw: string;
  start: number;
  end: number;
  type: TokenType;
}

// E 322, E-322, E0322, INS 322 -> e322
export const REG_ADDITIVE = /\b(?:e|ins)[\s-]*0*(\d{3,4})([a-z])?\b/g;

const REG_ECODE_TOKEN = /^e\d{3,4}[a-z]?$/;
const REG_NUMBER_TOKEN = /^\d+$/;

const OCR_SLIPS: Record<string, string> = {
  o: '0',
  i: '1',
  l: '1',
  s: '5'
};

// Sentence ends, and line breaks unless the line ends mid-list (, : & -)
const REG_CLAUSE_BREAK = /[.!?;]+(?=\s|$)|(?<![,:&-][ \t\r]*)\n/;
const REG_SEPARATORS = /[^\p{L}\p{N}]+/gu;

function prepare(input: string): string {
  return input
    .normalize('NFKD')
    .toLowerCase()
    .replace(/\p{M}/gu, '')
    .replace(/\u200B/g, '')
    .replace(REG_ADDITIVE, (_match, digits: string, suffix: string | undefined) => ` e${digits}${suffix ?? ''} `);
}

function collapse(value: string): string {
  return value.replace(REG_SEPARATORS, ' ').trim();
}

export function normalize(input: string): string {
  return collapse(prepare(input));
}

/**
 * Offsets in `normalize(input)` where each sentence or line of `input`
 * begins. Always starts with 0 unless the text normalizes to nothing.
 */
export function clauseStarts(input: string): number[] {
  const starts: number[] = [];
  let offset = 0;

  for (const clause of prepare(input).split(REG_CLAUSE_BREAK)) {
    const part = collapse(clause);
    if (part) {
      starts.push(offset);
      offset += part.length + 1;
    }
  }

  return starts;
}

function classify(raw: string): TokenType {
  if (REG_ECODE_TOKEN.test(raw)) {
    return 'ecode';
  }
  if (REG_NUMBER_TOKEN.test(raw)) {
    return 'number';
  }
  return 'word';
}

/** Expects text that already went through `normalize`. */
export function tokenize(normalized: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  for (const raw of normalized.split(' ')) {
    if (raw) {
      tokens.push({ raw, start: offset, end: offset + raw.length, type: classify(raw) });
    }
    offset += raw.length + 1;
  }

  return tokens;
}

// Helper for OCR slips like 0↔O, 1↔I↔L, S↔5
export function foldOcrSlips(value: string): string {
  let folded = '';
  for (const char of value) {
    folded += OCR_SLIPS[char] ?? char;
  }
  return folded;
}

/** First word-aligned offset of `phrase` in `normalized`, or -1. */
export function findPhrase(normalized: string, phrase: string): number {
  const needle = normalize(phrase);
  if (!needle) {
    return -1;
  }

  let from = 0;
  while (from <= normalized.length) {
    const at = normalized.indexOf(needle, from);
    if (at < 0) {
      return -1;
    }
    const end = at + needle.length;
    const startsWord = at === 0 || normalized[at - 1] === ' ';
    const endsWord = end === normalized.length || normalized[end] === ' ';
    if (startsWord && endsWord) {
      return at;
    }
    from = at + 1;
  }

  return -1;
}
