import { distance as levenshtein } from 'fastest-levenshtein';

import { foldOcrSlips, Token, tokenize } from '../data/parser';

/** Cost of an edit that folding OCR slips (0/O, 1/I/L, 5/S) explains. */
export const SLIP_EDIT_COST = 0.4;

/** Cost of any other edit. */
export const PLAIN_EDIT_COST = 2;

/** Aliases shorter than this (ignoring spaces) only match exactly, as whole words. */
export const MIN_FUZZY_LENGTH = 4;

// Scripts written without spaces between words
const REG_UNSPACED_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]/u;

export interface Span {
  start: number;
  end: number;
}

export interface WindowMatch extends Span {
  score: number;
  matched: string;
  /** Every place the alias scored `score`; `start`/`end` is the first. */
  spans: Span[];
}

export function roundScore(score: number): number {
  return Math.round(score * 1000) / 1000;
}

/**
 * Edit-distance similarity in [0, 1]. Edits that only differ by an OCR slip
 * are cheap, others are expensive. Only identical strings reach 1.
 */
export function similarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }

  const longest = Math.max(a.length, b.length);
  const edits = levenshtein(a, b);
  const plainEdits = levenshtein(foldOcrSlips(a), foldOcrSlips(b));
  const cost = (edits - plainEdits) * SLIP_EDIT_COST + plainEdits * PLAIN_EDIT_COST;
  return Math.min(roundScore(Math.max(0, 1 - cost / longest)), 0.999);
}

function isShort(alias: string): boolean {
  return alias.replace(/ /g, '').length < MIN_FUZZY_LENGTH;
}

// E-codes and numbers one digit apart name different things
function hasCode(alias: string): boolean {
  return tokenize(alias).some((token) => token.type !== 'word');
}

function joinsWord(char: string): boolean {
  return char !== '' && char !== ' ' && !REG_UNSPACED_SCRIPT.test(char);
}

function exactSpans(alias: string, text: string, wholeWord: boolean): Span[] {
  const spans: Span[] = [];
  for (let at = text.indexOf(alias); at >= 0; at = text.indexOf(alias, at + 1)) {
    const end = at + alias.length;
    if (wholeWord && (joinsWord(text.charAt(at - 1)) || joinsWord(text.charAt(end)))) {
      continue;
    }
    spans.push({ start: at, end });
  }
  return spans;
}

/**
 * Best location of `alias` in the normalized text. Exact containment wins
 * outright; otherwise every run of as many tokens as the alias has is scored
 * and the best runs are returned.
 */
export function bestWindow(alias: string, text: string, tokens: Token[]): WindowMatch | undefined {
  if (!alias || !text) {
    return undefined;
  }

  const short = isShort(alias);
  const exact = exactSpans(alias, text, short);
  if (exact.length > 0) {
    return { score: 1, matched: alias, start: exact[0].start, end: exact[0].end, spans: exact };
  }

  if (short || hasCode(alias)) {
    return undefined;
  }

  const width = alias.split(' ').length;
  let best: WindowMatch | undefined;

  for (let i = 0; i + width <= tokens.length; i++) {
    const span = { start: tokens[i].start, end: tokens[i + width - 1].end };
    const matched = text.slice(span.start, span.end);
    const score = similarity(alias, matched);
    if (!best || score > best.score) {
      best = { score, matched, ...span, spans: [span] };
    } else if (score === best.score) {
      best.spans.push(span);
    }
  }

  return best;
}
