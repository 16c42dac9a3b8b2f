/**
 * Text Normalizer
 *
 * Folds obfuscated spellings onto plain lowercase ASCII before any matching
 * runs, so `K1ll`, `ⓚⓘⓛⓛ`, `k.i.l.l` and `k<ZWSP>ill` all scan as `kill`.
 *
 * Normalization only merges variants of the same text: it never deletes
 * letters or digits, and it never rewrites sentence punctuation.
 *
 * Joining spaced-out letters loses the word gaps (`k i l l m y s e l f`
 * becomes `killmyself`), so the tokens built that way are reported alongside
 * the text for the scanner's compacted matching.
 */

import { createLogger, errorMessage } from '../lib/logger';

const log = createLogger('TextNormalizer');

// =============================================================================
// Character Tables
// =============================================================================

const INVISIBLE_CHARS = /[\u200b\u200c\u200d\u2060\ufeff\u00ad]/g;

const SINGLE_QUOTES = /[\u2018\u2019\u201a\u201b\u2032\u02bc`\u00b4]/g;
const DOUBLE_QUOTES = /[\u201c\u201d\u201e\u201f\u2033]/g;

/** [first code point, last code point, ASCII base] */
const STYLED_LETTER_RANGES: ReadonlyArray<readonly [number, number, number]> = [
  [0x1d400, 0x1d419, 0x41], // mathematical bold
  [0x1d41a, 0x1d433, 0x61],
  [0x1d434, 0x1d44d, 0x41], // mathematical italic
  [0x1d44e, 0x1d467, 0x61],
  [0x1d538, 0x1d551, 0x41], // double-struck
  [0x1d552, 0x1d56b, 0x61],
  [0x24b6, 0x24cf, 0x41], // circled
  [0x24d0, 0x24e9, 0x61],
  [0xff21, 0xff3a, 0x41], // fullwidth
  [0xff41, 0xff5a, 0x61]
];

// Cyrillic and Greek letters that render like Latin ones
const HOMOGLYPHS: Readonly<Record<string, string>> = {
  'а': 'a', 'в': 'b', 'е': 'e', 'к': 'k', 'м': 'm', 'н': 'h', 'о': 'o', 'р': 'p',
  'с': 'c', 'т': 't', 'у': 'y', 'х': 'x', 'і': 'i', 'ј': 'j', 'ѕ': 's', 'ӏ': 'l',
  'α': 'a', 'β': 'b', 'ε': 'e', 'ι': 'i', 'κ': 'k', 'ν': 'v', 'ο': 'o', 'ρ': 'p',
  'τ': 't', 'υ': 'u', 'χ': 'x'
};

const LEET_MAP: Readonly<Record<string, string>> = {
  '0': 'o',
  '1': 'i',
  '3': 'e',
  '4': 'a',
  '5': 's',
  '7': 't',
  '8': 'b',
  '9': 'g',
  '@': 'a',
  '$': 's',
  '!': 'i',
  '+': 't',
  '|': 'l'
};

const COMBINING_MARKS = /\p{M}/gu;

// Three or more single characters split by separators: k.i.l.l, k-i-l-l, k i l l
const SEPARATED_SINGLES =
  /(?<![a-z0-9@$!])[a-z0-9@$!](?:(?:[.\-_*]+|\s+)[a-z0-9@$!]){2,}(?![a-z0-9@$!])/g;
const SEPARATORS = /[.\-_*\s]+/g;

const LEET_RUN = /[0-9@$!+|]+/g;
const PUNCTUATION_LEET = /[!+|]/;
const LETTER = /[a-z]/;

// =============================================================================
// Steps
// =============================================================================

function stripInvisible(text: string): string {
  return text.replace(INVISIBLE_CHARS, '');
}

function foldQuotes(text: string): string {
  return text.replace(SINGLE_QUOTES, "'").replace(DOUBLE_QUOTES, '"');
}

function foldStyledLetters(text: string): string {
  let result = '';
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    const range = STYLED_LETTER_RANGES.find(([start, end]) => codePoint >= start && codePoint <= end);
    if (range) {
      result += String.fromCharCode(range[2] + (codePoint - range[0]));
      continue;
    }
    result += HOMOGLYPHS[char.toLowerCase()] ?? char;
  }
  return result.normalize('NFKD').replace(COMBINING_MARKS, '');
}

function mergeSeparatedSingles(text: string, merged: string[]): string {
  return text.replace(SEPARATED_SINGLES, (run) => {
    if (!LETTER.test(run)) {
      return run;
    }
    const joined = run.replace(SEPARATORS, '');
    merged.push(joined);
    return joined;
  });
}

function isLetter(char: string | undefined): boolean {
  return char !== undefined && LETTER.test(char);
}

function mapLeetspeak(text: string): string {
  return text.replace(LEET_RUN, (run: string, offset: number) => {
    const before = isLetter(text[offset - 1]);
    const after = isLetter(text[offset + run.length]);

    // `die!` keeps its exclamation mark; `d!e` does not
    const inWord = PUNCTUATION_LEET.test(run) ? before && after : before || after;
    if (!inWord) {
      return run;
    }

    let mapped = '';
    for (const char of run) {
      mapped += LEET_MAP[char] ?? char;
    }
    return mapped;
  });
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// =============================================================================
// Public API
// =============================================================================

export interface NormalizedText {
  text: string;
  /** Tokens joined from separated letters, leetspeak already mapped */
  merged_runs: string[];
}

export type Normalizer = (text: string) => NormalizedText;

/**
 * Normalize raw message text for scanning. Pure and deterministic.
 */
export function normalizeText(text: string): NormalizedText {
  if (!text) {
    return { text: '', merged_runs: [] };
  }

  const merged: string[] = [];
  let result = stripInvisible(text);
  result = foldQuotes(result);
  result = foldStyledLetters(result);
  result = result.toLowerCase();
  result = mergeSeparatedSingles(result, merged);
  result = mapLeetspeak(result);

  return {
    text: collapseWhitespace(result),
    merged_runs: [...new Set(merged.map(mapLeetspeak))]
  };
}

export function normalize(text: string): string {
  return normalizeText(text).text;
}

export interface NormalizationOutcome extends NormalizedText {
  error?: string;
}

/**
 * Normalize, or fall back to the lowercased raw text so scanning still runs.
 * The caller floors the decision when `error` is set.
 */
export function safeNormalize(text: string, normalizer: Normalizer = normalizeText): NormalizationOutcome {
  try {
    return normalizer(text);
  } catch (error: unknown) {
    const message = errorMessage(error);
    log.error('Normalization failed, scanning raw text', { error: message });
    return { text: collapseWhitespace(text.toLowerCase()), merged_runs: [], error: message };
  }
}
