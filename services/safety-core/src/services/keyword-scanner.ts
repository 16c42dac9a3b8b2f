/**
 * Keyword Scanner (Layer 1)
 *
 * Deterministic multi-term matching over normalized text. Any crisis term
 * scores 1.0; caution terms score by summed severity up to a ceiling.
 * Matching is on whole tokens, so `cut` never fires inside `cute`.
 *
 * Tokens the normalizer joined from spaced-out letters have lost their word
 * gaps. Crisis terms are also matched in compacted form (`killmyself`) across
 * those tokens; a compacted match must touch a joined token and may only
 * start or end mid-token inside one.
 */

import { AhoCorasickAutomaton } from '../lib/aho-corasick';
import { roundScore } from '../lib/scores';
import { tokenize, type TermTable } from './term-tables';
import type { KeywordScanResult, MarkerSeverity, TermKind } from '../types/risk';

export interface CautionScoring {
  base: number;
  step: number;
  ceiling: number;
}

export const DEFAULT_CAUTION_SCORING: CautionScoring = {
  base: 0.3,
  step: 0.05,
  ceiling: 0.9
};

interface TermEntry {
  term: string;
  kind: TermKind;
  severity: MarkerSeverity;
}

interface CompactedTerm {
  term: string;
  compact: string;
}

// `kms` only ever matches as a whole token
const MIN_COMPACT_LENGTH = 4;

function compactTokens(tokens: readonly string[]): { compact: string; starts: number[] } {
  const starts: number[] = [];
  let compact = '';
  for (const token of tokens) {
    starts.push(compact.length);
    compact += token;
  }
  return { compact, starts };
}

function tokenIndexAt(starts: readonly number[], offset: number): number {
  let index = 0;
  while (index + 1 < starts.length && starts[index + 1] <= offset) {
    index++;
  }
  return index;
}

export class KeywordScanner {
  private readonly automaton = new AhoCorasickAutomaton<TermEntry>();
  private readonly compactedCrisisTerms: CompactedTerm[] = [];

  constructor(
    private readonly table: TermTable,
    private readonly scoring: CautionScoring = DEFAULT_CAUTION_SCORING
  ) {
    for (const term of table.crisis_terms) {
      const tokens = tokenize(term);
      this.automaton.addPattern(tokens, { term, kind: 'crisis', severity: 3 });
      const compact = tokens.join('');
      if (compact.length >= MIN_COMPACT_LENGTH) {
        this.compactedCrisisTerms.push({ term, compact });
      }
    }
    for (const entry of table.caution_terms) {
      this.automaton.addPattern(tokenize(entry.term), { term: entry.term, kind: 'caution', severity: entry.severity });
    }
  }

  get termTableVersion(): string {
    return this.table.version;
  }

  /**
   * @param mergedRuns tokens the normalizer joined from separated letters
   */
  scan(normalizedText: string, mergedRuns: readonly string[] = []): KeywordScanResult {
    const crisis = new Set<string>();
    const caution = new Map<string, number>();
    const tokens = tokenize(normalizedText);

    for (const term of this.matchCompacted(tokens, mergedRuns)) {
      crisis.add(term);
    }

    for (const match of this.automaton.search(tokens)) {
      if (match.data.kind === 'crisis') {
        crisis.add(match.data.term);
      } else {
        const previous = caution.get(match.data.term) ?? 0;
        caution.set(match.data.term, Math.max(previous, match.data.severity));
      }
    }

    const crisisMatches = [...crisis].sort();
    const cautionMatches = [...caution.keys()].sort();

    return {
      matched: [...new Set([...crisisMatches, ...cautionMatches])].sort(),
      crisis_matches: crisisMatches,
      caution_matches: cautionMatches,
      layer_score: this.score(crisisMatches.length, caution),
      term_table_version: this.table.version
    };
  }

  private matchCompacted(tokens: readonly string[], mergedRuns: readonly string[]): string[] {
    const joined = new Set(mergedRuns.flatMap((run) => tokenize(run)));
    const isJoined = tokens.map((token) => joined.has(token));
    if (!isJoined.includes(true)) {
      return [];
    }

    const { compact, starts } = compactTokens(tokens);
    const found: string[] = [];

    for (const { term, compact: needle } of this.compactedCrisisTerms) {
      let offset = compact.indexOf(needle);
      while (offset !== -1) {
        const end = offset + needle.length;
        const first = tokenIndexAt(starts, offset);
        const last = tokenIndexAt(starts, end - 1);

        const cleanStart = starts[first] === offset || isJoined[first];
        const cleanEnd = starts[last] + tokens[last].length === end || isJoined[last];
        const touchesJoined = isJoined.slice(first, last + 1).includes(true);

        if (cleanStart && cleanEnd && touchesJoined) {
          found.push(term);
          break;
        }
        offset = compact.indexOf(needle, offset + 1);
      }
    }

    return found;
  }

  private score(crisisCount: number, caution: Map<string, number>): number {
    if (crisisCount > 0) {
      return 1.0;
    }
    if (caution.size === 0) {
      return 0;
    }

    let severityTotal = 0;
    for (const severity of caution.values()) {
      severityTotal += severity;
    }
    return roundScore(Math.min(this.scoring.ceiling, this.scoring.base + this.scoring.step * severityTotal));
  }
}
