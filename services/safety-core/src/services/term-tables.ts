/**
 * Term Tables
 *
 * Versioned keyword lists for the Layer 1 scanner. A table is validated and
 * deep-frozen on load; changing content means loading a new table and
 * building a new scanner, never editing one in place.
 */

import { z } from 'zod';
import { ConfigurationError, formatIssues } from '../lib/errors';
import { deepFreeze } from '../lib/deep-freeze';
import { loadYamlConfig, parseYamlDocument } from './config-files';

export const TERM_TABLE_FILE = 'term-tables.yaml';

const TermText = z
  .string()
  .trim()
  .min(1)
  .transform((term) => term.toLowerCase())
  .refine((term) => tokenize(term).length > 0, { message: 'Term has no letters or digits' });

export const CautionTermSchema = z.object({
  term: TermText,
  severity: z.union([z.literal(1), z.literal(2), z.literal(3)])
});

export const TermTableSchema = z.object({
  version: z.string().min(1),
  crisis_terms: z.array(TermText).min(1),
  caution_terms: z.array(CautionTermSchema).default([])
});

export type CautionTerm = z.infer<typeof CautionTermSchema>;

export interface TermTable {
  readonly version: string;
  readonly crisis_terms: readonly string[];
  readonly caution_terms: readonly Readonly<CautionTerm>[];
}

const TOKEN = /[a-z0-9]+/g;

/**
 * Split normalized text into match tokens. Apostrophes inside words are
 * dropped first, so `can't` and `cant` are the same token.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().replace(/'/g, '').match(TOKEN) ?? [];
}

/**
 * Validate a parsed document into a frozen table.
 */
export function buildTermTable(document: unknown, source = 'term table'): TermTable {
  const parsed = TermTableSchema.safeParse(document);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.errors);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, issues);
  }

  const crisis = new Set(parsed.data.crisis_terms);
  const clash = parsed.data.caution_terms.find((entry) => crisis.has(entry.term));
  if (clash) {
    throw new ConfigurationError(`Invalid ${source}: "${clash.term}" is listed as both crisis and caution`);
  }

  return deepFreeze({
    version: parsed.data.version,
    crisis_terms: [...crisis].sort(),
    caution_terms: parsed.data.caution_terms
  });
}

export function parseTermTable(raw: string, source = 'term table'): TermTable {
  return buildTermTable(parseYamlDocument(raw, source), source);
}

export function loadTermTable(overridePath?: string): TermTable {
  const { path, document } = loadYamlConfig(TERM_TABLE_FILE, overridePath);
  return buildTermTable(document, path);
}
