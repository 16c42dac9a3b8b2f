/**
 * Clinical pattern libraries for the Layer 2 analyzer (PHQ-9 / GAD-7).
 * Loaded from YAML, validated, and deep-frozen like term tables.
 */

import { z } from 'zod';
import { ConfigurationError, formatIssues } from '../lib/errors';
import { deepFreeze } from '../lib/deep-freeze';
import { loadYamlConfig, parseYamlDocument } from './config-files';
import type { ClinicalFramework, MarkerSeverity } from '../types/risk';

export const PATTERN_LIBRARY_FILE = 'clinical-patterns.yaml';

export const FRAMEWORK_ITEM_COUNT: Record<ClinicalFramework, number> = {
  PHQ9: 9,
  GAD7: 7
};

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const PatternSource = z.string().min(1).refine(compiles, { message: 'Pattern is not a valid regular expression' });

const ItemPatternSchema = z.object({
  pattern: PatternSource,
  severity: z.union([z.literal(1), z.literal(2), z.literal(3)])
});

const ItemSchema = z.object({
  item: z.number().int().min(1),
  name: z.string().min(1),
  critical: z.boolean().default(false),
  patterns: z.array(ItemPatternSchema).min(1)
});

const frameworkSchema = (framework: ClinicalFramework) =>
  z
    .object({ items: z.array(ItemSchema) })
    .superRefine((value, ctx) => {
      const seen = new Set<number>();
      value.items.forEach((entry, index) => {
        if (entry.item > FRAMEWORK_ITEM_COUNT[framework]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['items', index, 'item'],
            message: `${framework} has items 1-${FRAMEWORK_ITEM_COUNT[framework]}`
          });
        }
        if (seen.has(entry.item)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['items', index, 'item'],
            message: `${framework} item ${entry.item} is defined twice`
          });
        }
        seen.add(entry.item);
      });
    });

export const PatternLibrarySchema = z.object({
  version: z.string().min(1),
  frameworks: z.object({
    PHQ9: frameworkSchema('PHQ9'),
    GAD7: frameworkSchema('GAD7')
  }),
  protective_factors: z
    .array(
      z.object({
        name: z.string().min(1),
        patterns: z.array(PatternSource).min(1)
      })
    )
    .default([])
});

export interface ItemPattern {
  readonly pattern: string;
  readonly severity: MarkerSeverity;
}

export interface ClinicalItem {
  readonly item: number;
  readonly name: string;
  readonly critical: boolean;
  readonly patterns: readonly ItemPattern[];
}

export interface ProtectiveFactor {
  readonly name: string;
  readonly patterns: readonly string[];
}

export interface PatternLibrary {
  readonly version: string;
  readonly frameworks: Readonly<Record<ClinicalFramework, { readonly items: readonly ClinicalItem[] }>>;
  readonly protective_factors: readonly ProtectiveFactor[];
}

export function buildPatternLibrary(document: unknown, source = 'pattern library'): PatternLibrary {
  const parsed = PatternLibrarySchema.safeParse(document);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.errors);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, issues);
  }
  return deepFreeze(parsed.data);
}

export function parsePatternLibrary(raw: string, source = 'pattern library'): PatternLibrary {
  return buildPatternLibrary(parseYamlDocument(raw, source), source);
}

export function loadPatternLibrary(overridePath?: string): PatternLibrary {
  const { path, document } = loadYamlConfig(PATTERN_LIBRARY_FILE, overridePath);
  return buildPatternLibrary(document, path);
}
