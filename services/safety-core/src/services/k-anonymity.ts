/**
 * K-Anonymity Aggregator
 *
 * Group-level statistics for reporting. A group with fewer than k members is
 * returned suppressed (data null) so no individual can be singled out. Group
 * sizes are recomputed on every call; nothing is cached.
 *
 * Suppression is a normal result. An invalid query throws AggregationError.
 */

import { AggregationError } from '../lib/errors';

export const DEFAULT_K_THRESHOLD = 5;

export interface AggregateResult<T> {
  data: T | null;
  group_size: number;
  suppressed: boolean;
  suppression_reason?: string;
}

export type AggregationName = 'avg' | 'sum' | 'count' | 'min' | 'max';
export type AggregationFn = (values: number[]) => number;

export interface AggregateOptions<R> {
  group_by: keyof R & string;
  /** Numeric field to aggregate; not needed for `count` */
  field?: keyof R & string;
  agg: AggregationName | AggregationFn;
  k?: number;
  /** Count distinct values of this key as the group size instead of records */
  member_key?: keyof R & string;
}

export const UNGROUPED_KEY = 'unknown';

function validateK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new AggregationError(`k must be a positive integer, got ${k}`);
  }
}

function suppressionReason(groupSize: number, k: number): string {
  return `Group size (${groupSize}) below k-anonymity threshold (${k})`;
}

/**
 * One-off check for data that was computed elsewhere.
 */
export function enforceKAnonymity<T>(data: T, groupSize: number, k: number = DEFAULT_K_THRESHOLD): AggregateResult<T> {
  validateK(k);
  if (groupSize < k) {
    return { data: null, group_size: groupSize, suppressed: true, suppression_reason: suppressionReason(groupSize, k) };
  }
  return { data, group_size: groupSize, suppressed: false };
}

function applyAggregation(name: AggregationName, values: number[], groupKey: string): number {
  if (name === 'count') {
    return values.length;
  }
  if (name === 'sum') {
    return values.reduce((total, value) => total + value, 0);
  }
  if (values.length === 0) {
    throw new AggregationError(`No numeric values to ${name} in group "${groupKey}"`);
  }
  switch (name) {
    case 'avg':
      return values.reduce((total, value) => total + value, 0) / values.length;
    case 'min':
      return values.reduce((lowest, value) => (value < lowest ? value : lowest), values[0]);
    case 'max':
      return values.reduce((highest, value) => (value > highest ? value : highest), values[0]);
  }
}

export function aggregate<R extends object>(
  records: readonly R[],
  options: AggregateOptions<R>
): Map<string, AggregateResult<number>> {
  const k = options.k ?? DEFAULT_K_THRESHOLD;
  validateK(k);

  const { agg, field } = options;
  if (typeof agg === 'string' && !['avg', 'sum', 'count', 'min', 'max'].includes(agg)) {
    throw new AggregationError(`Unknown aggregation "${agg}"`);
  }
  if (field === undefined && agg !== 'count') {
    throw new AggregationError('A field is required for every aggregation except count');
  }

  const groups = new Map<string, R[]>();
  for (const record of records) {
    const raw = record[options.group_by];
    const key = raw === undefined || raw === null || raw === '' ? UNGROUPED_KEY : String(raw);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  const results = new Map<string, AggregateResult<number>>();
  for (const key of [...groups.keys()].sort()) {
    const members = groups.get(key) ?? [];
    const memberKey = options.member_key;
    const groupSize = memberKey
      ? new Set(members.map((record) => String(record[memberKey]))).size
      : members.length;

    if (groupSize < k) {
      results.set(key, {
        data: null,
        group_size: groupSize,
        suppressed: true,
        suppression_reason: suppressionReason(groupSize, k)
      });
      continue;
    }

    const values: number[] = [];
    for (const record of members) {
      const value = field === undefined ? 1 : record[field];
      if (typeof value === 'number' && Number.isFinite(value)) {
        values.push(value);
      }
    }

    const data = typeof agg === 'function' ? agg(values) : applyAggregation(agg, values, key);
    if (!Number.isFinite(data)) {
      throw new AggregationError(`Aggregation produced a non-finite value for group "${key}"`);
    }

    results.set(key, { data, group_size: groupSize, suppressed: false });
  }

  return results;
}
