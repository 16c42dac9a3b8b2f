/**
 * Tests for the K-Anonymity Aggregator
 */

import { AggregationError } from '../src/lib/errors';
import { aggregate, enforceKAnonymity } from '../src/services/k-anonymity';

interface Row {
  school: string | null;
  student: string;
  score: number;
}

const rows = (school: string | null, students: string[], scores: number[]): Row[] =>
  students.map((student, i) => ({ school, student, score: scores[i] }));

describe('K-Anonymity Aggregator', () => {
  describe('enforceKAnonymity', () => {
    it('should suppress a group below k', () => {
      expect(enforceKAnonymity(42, 4)).toEqual({
        data: null,
        group_size: 4,
        suppressed: true,
        suppression_reason: 'Group size (4) below k-anonymity threshold (5)'
      });
    });

    it('should release a group at k', () => {
      expect(enforceKAnonymity(42, 5)).toEqual({ data: 42, group_size: 5, suppressed: false });
    });

    it('should use a custom k', () => {
      expect(enforceKAnonymity('x', 2, 3).suppressed).toBe(true);
    });

    it('should reject a non-positive or fractional k', () => {
      expect(() => enforceKAnonymity(1, 10, 0)).toThrow(AggregationError);
      expect(() => enforceKAnonymity(1, 10, 2.5)).toThrow('k must be a positive integer, got 2.5');
    });
  });

  describe('aggregate', () => {
    const records: Row[] = [
      ...rows('north', ['s1', 's2', 's3', 's4', 's5', 's6'], [0.1, 0.2, 0.3, 0.4, 0.5, 0.6]),
      ...rows('south', ['s7', 's8', 's9'], [0.9, 0.9, 0.9])
    ];

    it('should aggregate large groups and suppress small ones', () => {
      const result = aggregate(records, { group_by: 'school', field: 'score', agg: 'max' });

      expect([...result.keys()]).toEqual(['north', 'south']);
      expect(result.get('north')).toEqual({ data: 0.6, group_size: 6, suppressed: false });
      expect(result.get('south')).toEqual({
        data: null,
        group_size: 3,
        suppressed: true,
        suppression_reason: 'Group size (3) below k-anonymity threshold (5)'
      });
    });

    it('should compute averages and minimums', () => {
      expect(aggregate(records, { group_by: 'school', field: 'score', agg: 'avg' }).get('north')?.data).toBeCloseTo(
        0.35,
        10
      );
      expect(aggregate(records, { group_by: 'school', field: 'score', agg: 'min' }).get('north')?.data).toBe(0.1);
    });

    it('should take the minimum and maximum of very large groups', () => {
      const large: Row[] = Array.from({ length: 200_000 }, (_, i) => ({
        school: 'central',
        student: `student-${i}`,
        score: (i % 1000) + 1
      }));

      expect(aggregate(large, { group_by: 'school', field: 'score', agg: 'max' }).get('central')?.data).toBe(1000);
      expect(aggregate(large, { group_by: 'school', field: 'score', agg: 'min' }).get('central')?.data).toBe(1);
    });

    it('should count records without a field', () => {
      expect(aggregate(records, { group_by: 'school', agg: 'count', k: 3 }).get('south')?.data).toBe(3);
    });

    it('should apply a custom aggregation function', () => {
      const spread = (values: number[]) => Math.max(...values) - Math.min(...values);
      expect(aggregate(records, { group_by: 'school', field: 'score', agg: spread }).get('north')?.data).toBeCloseTo(
        0.5,
        10
      );
    });

    it('should size groups by distinct members when asked', () => {
      const repeated = rows('east', ['a', 'a', 'b', 'b', 'b', 'c'], [1, 1, 1, 1, 1, 1]);
      const result = aggregate(repeated, { group_by: 'school', agg: 'count', member_key: 'student' });

      expect(result.get('east')).toEqual({
        data: null,
        group_size: 3,
        suppressed: true,
        suppression_reason: 'Group size (3) below k-anonymity threshold (5)'
      });
    });

    it('should group missing values under unknown', () => {
      const result = aggregate(rows(null, ['a', 'b'], [1, 2]), { group_by: 'school', agg: 'count', k: 1 });
      expect([...result.entries()]).toEqual([['unknown', { data: 2, group_size: 2, suppressed: false }]]);
    });

    it('should recompute group sizes on every call', () => {
      const growing = rows('west', ['a', 'b', 'c', 'd'], [1, 1, 1, 1]);
      expect(aggregate(growing, { group_by: 'school', agg: 'count' }).get('west')?.suppressed).toBe(true);

      growing.push({ school: 'west', student: 'e', score: 1 });
      expect(aggregate(growing, { group_by: 'school', agg: 'count' }).get('west')?.data).toBe(5);
    });

    it('should require a field for numeric aggregations', () => {
      expect(() => aggregate(records, { group_by: 'school', agg: 'avg' })).toThrow(
        'A field is required for every aggregation except count'
      );
    });

    it('should reject an invalid k', () => {
      expect(() => aggregate(records, { group_by: 'school', agg: 'count', k: -1 })).toThrow(AggregationError);
    });

    it('should reject a non-finite result', () => {
      expect(() => aggregate(records, { group_by: 'school', field: 'score', agg: () => Number.NaN })).toThrow(
        'Aggregation produced a non-finite value for group "north"'
      );
    });
  });
});
