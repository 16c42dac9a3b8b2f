/**
 * Scores are clamped to [0, 1] and rounded to four decimals so repeated runs
 * compare equal regardless of float accumulation order.
 */

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function roundScore(value: number): number {
  return Math.round(clampScore(value) * 10_000) / 10_000;
}
