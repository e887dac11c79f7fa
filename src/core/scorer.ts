/**
 * Score Calculator
 *
 * Reduces a violation list to a 0–100 consistency score.
 *
 * - 100 = no violations
 * - Deductions (default): error = -10, warning = -3, info = -1
 * - Clamped to [0, 100]
 */

import { RuleViolation, ScoreReport, ScoreWeights } from './types';

export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
  error: 10,
  warning: 3,
  info: 1,
});

export function score(
  violations: readonly RuleViolation[],
  weights: Partial<ScoreWeights> = {}
): ScoreReport {
  const breakdown = new Map<string, number>();
  let penalty = 0;

  for (const violation of violations) {
    const weight = weights[violation.severity] ?? DEFAULT_WEIGHTS[violation.severity];
    // Weights below zero count as zero
    const deduction = Number.isFinite(weight) && weight > 0 ? weight : 0;

    breakdown.set(violation.category, (breakdown.get(violation.category) ?? 0) + deduction);
    penalty += deduction;
  }

  return {
    score: Math.max(0, Math.min(100, Math.round(100 - penalty))),
    breakdown: Object.fromEntries(breakdown),
  };
}
