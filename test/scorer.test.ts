/**
 * Tests for the Score Calculator
 */

import { score, DEFAULT_WEIGHTS } from '../src/core/scorer';
import { RuleSeverity, RuleViolation } from '../src/core/types';

function violation(severity: RuleSeverity, category = 'naming'): RuleViolation {
  return { ruleId: `${category}-rule`, location: '/things', severity, category, message: 'x' };
}

describe('Score Calculator', () => {
  test('no violations scores 100', () => {
    expect(score([])).toEqual({ score: 100, breakdown: {} });
  });

  test('deducts the default weight per violation', () => {
    expect(DEFAULT_WEIGHTS).toEqual({ error: 10, warning: 3, info: 1 });
    expect(score([violation('error')]).score).toBe(90);
    expect(score([violation('warning')]).score).toBe(97);
    expect(score([violation('info')]).score).toBe(99);
  });

  test('breaks the penalty down by category', () => {
    const result = score([violation('warning'), violation('warning'), violation('error', 'metadata')]);
    expect(result).toEqual({ score: 84, breakdown: { naming: 6, metadata: 10 } });
  });

  test('any category name becomes a breakdown entry', () => {
    const result = score([violation('warning', '__proto__'), violation('info', 'constructor')]);
    expect(Object.entries(result.breakdown)).toEqual([
      ['__proto__', 3],
      ['constructor', 1],
    ]);
    expect(Object.getPrototypeOf(result.breakdown)).toBe(Object.prototype);
  });

  test('never drops below zero', () => {
    const many = Array.from({ length: 11 }, () => violation('error'));
    expect(score(many)).toEqual({ score: 0, breakdown: { naming: 110 } });
  });

  test('never increases as violations are added', () => {
    const severities: RuleSeverity[] = ['info', 'warning', 'error', 'warning', 'info', 'error'];
    const violations: RuleViolation[] = [];
    let previous = score(violations).score;

    for (const severity of severities) {
      violations.push(violation(severity));
      const current = score(violations).score;
      expect(current).toBeLessThanOrEqual(previous);
      previous = current;
    }
  });

  test('accepts custom weights', () => {
    expect(score([violation('error')], { error: 25 }).score).toBe(75);
    expect(score([violation('warning')], { error: 25 }).score).toBe(97);
  });

  test('ignores negative weights', () => {
    expect(score([violation('warning')], { warning: -5 })).toEqual({ score: 100, breakdown: { naming: 0 } });
  });

  test('rounds fractional penalties', () => {
    expect(score([violation('info')], { info: 0.4 }).score).toBe(100);
    expect(score([violation('info')], { info: 2.5 }).score).toBe(98);
  });
});
