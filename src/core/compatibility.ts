/**
 * Scalar Type Compatibility
 *
 * A change between two scalar types is safe only when it appears in the
 * widening table below. The table is one-directional: integer → number is a
 * widening, number → integer is not.
 */

import { ScalarNode } from './types';

export type ScalarChange = 'unchanged' | 'widened' | 'incompatible';

/** Safe promotions, keyed 'from → to' on scalar labels */
const WIDENING: ReadonlySet<string> = new Set([
  'integer → number',
  'integer(int32) → integer(int64)',
  'integer(int32) → integer',
  'integer(int64) → integer',
  'integer(int32) → number',
  'integer(int64) → number',
  'number(float) → number(double)',
  'number(float) → number',
  'number(double) → number',
]);

/**
 * Label used in messages and as table key: 'integer', 'string(date-time)'
 */
export function scalarLabel(node: ScalarNode): string {
  return node.format ? `${node.type}(${node.format})` : node.type;
}

/**
 * Classify a scalar-to-scalar change. Identical labels are unchanged;
 * otherwise the widening table decides.
 */
export function classifyScalarChange(before: ScalarNode, after: ScalarNode): ScalarChange {
  const from = scalarLabel(before);
  const to = scalarLabel(after);
  if (from === to) return 'unchanged';
  return WIDENING.has(`${from} → ${to}`) ? 'widened' : 'incompatible';
}
