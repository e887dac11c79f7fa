/**
 * Tests for scalar type compatibility
 */

import { classifyScalarChange, scalarLabel } from '../src/core/compatibility';
import { ScalarNode, PrimitiveType } from '../src/core/types';

function scalar(type: PrimitiveType, format?: string): ScalarNode {
  return format === undefined ? { kind: 'scalar', type } : { kind: 'scalar', type, format };
}

describe('Scalar compatibility', () => {
  test('labels include the format when there is one', () => {
    expect(scalarLabel(scalar('integer'))).toBe('integer');
    expect(scalarLabel(scalar('string', 'date-time'))).toBe('string(date-time)');
  });

  test('identical scalars are unchanged', () => {
    expect(classifyScalarChange(scalar('string'), scalar('string'))).toBe('unchanged');
    expect(classifyScalarChange(scalar('integer', 'int64'), scalar('integer', 'int64'))).toBe('unchanged');
  });

  test.each([
    [scalar('integer'), scalar('number')],
    [scalar('integer', 'int32'), scalar('integer', 'int64')],
    [scalar('integer', 'int32'), scalar('integer')],
    [scalar('integer', 'int64'), scalar('number')],
    [scalar('number', 'float'), scalar('number', 'double')],
    [scalar('number', 'double'), scalar('number')],
  ])('%j → %j is a widening', (before, after) => {
    expect(classifyScalarChange(before, after)).toBe('widened');
  });

  test.each([
    [scalar('number'), scalar('integer')],
    [scalar('integer', 'int64'), scalar('integer', 'int32')],
    [scalar('number', 'double'), scalar('number', 'float')],
    [scalar('integer'), scalar('string')],
    [scalar('string'), scalar('string', 'uuid')],
    [scalar('boolean'), scalar('any')],
  ])('%j → %j is incompatible', (before, after) => {
    expect(classifyScalarChange(before, after)).toBe('incompatible');
  });
});
