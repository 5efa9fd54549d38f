import { describe, it, expect } from 'vitest';
import { all, any, toNode } from '../../../../src/dsl/builder/group-builder.js';
import { field } from '../../../../src/dsl/condition/field-expr.js';
import { DslValidationError } from '../../../../src/dsl/helpers/errors.js';
import { ConditionEvaluator } from '../../../../src/evaluation/condition-evaluator.js';

describe('all() / any()', () => {
  it('builds AND and OR groups from builders and plain nodes', () => {
    const tree = all(
      field('age').gte(18),
      any({ key: 'country', operator: 'eq', value: 'TH' }, field('country').eq('VN'))
    );

    expect(tree).toEqual({
      logic: 'AND',
      children: [
        { key: 'age', operator: 'gte', value: 18 },
        {
          logic: 'OR',
          children: [
            { key: 'country', operator: 'eq', value: 'TH' },
            { key: 'country', operator: 'eq', value: 'VN' }
          ]
        }
      ]
    });
  });

  it('produces trees the evaluator accepts', () => {
    const tree = any(field('age').lt(18), field('vip').isTrue());
    const evaluator = new ConditionEvaluator();

    expect(evaluator.evaluate(tree, { age: 40, vip: 'true' })).toBe(true);
    expect(evaluator.evaluate(tree, { age: 40 })).toBe(false);
  });

  it('rejects empty groups', () => {
    expect(() => all()).toThrow(DslValidationError);
    expect(() => all()).toThrow('all() requires at least one condition');
    expect(() => any()).toThrow('any() requires at least one condition');
  });
});

describe('toNode()', () => {
  it('builds a leaf builder and passes plain nodes through', () => {
    const node = { logic: 'OR' as const, children: [] };

    expect(toNode(field('a').isNull())).toEqual({ key: 'a', operator: 'isnull' });
    expect(toNode(node)).toBe(node);
  });
});
