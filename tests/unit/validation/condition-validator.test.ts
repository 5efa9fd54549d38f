import { describe, it, expect } from 'vitest';
import { ConditionInputValidator } from '../../../src/validation/condition-validator.js';
import { OperatorRegistry } from '../../../src/core/operator-registry.js';

describe('ConditionInputValidator', () => {
  const v = new ConditionInputValidator();

  describe('input shape', () => {
    it('rejects non-object input at the root', () => {
      const result = v.validate([1, 2]);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        { path: '(root)', message: 'Condition must be an object', severity: 'error' },
      ]);
    });

    it('accepts a well-formed tree without issues', () => {
      const result = v.validate({
        logic: 'AND',
        children: [
          { key: 'age', operator: 'gt', value: 18 },
          { logic: 'OR', children: [{ key: 'country', operator: '==', value: 'TH' }] },
        ],
      });

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('accepts a well-formed chain without issues', () => {
      const result = v.validate({
        conditions: [
          { key: 'age', operator: 'gt', value: 30, next_logic: 'OR' },
          { group: { conditions: [{ key: 'vip', operator: 'istrue' }] } },
        ],
      });

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });
  });

  describe('tree nodes', () => {
    it('reports invalid logic', () => {
      const result = v.validate({ logic: 'XOR', children: [{ key: 'a', operator: 'isnull' }] });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        { path: 'logic', message: 'Invalid logic: XOR. Valid values: AND, OR', severity: 'error' },
      ]);
    });

    it('reports non-array children', () => {
      const result = v.validate({ logic: 'AND', children: 'x' });

      expect(result.errors).toContainEqual({
        path: 'children',
        message: 'Group children must be an array',
        severity: 'error',
      });
    });

    it('reports non-object children with their path', () => {
      const result = v.validate({ logic: 'OR', children: [{ key: 'a', operator: 'isnull' }, 42] });

      expect(result.errors).toEqual([
        { path: 'children[1]', message: 'Condition node must be an object', severity: 'error' },
      ]);
    });

    it('reports non-string key and operator', () => {
      const result = v.validate({ key: 1, operator: true });

      expect(result.errors.map((e) => e.path)).toEqual(['key', 'operator']);
      expect(result.errors.map((e) => e.message)).toEqual([
        'Condition key must be a string',
        'Condition operator must be a string',
      ]);
    });

    it('warns about degenerate nodes', () => {
      const result = v.validate({});

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        {
          path: '(root)',
          message: 'Node is neither a group nor a condition and always evaluates to true',
          severity: 'warning',
        },
      ]);
    });

    it('warns about empty groups and ignored fields', () => {
      const result = new ConditionInputValidator().validate({
        logic: 'OR',
        children: [
          { key: 'country', operator: 'iequal', value: 'th' },
          { logic: 'AND', children: [] },
        ],
      });

      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings.map((w) => [w.path, w.message])).toEqual([
        [
          'children[0].operator',
          'Operator "iequal" is not built-in and must be registered as a custom operator',
        ],
        ['children[1].children', 'Group has no children'],
        ['children[1]', 'Node is neither a group nor a condition and always evaluates to true'],
      ]);
    });

    it('warns when a group also carries leaf fields', () => {
      const result = v.validate({
        logic: 'AND',
        key: 'ignored',
        children: [{ key: 'a', operator: 'isnull' }],
      });

      expect(result.warnings).toEqual([
        { path: '(root)', message: 'Group has "key"/"operator" which are ignored', severity: 'warning' },
      ]);
    });

    it('warns when children have no logic', () => {
      const result = v.validate({ key: 'a', operator: 'isnull', children: [] });

      expect(result.warnings).toEqual([
        { path: 'children', message: 'Group children are ignored without "logic"', severity: 'warning' },
      ]);
    });
  });

  describe('operators and values', () => {
    it('warns when a comparison has no value', () => {
      const result = v.validate({ key: 'age', operator: '>=' });

      expect(result.warnings).toEqual([
        { path: 'value', message: 'Operator ">=" has no "value" to compare against', severity: 'warning' },
      ]);
    });

    it('does not expect a value for state operators', () => {
      expect(v.validate({ key: 'a', operator: 'isempty' }).warnings).toEqual([]);
    });

    it('requires a [min, max] pair for range operators', () => {
      const result = v.validate({ key: 'age', operator: 'between', value: [1, 2, 3] });

      expect(result.errors).toEqual([
        { path: 'value', message: 'Operator "between" requires a [min, max] array', severity: 'error' },
      ]);
      expect(v.validate({ key: 'age', operator: 'notbetween', value: [1, 9] }).errors).toEqual([]);
    });

    it('checks custom operators against a registry', () => {
      const registry = new OperatorRegistry();
      registry.register('iequal', (actual, expected) => actual === expected);
      const withRegistry = new ConditionInputValidator({ operators: registry });

      expect(withRegistry.validate({ key: 'a', operator: 'iequal', value: 'x' }).warnings).toEqual([]);
      expect(withRegistry.validate({ key: 'a', operator: 'fuzzy', value: 'x' }).warnings).toEqual([
        {
          path: 'operator',
          message:
            'Unknown operator: fuzzy. Built-in operators: isnull, isnotnull, isempty, isnotempty, istrue, isfalse, ' +
            'eq, neq, gt, gte, lt, lte, in, nin, contains, ncontains, like, ilike, nlike, startswith, endswith, ' +
            'between, notbetween',
          severity: 'warning',
        },
      ]);
    });
  });

  describe('chains', () => {
    it('reports a missing conditions array', () => {
      const result = v.validateChain({ conditions: 'x' });

      expect(result.errors).toEqual([
        { path: 'conditions', message: 'Chain conditions must be an array', severity: 'error' },
      ]);
    });

    it('validates nested groups with full paths', () => {
      const result = v.validate({
        conditions: [
          { key: 'a', operator: 'isnull', next_logic: 'AND' },
          { group: { conditions: [{ key: 'b', operator: 'eq', value: 1, nextLogic: 'XOR' }] } },
        ],
      });

      expect(result.errors).toEqual([
        {
          path: 'conditions[1].group.conditions[0].nextLogic',
          message: 'Invalid logic: XOR. Valid values: AND, OR',
          severity: 'error',
        },
      ]);
      expect(result.warnings).toEqual([
        {
          path: 'conditions[1].group.conditions[0].nextLogic',
          message: 'Connective on the last condition is ignored',
          severity: 'warning',
        },
      ]);
    });

    it('warns that links without an operator are always false', () => {
      const result = v.validate({ conditions: [{ key: 'a', value: 1 }] });

      expect(result.warnings).toEqual([
        {
          path: 'conditions[0]',
          message: 'Condition has no operator and always evaluates to false',
          severity: 'warning',
        },
      ]);
    });

    it('does not call a keyless link with a state operator always false', () => {
      const result = v.validate({ conditions: [{ operator: 'isnull' }, { key: '', operator: 'eq', value: 1 }] });

      expect(result.warnings).toEqual([
        {
          path: 'conditions[0]',
          message: 'Condition has no key and is evaluated against the empty key ""',
          severity: 'warning',
        },
        {
          path: 'conditions[1]',
          message: 'Condition has no key and is evaluated against the empty key ""',
          severity: 'warning',
        },
      ]);
    });

    it('warns when a link has both group and leaf fields', () => {
      const result = v.validate({ conditions: [{ key: 'a', group: { conditions: [] } }] });

      expect(result.warnings).toEqual([
        {
          path: 'conditions[0]',
          message: 'Condition has both "group" and "key"/"operator"; the group wins',
          severity: 'warning',
        },
      ]);
    });

    it('reports non-object links', () => {
      expect(v.validate({ conditions: [null] }).errors).toEqual([
        { path: 'conditions[0]', message: 'Chain condition must be an object', severity: 'error' },
      ]);
    });
  });

  describe('validateTree', () => {
    it('validates input as a tree even when it has conditions', () => {
      const result = v.validateTree({ conditions: [] });

      expect(result.warnings.map((w) => w.message)).toEqual([
        'Node is neither a group nor a condition and always evaluates to true',
      ]);
    });
  });

  describe('strict mode', () => {
    it('treats warnings as failures', () => {
      const strict = new ConditionInputValidator({ strict: true });

      const result = strict.validate({ key: 'a', operator: 'eq' });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toHaveLength(1);
    });
  });
});
