import { describe, it, expect } from 'vitest';
import {
  parseConditionChain,
  parseConditionInput,
  parseConditionNode,
  parseDataRecord,
  toFieldValue,
  toWireFormat,
  YamlValidationError
} from '../../../../src/dsl/yaml/schema.js';
import { DslError } from '../../../../src/dsl/helpers/errors.js';

describe('parseConditionNode', () => {
  it('converts a nested tree', () => {
    const node = parseConditionNode(
      {
        logic: 'AND',
        children: [
          { key: 'age', operator: 'gt', value: 18 },
          { logic: 'OR', children: [{ key: 'tags', operator: 'in', value: ['a', { b: 1 }] }] }
        ]
      },
      'condition'
    );

    expect(node).toEqual({
      logic: 'AND',
      children: [
        { key: 'age', operator: 'gt', value: 18 },
        { logic: 'OR', children: [{ key: 'tags', operator: 'in', value: ['a', { b: 1 }] }] }
      ]
    });
  });

  it('treats null fields as absent but keeps a null value', () => {
    expect(parseConditionNode({ key: 'a', operator: 'eq', value: null, logic: null }, 'condition')).toEqual({
      key: 'a',
      operator: 'eq',
      value: null
    });
  });

  it('reports the path of a structural error', () => {
    expect(() =>
      parseConditionNode({ logic: 'OR', children: [{ key: 'a', operator: 1 }] }, 'condition')
    ).toThrow('condition.children[0].operator: must be a string, got number');
  });

  it('rejects invalid logic and non-array children', () => {
    expect(() => parseConditionNode({ logic: 'XOR' }, 'condition')).toThrow(
      'condition.logic: invalid logic "XOR". Expected: AND, OR'
    );
    expect(() => parseConditionNode({ logic: 'AND', children: 'all' }, 'condition')).toThrow(
      'condition.children: must be an array, got string'
    );
  });

  it('rejects non-object nodes', () => {
    expect(() => parseConditionNode(['a'], 'condition')).toThrow(YamlValidationError);
    expect(() => parseConditionNode(null, 'condition')).toThrow('condition: must be an object, got null');
  });
});

describe('parseConditionChain', () => {
  it('maps next_logic to nextLogic', () => {
    const chain = parseConditionChain(
      {
        conditions: [
          { key: 'age', operator: 'gt', value: 30, next_logic: 'OR' },
          { group: { conditions: [{ key: 'country', operator: 'eq', value: 'TH' }] } }
        ]
      },
      'chain'
    );

    expect(chain).toEqual({
      conditions: [
        { key: 'age', operator: 'gt', value: 30, nextLogic: 'OR' },
        { group: { conditions: [{ key: 'country', operator: 'eq', value: 'TH' }] } }
      ]
    });
  });

  it('also accepts nextLogic', () => {
    const chain = parseConditionChain({ conditions: [{ key: 'a', operator: 'isnull', nextLogic: 'AND' }] }, 'chain');

    expect(chain.conditions[0]?.nextLogic).toBe('AND');
  });

  it('rejects a missing or malformed conditions field', () => {
    expect(() => parseConditionChain({}, 'chain')).toThrow('chain: missing required field "conditions"');
    expect(() =>
      parseConditionChain({ conditions: [{ key: 'a', next_logic: 'XOR' }] }, 'chain')
    ).toThrow('chain.conditions[0].next_logic: invalid logic "XOR". Expected: AND, OR');
  });
});

describe('parseConditionInput', () => {
  it('reads objects with conditions as chains and anything else as trees', () => {
    expect(parseConditionInput({ conditions: [] })).toEqual({ conditions: [] });
    expect(parseConditionInput({ key: 'a', operator: 'istrue' })).toEqual({ key: 'a', operator: 'istrue' });
  });

  it('uses "condition" as the default path', () => {
    expect(() => parseConditionInput('text')).toThrow('condition: must be an object, got string');
  });
});

describe('parseDataRecord', () => {
  it('accepts nested mappings and sequences', () => {
    expect(parseDataRecord({ age: 25, address: { city: 'Bangkok' }, tags: ['vip'] })).toEqual({
      age: 25,
      address: { city: 'Bangkok' },
      tags: ['vip']
    });
  });

  it('rejects non-mappings', () => {
    expect(() => parseDataRecord([1, 2])).toThrow('data: must be an object, got array');
  });
});

describe('toFieldValue', () => {
  it('passes supported values through', () => {
    const date = new Date(0);
    expect(toFieldValue(date, 'v')).toBe(date);
    expect(toFieldValue(10n, 'v')).toBe(10n);
  });

  it('rejects values outside the FieldValue union', () => {
    expect(() => toFieldValue({ nested: [Symbol('s')] }, 'value')).toThrow(
      'value.nested[0]: unsupported value of type symbol'
    );
  });
});

describe('toWireFormat', () => {
  it('writes next_logic for chains', () => {
    expect(
      toWireFormat({
        conditions: [
          { key: 'age', operator: 'gt', value: 30, nextLogic: 'OR' },
          { group: { conditions: [] } }
        ]
      })
    ).toEqual({
      conditions: [
        { key: 'age', operator: 'gt', value: 30, next_logic: 'OR' },
        { group: { conditions: [] } }
      ]
    });
  });

  it('drops undefined fields from trees', () => {
    const wire = toWireFormat({ logic: 'AND', children: [{ key: 'a', operator: 'isnull', value: undefined }] });

    expect(wire).toEqual({ logic: 'AND', children: [{ key: 'a', operator: 'isnull' }] });
    expect(wire.children?.[0]).not.toHaveProperty('value');
  });
});

describe('YamlValidationError', () => {
  it('is a DslError carrying the path', () => {
    const err = new YamlValidationError('must be a string', 'condition.key');

    expect(err).toBeInstanceOf(DslError);
    expect(err.path).toBe('condition.key');
    expect(err.message).toBe('condition.key: must be a string');
  });
});
