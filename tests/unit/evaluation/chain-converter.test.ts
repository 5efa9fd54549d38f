import { describe, it, expect } from 'vitest';
import { convertTreeToChain } from '../../../src/evaluation/chain-converter.js';
import { ConditionEvaluator } from '../../../src/evaluation/condition-evaluator.js';
import { OperatorRegistry } from '../../../src/core/operator-registry.js';
import type { ConditionNode, Logic } from '../../../src/types/condition.js';
import type { DataRecord, FieldValue } from '../../../src/types/value.js';

/** Deterministický PRNG (mulberry32), aby byl test opakovatelný */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('pick() from an empty list');
  }
  return item;
}

const KEYS = ['a', 'b', 'c', 'd', 'missing'] as const;
const OPERATORS = [
  'eq', 'neq', 'gt', 'gte', 'lt', 'lte', '>=', '==',
  'in', 'nin', 'contains', 'like', 'startswith',
  'between', 'notbetween',
  'isnull', 'isnotnull', 'isempty', 'istrue', 'isfalse',
  'is_even', 'unknown_op'
] as const;
const SCALARS: readonly FieldValue[] = [0, 1, 5, 10, '5', 'x', 'xy', '', null, true, false];

function randomValue(random: () => number): FieldValue {
  const roll = random();
  if (roll < 0.15) {
    return [pick(random, SCALARS), pick(random, SCALARS)];
  }
  if (roll < 0.2) {
    return 'x%';
  }
  return pick(random, SCALARS);
}

function randomTree(random: () => number, depth: number): ConditionNode {
  const roll = random();
  if (roll < 0.05) {
    return {};
  }
  if (depth < 4 && roll < 0.45) {
    const logic: Logic = random() < 0.5 ? 'AND' : 'OR';
    const count = Math.floor(random() * 5);
    const children: ConditionNode[] = [];
    for (let i = 0; i < count; i++) {
      children.push(randomTree(random, depth + 1));
    }
    return { logic, children };
  }
  return { key: pick(random, KEYS), operator: pick(random, OPERATORS), value: randomValue(random) };
}

function randomRecord(random: () => number): DataRecord {
  const record: Record<string, FieldValue> = {};
  for (const key of KEYS) {
    if (key !== 'missing' && random() < 0.85) {
      record[key] = randomValue(random);
    }
  }
  return record;
}

describe('convertTreeToChain', () => {
  it('turns a leaf into a single-link chain', () => {
    expect(convertTreeToChain({ key: 'age', operator: 'gt', value: 18 })).toEqual({
      conditions: [{ key: 'age', operator: 'gt', value: 18 }]
    });
  });

  it('carries the group logic on every link but the last', () => {
    const chain = convertTreeToChain({
      logic: 'OR',
      children: [
        { key: 'a', operator: 'eq', value: 1 },
        { key: 'b', operator: 'eq', value: 2 },
        { key: 'c', operator: 'eq', value: 3 }
      ]
    });

    expect(chain.conditions.map((link) => link.nextLogic)).toEqual(['OR', 'OR', undefined]);
    expect(chain.conditions[2]).not.toHaveProperty('nextLogic');
  });

  it('turns nested groups into nested chains', () => {
    const chain = convertTreeToChain({
      logic: 'AND',
      children: [
        { key: 'sum_insured', operator: 'gte', value: 200000 },
        {
          logic: 'OR',
          children: [
            { key: 'amount', operator: 'gte', value: 100000 },
            { key: 'amount', operator: 'lte', value: 1000000 }
          ]
        }
      ]
    });

    expect(chain).toEqual({
      conditions: [
        { key: 'sum_insured', operator: 'gte', value: 200000, nextLogic: 'AND' },
        {
          group: {
            conditions: [
              { key: 'amount', operator: 'gte', value: 100000, nextLogic: 'OR' },
              { key: 'amount', operator: 'lte', value: 1000000 }
            ]
          }
        }
      ]
    });
  });

  it('turns degenerate nodes into empty chains', () => {
    expect(convertTreeToChain({})).toEqual({ conditions: [] });
    expect(convertTreeToChain({ logic: 'AND', children: [] })).toEqual({ conditions: [] });
    expect(
      convertTreeToChain({ logic: 'AND', children: [{ key: 'a', operator: 'isnull' }, {}] })
    ).toEqual({
      conditions: [{ key: 'a', operator: 'isnull', value: undefined, nextLogic: 'AND' }, { group: { conditions: [] } }]
    });
  });

  it('does not modify the tree', () => {
    const tree: ConditionNode = {
      logic: 'OR',
      children: [{ key: 'a', operator: 'in', value: [1, 2] }, { key: 'b', operator: 'istrue' }]
    };
    const before = structuredClone(tree);

    convertTreeToChain(tree);

    expect(tree).toEqual(before);
  });

  it('yields a chain that evaluates like the tree for random inputs', () => {
    const registry = new OperatorRegistry({
      operators: {
        is_even: (field) => typeof field === 'number' && field % 2 === 0
      }
    });
    const evaluator = new ConditionEvaluator({ registry });
    const random = createRandom(20240601);

    let compared = 0;
    for (let t = 0; t < 100; t++) {
      const tree = randomTree(random, 1);
      const chain = convertTreeToChain(tree);

      for (let d = 0; d < 20; d++) {
        const record = randomRecord(random);
        const expected = evaluator.evaluate(tree, record);
        const actual = evaluator.evaluateChain(chain, record);
        if (actual !== expected) {
          throw new Error(
            `Mismatch for tree ${JSON.stringify(tree)} and record ${JSON.stringify(record)}: ` +
              `tree=${expected} chain=${actual}`
          );
        }
        compared++;
      }
    }

    expect(compared).toBe(2000);
  });
});
