import {
  classifyNode,
  type ChainLink,
  type ConditionChain,
  type ConditionNode,
  type Logic,
} from '../types/condition.js';

/**
 * Converts a condition tree into the equivalent flat chain.
 *
 * - a leaf becomes a single-link chain
 * - a group becomes a chain of its converted children, every link but the
 *   last carrying the group's logic
 * - a degenerate node becomes an empty chain (both evaluate to true)
 *
 * For any data record the chain evaluates to the same result as the tree.
 * The input is not modified; comparison values are shared, not copied.
 *
 * @example
 * ```typescript
 * convertTreeToChain({
 *   logic: 'OR',
 *   children: [
 *     { key: 'age', operator: 'gt', value: 30 },
 *     { key: 'country', operator: 'eq', value: 'TH' },
 *   ],
 * });
 * // {
 * //   conditions: [
 * //     { key: 'age', operator: 'gt', value: 30, nextLogic: 'OR' },
 * //     { key: 'country', operator: 'eq', value: 'TH' },
 * //   ],
 * // }
 * ```
 */
export function convertTreeToChain(node: ConditionNode): ConditionChain {
  const classified = classifyNode(node);

  switch (classified.kind) {
    case 'leaf':
      return { conditions: [toLink(node, undefined)] };

    case 'group': {
      const { logic, children } = classified.group;
      const last = children.length - 1;
      return {
        conditions: children.map((child, i) => toLink(child, i < last ? logic : undefined)),
      };
    }

    case 'degenerate':
      return { conditions: [] };
  }
}

function toLink(node: ConditionNode, nextLogic: Logic | undefined): ChainLink {
  const classified = classifyNode(node);
  const link: ChainLink =
    classified.kind === 'leaf'
      ? { key: classified.leaf.key, operator: classified.leaf.operator, value: classified.leaf.value }
      : { group: convertTreeToChain(node) };

  if (nextLogic !== undefined) {
    link.nextLogic = nextLogic;
  }
  return link;
}
