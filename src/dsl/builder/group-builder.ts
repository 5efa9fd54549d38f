import type { ConditionGroup, ConditionNode, Logic } from '../../types/condition.js';
import type { ConditionBuilder, NodeInput } from '../types.js';
import { DslValidationError } from '../helpers/errors.js';

function isBuilder(input: NodeInput): input is ConditionBuilder {
  return 'build' in input && typeof input.build === 'function';
}

/** Resolves a node or leaf builder into a plain tree node. */
export function toNode(input: NodeInput): ConditionNode {
  return isBuilder(input) ? input.build() : input;
}

function group(logic: Logic, children: NodeInput[]): ConditionGroup {
  if (children.length === 0) {
    throw new DslValidationError(`${logic === 'AND' ? 'all' : 'any'}() requires at least one condition`);
  }
  return { logic, children: children.map(toNode) };
}

/**
 * AND group: true when every child is true.
 *
 * @example
 * ```typescript
 * all(field('age').gte(18), field('country').eq('TH'))
 * ```
 *
 * @throws {DslValidationError} If called without children.
 */
export function all(...children: NodeInput[]): ConditionGroup {
  return group('AND', children);
}

/**
 * OR group: true when at least one child is true.
 *
 * @example
 * ```typescript
 * any(field('role').eq('admin'), all(field('role').eq('editor'), field('active').isTrue()))
 * ```
 *
 * @throws {DslValidationError} If called without children.
 */
export function any(...children: NodeInput[]): ConditionGroup {
  return group('OR', children);
}
