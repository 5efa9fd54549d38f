/**
 * Condition tree and chain validation.
 *
 * Evaluation itself never fails on malformed input (degenerate nodes are
 * true, broken leaves are false). These validators report such input
 * before it reaches the engine.
 *
 * @module
 */

import {
  BUILTIN_OPERATORS,
  LOGIC_OPERATORS,
  RANGE_OPERATORS,
  canonicalOperator,
  isBuiltinOperator,
  isLogic,
  isStateOperator,
} from '../constants.js';
import type { IssueCollector } from '../types.js';
import { childPath, hasProperty, isObject } from '../types.js';

/** Source of custom operator ids known at validation time. */
export interface OperatorLookup {
  has(id: string): boolean;
}

/** Shared state of one validation run. */
export interface ConditionValidationContext {
  collector: IssueCollector;
  operators: OperatorLookup | undefined;
}

const RANGE_SET: ReadonlySet<string> = new Set(RANGE_OPERATORS);

function validateLogic(value: unknown, path: string, ctx: ConditionValidationContext): void {
  if (!isLogic(value)) {
    ctx.collector.addError(
      path,
      `Invalid logic: ${String(value)}. Valid values: ${LOGIC_OPERATORS.join(', ')}`,
    );
  }
}

/**
 * Validates the `key`/`operator`/`value` triple of a leaf.
 *
 * @returns `true` if the leaf has a non-empty key and operator.
 */
function validateLeafFields(
  leaf: Record<string, unknown>,
  path: string,
  ctx: ConditionValidationContext,
): boolean {
  const { collector } = ctx;
  const key = leaf['key'];
  const operator = leaf['operator'];

  if (key !== undefined && typeof key !== 'string') {
    collector.addError(childPath(path, 'key'), 'Condition key must be a string');
  }
  if (operator !== undefined && typeof operator !== 'string') {
    collector.addError(childPath(path, 'operator'), 'Condition operator must be a string');
  }

  if (typeof key !== 'string' || key === '' || typeof operator !== 'string' || operator === '') {
    return false;
  }

  const canonical = canonicalOperator(operator);
  const operatorPath = childPath(path, 'operator');

  if (!isBuiltinOperator(canonical)) {
    if (ctx.operators === undefined) {
      collector.addWarning(
        operatorPath,
        `Operator "${operator}" is not built-in and must be registered as a custom operator`,
      );
    } else if (!ctx.operators.has(canonical)) {
      collector.addWarning(
        operatorPath,
        `Unknown operator: ${operator}. Built-in operators: ${BUILTIN_OPERATORS.join(', ')}`,
      );
    }
    return true;
  }

  if (isStateOperator(canonical)) {
    return true;
  }

  const valuePath = childPath(path, 'value');
  if (!hasProperty(leaf, 'value')) {
    collector.addWarning(valuePath, `Operator "${operator}" has no "value" to compare against`);
    return true;
  }

  if (RANGE_SET.has(canonical)) {
    const bounds = leaf['value'];
    if (!Array.isArray(bounds) || bounds.length !== 2) {
      collector.addError(valuePath, `Operator "${operator}" requires a [min, max] array`);
    }
  }

  return true;
}

/**
 * Validates a node of the condition tree and all its descendants.
 */
export function validateConditionNode(
  node: unknown,
  path: string,
  ctx: ConditionValidationContext,
): void {
  const { collector } = ctx;

  if (!isObject(node)) {
    collector.addError(path, 'Condition node must be an object');
    return;
  }

  const hasLogic = hasProperty(node, 'logic');
  const hasChildren = hasProperty(node, 'children');
  const children = node['children'];

  if (hasLogic) {
    validateLogic(node['logic'], childPath(path, 'logic'), ctx);
  }

  if (hasChildren) {
    if (!Array.isArray(children)) {
      collector.addError(childPath(path, 'children'), 'Group children must be an array');
    } else {
      for (let i = 0; i < children.length; i++) {
        validateConditionNode(children[i], childPath(path, `children[${i}]`), ctx);
      }
    }
  }

  const isGroup = isLogic(node['logic']) && Array.isArray(children) && children.length > 0;

  if (isGroup) {
    if (hasProperty(node, 'key') || hasProperty(node, 'operator')) {
      collector.addWarning(path, 'Group has "key"/"operator" which are ignored');
    }
    return;
  }

  if (hasLogic && Array.isArray(children) && children.length === 0) {
    collector.addWarning(childPath(path, 'children'), 'Group has no children');
  } else if (hasChildren && !hasLogic) {
    collector.addWarning(childPath(path, 'children'), 'Group children are ignored without "logic"');
  }

  if (!validateLeafFields(node, path, ctx)) {
    collector.addWarning(path, 'Node is neither a group nor a condition and always evaluates to true');
  }
}

/**
 * Validates a chain and all nested chains.
 */
export function validateConditionChain(
  chain: unknown,
  path: string,
  ctx: ConditionValidationContext,
): void {
  const { collector } = ctx;

  if (!isObject(chain)) {
    collector.addError(path, 'Condition chain must be an object');
    return;
  }

  const links = chain['conditions'];
  if (!Array.isArray(links)) {
    collector.addError(childPath(path, 'conditions'), 'Chain conditions must be an array');
    return;
  }

  for (let i = 0; i < links.length; i++) {
    validateChainLink(links[i], childPath(path, `conditions[${i}]`), i === links.length - 1, ctx);
  }
}

function validateChainLink(
  link: unknown,
  path: string,
  isLast: boolean,
  ctx: ConditionValidationContext,
): void {
  const { collector } = ctx;

  if (!isObject(link)) {
    collector.addError(path, 'Chain condition must be an object');
    return;
  }

  const logicField = hasProperty(link, 'next_logic') ? 'next_logic' : 'nextLogic';
  if (hasProperty(link, logicField)) {
    validateLogic(link[logicField], childPath(path, logicField), ctx);
    if (isLast) {
      collector.addWarning(childPath(path, logicField), 'Connective on the last condition is ignored');
    }
  }

  if (hasProperty(link, 'group') && link['group'] !== null && link['group'] !== undefined) {
    if (hasProperty(link, 'key') || hasProperty(link, 'operator')) {
      collector.addWarning(path, 'Condition has both "group" and "key"/"operator"; the group wins');
    }
    validateConditionChain(link['group'], childPath(path, 'group'), ctx);
    return;
  }

  if (!validateLeafFields(link, path, ctx)) {
    const operator = link['operator'];
    if (typeof operator === 'string' && operator !== '') {
      collector.addWarning(path, 'Condition has no key and is evaluated against the empty key ""');
    } else {
      collector.addWarning(path, 'Condition has no operator and always evaluates to false');
    }
  }
}
