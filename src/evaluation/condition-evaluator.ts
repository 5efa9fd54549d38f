import {
  classifyNode,
  isConditionChain,
  isConditionNode,
  type ChainLink,
  type ConditionChain,
  type ConditionNode,
  type LeafCondition,
  type Logic,
} from '../types/condition.js';
import type { DataRecord, FieldValue } from '../types/value.js';
import type { OperatorKind, OperatorValidator } from '../types/operator.js';
import type {
  ConditionEvaluationCallback,
  OperatorErrorHandler,
  OperatorFailure,
} from '../debugging/types.js';
import { OperatorRegistry } from '../core/operator-registry.js';
import { evaluateComparisonOperator, evaluateStateOperator } from '../utils/operators.js';
import {
  canonicalOperator,
  isComparisonOperator,
  isStateOperator,
} from '../validation/constants.js';

export interface ConditionEvaluatorConfig {
  /** Name used as a prefix in log output */
  name?: string;

  /** Registry of custom operators; a fresh one is created when omitted */
  registry?: OperatorRegistry;

  /** Receives errors thrown by custom validators. Defaults to `console.error`. */
  onOperatorError?: OperatorErrorHandler;
}

/** Options for condition evaluation with optional tracing */
export interface EvaluationOptions {
  /** Callback invoked after each leaf evaluation */
  onConditionEvaluated?: ConditionEvaluationCallback;
}

function joinPath(base: string, segment: string): string {
  return base === '' ? segment : `${base}.${segment}`;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

function combine(left: boolean, right: boolean, logic: Logic | undefined): boolean {
  return logic === 'OR' ? left || right : left && right;
}

/**
 * Evaluates conditions in both the tree form and the flat chain form.
 *
 * Evaluation is synchronous, never mutates its inputs and never throws:
 * unknown operators, missing keys and values that do not coerce all make a
 * leaf false. An error thrown by a custom validator is reported through
 * `onOperatorError` and makes only that leaf false. So is a validator that
 * returns a promise, together with the promise's rejection.
 */
export class ConditionEvaluator {
  readonly registry: OperatorRegistry;
  private readonly name: string;
  private readonly operatorErrorHandler: OperatorErrorHandler;

  constructor(config: ConditionEvaluatorConfig = {}) {
    this.name = config.name ?? 'conditions';
    this.registry = config.registry ?? new OperatorRegistry();
    this.operatorErrorHandler = config.onOperatorError ?? ((error, failure) => {
      console.error(
        `[${this.name}] Error in custom operator "${failure.operator}" at ${failure.path}:`,
        error
      );
    });
  }

  /**
   * Evaluates a condition tree.
   *
   * AND groups stop at the first false child, OR groups at the first true
   * child. A node that is neither a group nor a leaf evaluates to true.
   */
  evaluate(node: ConditionNode, data: DataRecord, options?: EvaluationOptions): boolean {
    return this.evaluateNode(node, data, '', options);
  }

  /**
   * Evaluates a flat condition chain as a left fold.
   *
   * Every link is evaluated; the result so far is combined with each link
   * using the previous link's `nextLogic` (AND when absent). An empty chain
   * is true.
   */
  evaluateChain(chain: ConditionChain, data: DataRecord, options?: EvaluationOptions): boolean {
    return this.evaluateLinks(chain, data, '', options);
  }

  /**
   * Evaluates either form, dispatching on its shape. Anything that is neither
   * a chain nor a tree node evaluates to false.
   */
  evaluateEither(
    input: ConditionNode | ConditionChain,
    data: DataRecord,
    options?: EvaluationOptions
  ): boolean {
    if (isConditionChain(input)) {
      return this.evaluateChain(input, data, options);
    }
    if (isConditionNode(input)) {
      return this.evaluate(input, data, options);
    }
    return false;
  }

  /**
   * Evaluates one `(key, operator, value)` leaf.
   */
  evaluateLeaf(leaf: LeafCondition, data: DataRecord, options?: EvaluationOptions): boolean {
    return this.evaluateLeafAt(leaf, data, '', options);
  }

  private evaluateNode(
    node: ConditionNode,
    data: DataRecord,
    path: string,
    options: EvaluationOptions | undefined
  ): boolean {
    const classified = classifyNode(node);

    switch (classified.kind) {
      case 'group': {
        const { logic, children } = classified.group;
        for (let i = 0; i < children.length; i++) {
          const child = children[i];
          if (child === undefined) continue;
          const result = this.evaluateNode(child, data, joinPath(path, `children[${i}]`), options);
          if (logic === 'AND' && !result) return false;
          if (logic === 'OR' && result) return true;
        }
        return logic === 'AND';
      }

      case 'leaf':
        return this.evaluateLeafAt(classified.leaf, data, path, options);

      case 'degenerate':
        return true;
    }
  }

  private evaluateLinks(
    chain: ConditionChain,
    data: DataRecord,
    path: string,
    options: EvaluationOptions | undefined
  ): boolean {
    let result = true;
    let previous: ChainLink | undefined;

    chain.conditions.forEach((link, i) => {
      const current = this.evaluateLink(link, data, joinPath(path, `conditions[${i}]`), options);
      result = previous === undefined ? current : combine(result, current, previous.nextLogic);
      previous = link;
    });

    return result;
  }

  private evaluateLink(
    link: ChainLink,
    data: DataRecord,
    path: string,
    options: EvaluationOptions | undefined
  ): boolean {
    if (link.group !== undefined) {
      return this.evaluateLinks(link.group, data, joinPath(path, 'group'), options);
    }
    const leaf: LeafCondition = {
      key: link.key ?? '',
      operator: link.operator ?? '',
      value: link.value,
    };
    return this.evaluateLeafAt(leaf, data, path, options);
  }

  private evaluateLeafAt(
    leaf: LeafCondition,
    data: DataRecord,
    path: string,
    options: EvaluationOptions | undefined
  ): boolean {
    const startTime = options?.onConditionEvaluated ? performance.now() : 0;

    const exists = Object.hasOwn(data, leaf.key);
    const actualValue: FieldValue = exists ? data[leaf.key] : undefined;
    const expectedValue: FieldValue = leaf.value;
    const operator = canonicalOperator(leaf.operator);

    let operatorKind: OperatorKind;
    let result: boolean;

    if (isStateOperator(operator)) {
      operatorKind = 'state';
      result = evaluateStateOperator(operator, actualValue, exists);
    } else if (exists && isComparisonOperator(operator)) {
      operatorKind = 'builtin';
      result = evaluateComparisonOperator(operator, actualValue, expectedValue);
    } else {
      // Built-in comparisons need the key; custom operators get undefined for it.
      const validator = this.registry.get(operator);
      if (validator) {
        operatorKind = 'custom';
        result = this.invokeCustom(validator, actualValue, expectedValue, {
          operator: leaf.operator,
          key: leaf.key,
          path: path || '(root)',
        });
      } else {
        operatorKind = isComparisonOperator(operator) ? 'builtin' : 'unknown';
        result = false;
      }
    }

    if (options?.onConditionEvaluated) {
      options.onConditionEvaluated({
        path: path || '(root)',
        key: leaf.key,
        operator: leaf.operator,
        operatorKind,
        exists,
        actualValue,
        expectedValue,
        result,
        durationMs: performance.now() - startTime,
      });
    }

    return result;
  }

  private invokeCustom(
    validator: OperatorValidator,
    actualValue: FieldValue,
    expectedValue: FieldValue,
    failure: OperatorFailure
  ): boolean {
    let outcome: unknown;
    try {
      outcome = validator(actualValue, expectedValue);
    } catch (error) {
      this.operatorErrorHandler(error, failure);
      return false;
    }

    // An async validator cannot be awaited here: the leaf is false, a rejection is still reported.
    if (isPromiseLike(outcome)) {
      this.operatorErrorHandler(
        new TypeError(`Custom operator "${failure.operator}" returned a promise; validators must be synchronous`),
        failure
      );
      void Promise.resolve(outcome).then(undefined, (error: unknown) => {
        this.operatorErrorHandler(error, failure);
      });
      return false;
    }

    return outcome === true;
  }
}
