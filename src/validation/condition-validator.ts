/**
 * Condition input validator.
 *
 * Validates a condition tree or chain and returns all issues (errors +
 * warnings) rather than throwing on the first problem. Accepts both the wire
 * shape (`next_logic`) and the in-memory shape (`nextLogic`).
 *
 * @module
 */

import { IssueCollector, isObject } from './types.js';
import type { ValidationResult } from './types.js';
import {
  validateConditionChain,
  validateConditionNode,
  type ConditionValidationContext,
  type OperatorLookup,
} from './validators/condition.js';

/** Options for {@link ConditionInputValidator}. */
export interface ValidatorOptions {
  /** When true, warnings also make the result invalid. */
  strict?: boolean;

  /**
   * Custom operators known to the caller, typically an `OperatorRegistry`.
   * When given, unregistered non-built-in operators are reported by name.
   */
  operators?: OperatorLookup;
}

/**
 * Validates condition inputs against the expected shape.
 *
 * ```ts
 * const v = new ConditionInputValidator({ operators: engineRegistry });
 * const result = v.validate(unknownInput);
 * if (!result.valid) { … }
 * ```
 */
export class ConditionInputValidator {
  private readonly strict: boolean;
  private readonly operators: OperatorLookup | undefined;

  constructor(options: ValidatorOptions = {}) {
    this.strict = options.strict ?? false;
    this.operators = options.operators;
  }

  /** Validates a tree node or a chain, whichever `input` looks like. */
  validate(input: unknown): ValidationResult {
    const ctx = this.createContext();

    if (!isObject(input)) {
      ctx.collector.addError('', 'Condition must be an object');
    } else if ('conditions' in input) {
      validateConditionChain(input, '', ctx);
    } else {
      validateConditionNode(input, '', ctx);
    }

    return ctx.collector.toResult(this.strict);
  }

  /** Validates input that must be a tree. */
  validateTree(input: unknown): ValidationResult {
    const ctx = this.createContext();
    validateConditionNode(input, '', ctx);
    return ctx.collector.toResult(this.strict);
  }

  /** Validates input that must be a chain. */
  validateChain(input: unknown): ValidationResult {
    const ctx = this.createContext();
    validateConditionChain(input, '', ctx);
    return ctx.collector.toResult(this.strict);
  }

  private createContext(): ConditionValidationContext {
    return { collector: new IssueCollector(), operators: this.operators };
  }
}
