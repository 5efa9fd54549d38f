import type { ChainLink, ConditionChain, LeafCondition, Logic } from '../../types/condition.js';
import type { ChainInput, ChainSource, ConditionBuilder, LeafInput } from '../types.js';
import { DslValidationError } from '../helpers/errors.js';

function isChainSource(input: ChainInput): input is ChainSource {
  return 'build' in input && typeof input.build === 'function';
}

function isLeafBuilder(input: LeafInput): input is ConditionBuilder {
  return 'build' in input && typeof input.build === 'function';
}

function toLeaf(input: LeafInput): LeafCondition {
  return isLeafBuilder(input) ? input.build() : input;
}

/**
 * Fluent builder for flat condition chains.
 *
 * Links are evaluated left to right; `.and()` / `.or()` set the connective
 * between the previous link and the next one. Without an explicit
 * connective, links are joined with AND.
 *
 * @example
 * ```typescript
 * const eligibility = chain()
 *   .add(field('sum_insured').gte(200_000))
 *   .and()
 *   .group(
 *     chain()
 *       .add(field('amount').gte(100_000))
 *       .or()
 *       .add(field('amount').lte(1_000_000))
 *   )
 *   .build();
 * ```
 */
export class ChainBuilder implements ChainSource {
  private readonly links: ChainLink[] = [];

  /**
   * Appends a leaf link.
   *
   * @param leaf - Leaf condition or {@link FieldExpr}.
   * @returns `this` for chaining.
   */
  add(leaf: LeafInput): this {
    const { key, operator, value } = toLeaf(leaf);
    this.links.push(value === undefined ? { key, operator } : { key, operator, value });
    return this;
  }

  /**
   * Appends a nested chain evaluated as a single link.
   *
   * @returns `this` for chaining.
   */
  group(nested: ChainInput): this {
    this.links.push({ group: isChainSource(nested) ? nested.build() : nested });
    return this;
  }

  /**
   * Joins the previous link to the next one with AND.
   *
   * @throws {DslValidationError} If there is no previous link.
   */
  and(): this {
    return this.connect('AND');
  }

  /**
   * Joins the previous link to the next one with OR.
   *
   * @throws {DslValidationError} If there is no previous link.
   */
  or(): this {
    return this.connect('OR');
  }

  private connect(logic: Logic): this {
    const previous = this.links[this.links.length - 1];
    if (previous === undefined) {
      throw new DslValidationError(`${logic.toLowerCase()}() must follow a condition`);
    }
    previous.nextLogic = logic;
    return this;
  }

  /**
   * Builds the chain. A trailing connective on the last link is dropped.
   */
  build(): ConditionChain {
    const conditions = this.links.map((link) => ({ ...link }));
    const last = conditions[conditions.length - 1];
    if (last !== undefined) {
      delete last.nextLogic;
    }
    return { conditions };
  }
}

/** Starts a new chain. */
export function chain(): ChainBuilder {
  return new ChainBuilder();
}
