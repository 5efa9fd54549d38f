import type { ConditionChain, ConditionNode, LeafCondition } from '../types/condition.js';

/**
 * Builder interface for leaf conditions.
 *
 * Implemented by {@link FieldExpr} to provide a fluent operator API.
 */
export interface ConditionBuilder {
  /** Builds and returns the underlying {@link LeafCondition} object. */
  build(): LeafCondition;
}

/**
 * Builder interface for chains.
 *
 * Implemented by {@link ChainBuilder}.
 */
export interface ChainSource {
  /** Builds and returns the underlying {@link ConditionChain} object. */
  build(): ConditionChain;
}

/** A tree node, or a builder producing a leaf. Accepted by {@link all} and {@link any}. */
export type NodeInput = ConditionNode | ConditionBuilder;

/** A leaf, or a builder producing one. Accepted by {@link ChainBuilder.add}. */
export type LeafInput = LeafCondition | ConditionBuilder;

/** A chain, or a builder producing one. Accepted by {@link ChainBuilder.group}. */
export type ChainInput = ConditionChain | ChainSource;
