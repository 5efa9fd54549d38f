/**
 * DSL for **condition-engine**.
 *
 * Two complementary ways to define conditions:
 *
 * 1. **Fluent Builder API**: TypeScript-native, type-safe, IDE-friendly.
 * 2. **YAML/JSON Loader**: external condition and data files.
 *
 * @example
 * ```typescript
 * import { all, any, chain, field } from 'condition-engine/dsl';
 *
 * const tree = all(
 *   field('age').gte(18),
 *   any(field('country').eq('TH'), field('country').eq('VN')),
 * );
 *
 * const flat = chain()
 *   .add(field('sum_insured').gte(200_000))
 *   .or()
 *   .add(field('vip').isTrue())
 *   .build();
 * ```
 *
 * @module dsl
 */

// Conditions
export { field, FieldExpr } from './condition/field-expr.js';

// Tree groups
export { all, any, toNode } from './builder/group-builder.js';

// Chains
export { chain, ChainBuilder } from './builder/chain-builder.js';

// YAML / JSON
export {
  loadConditionFromYAML,
  loadConditionFromFile,
  loadDataFromYAML,
  loadDataFromFile,
  YamlLoadError,
  parseConditionInput,
  parseConditionNode,
  parseConditionChain,
  parseDataRecord,
  toFieldValue,
  toWireFormat,
  YamlValidationError,
} from './yaml/index.js';
export type { WireConditionNode, WireChainLink, WireConditionChain } from './yaml/index.js';

// Errors
export { DslError, DslValidationError } from './helpers/errors.js';

// Types
export type { ConditionBuilder, ChainSource, NodeInput, LeafInput, ChainInput } from './types.js';
