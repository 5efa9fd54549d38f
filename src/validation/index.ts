/**
 * Shared condition validation module.
 *
 * @module
 */

// Types
export type { ValidationIssue, ValidationResult } from './types.js';

// Constants
export {
  LOGIC_OPERATORS,
  STATE_OPERATORS,
  COMPARISON_OPERATORS,
  BUILTIN_OPERATORS,
  OPERATOR_ALIASES,
  RANGE_OPERATORS,
  canonicalOperator,
  isBuiltinOperator,
  isStateOperator,
  isComparisonOperator,
  isLogic,
} from './constants.js';
export type {
  LogicOperator,
  StateOperator,
  ComparisonOperator,
  BuiltinOperator,
  OperatorAlias,
} from './constants.js';

// Validator
export { ConditionInputValidator } from './condition-validator.js';
export type { ValidatorOptions } from './condition-validator.js';
export type { OperatorLookup } from './validators/condition.js';
