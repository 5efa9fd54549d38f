/**
 * Shared condition constants.
 *
 * Single source of truth for built-in operators, their symbolic aliases and
 * logic connectives. Used by the evaluator, the operator registry, the
 * validator, the YAML loader and the CLI.
 *
 * @module
 */

export const LOGIC_OPERATORS = ['AND', 'OR'] as const;
export type LogicOperator = (typeof LOGIC_OPERATORS)[number];

/** Operators answered from key presence and value state alone. */
export const STATE_OPERATORS = [
  'isnull', 'isnotnull', 'isempty', 'isnotempty', 'istrue', 'isfalse',
] as const;
export type StateOperator = (typeof STATE_OPERATORS)[number];

/** Operators that require the key to be present in the data record. */
export const COMPARISON_OPERATORS = [
  'eq', 'neq', 'gt', 'gte', 'lt', 'lte',
  'in', 'nin', 'contains', 'ncontains',
  'like', 'ilike', 'nlike',
  'startswith', 'endswith',
  'between', 'notbetween',
] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const BUILTIN_OPERATORS = [...STATE_OPERATORS, ...COMPARISON_OPERATORS] as const;
export type BuiltinOperator = (typeof BUILTIN_OPERATORS)[number];

/** Symbolic spellings accepted in place of the canonical identifiers. */
export const OPERATOR_ALIASES = {
  '==': 'eq',
  '!=': 'neq',
  '>': 'gt',
  '>=': 'gte',
  '<': 'lt',
  '<=': 'lte',
} as const satisfies Record<string, ComparisonOperator>;
export type OperatorAlias = keyof typeof OPERATOR_ALIASES;

/** Operators whose value must be a `[min, max]` pair. */
export const RANGE_OPERATORS = ['between', 'notbetween'] as const;

const BUILTIN_SET: ReadonlySet<string> = new Set(BUILTIN_OPERATORS);
const STATE_SET: ReadonlySet<string> = new Set(STATE_OPERATORS);
const COMPARISON_SET: ReadonlySet<string> = new Set(COMPARISON_OPERATORS);
const ALIAS_MAP: ReadonlyMap<string, ComparisonOperator> = new Map(Object.entries(OPERATOR_ALIASES));

/** Resolves a symbolic alias to its canonical identifier; other ids pass through. */
export function canonicalOperator(id: string): string {
  return ALIAS_MAP.get(id) ?? id;
}

/** Checks whether `id` (canonical or alias) names a built-in operator. */
export function isBuiltinOperator(id: string): id is BuiltinOperator | OperatorAlias {
  return BUILTIN_SET.has(canonicalOperator(id));
}

/** Checks whether `id` is one of the key-independent state operators. */
export function isStateOperator(id: string): id is StateOperator {
  return STATE_SET.has(id);
}

/** Checks whether `id` is a canonical key-requiring built-in operator. */
export function isComparisonOperator(id: string): id is ComparisonOperator {
  return COMPARISON_SET.has(id);
}

/** Checks whether a value is a valid logic connective. */
export function isLogic(value: unknown): value is LogicOperator {
  return value === 'AND' || value === 'OR';
}
