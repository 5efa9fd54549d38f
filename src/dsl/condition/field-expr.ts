import type { LeafCondition } from '../../types/condition.js';
import type { FieldValue } from '../../types/value.js';
import type { ConditionBuilder } from '../types.js';
import { DslValidationError } from '../helpers/errors.js';
import { requireNonEmptyString } from '../helpers/validators.js';

/**
 * Fluent leaf condition with one method per built-in operator.
 *
 * Created via the {@link field} helper. Call one operator method and pass
 * the expression to {@link all}, {@link any} or {@link ChainBuilder.add}.
 *
 * @example
 * ```typescript
 * field('age').gte(18)
 * field('email').ilike('%@example.com')
 * field('score').between(10, 20)
 * field('country').op('iequal', 'th')   // custom operator
 * ```
 */
export class FieldExpr implements ConditionBuilder {
  private readonly key: string;
  private operator?: string;
  private value?: FieldValue;

  constructor(key: string) {
    requireNonEmptyString(key, 'field() key');
    this.key = key;
  }

  private set(operator: string, value?: FieldValue): FieldExpr {
    this.operator = operator;
    this.value = value;
    return this;
  }

  /** Equal: loose equality (deep, then numeric, then string form). */
  eq(value: FieldValue): FieldExpr {
    return this.set('eq', value);
  }

  /** Not equal: negation of {@link eq}. */
  neq(value: FieldValue): FieldExpr {
    return this.set('neq', value);
  }

  /** Greater than. Compares numerically, then as instants, then as strings. */
  gt(value: FieldValue): FieldExpr {
    return this.set('gt', value);
  }

  /** Greater than or equal. */
  gte(value: FieldValue): FieldExpr {
    return this.set('gte', value);
  }

  /** Less than. */
  lt(value: FieldValue): FieldExpr {
    return this.set('lt', value);
  }

  /** Less than or equal. */
  lte(value: FieldValue): FieldExpr {
    return this.set('lte', value);
  }

  /**
   * In: matches when the value equals an element of a sequence, a key of a
   * mapping, or is a substring of a string.
   */
  in(collection: FieldValue): FieldExpr {
    return this.set('in', collection);
  }

  /** Not in: negation of {@link in}. */
  nin(collection: FieldValue): FieldExpr {
    return this.set('nin', collection);
  }

  /** Contains: the value's string form contains `needle`. */
  contains(needle: FieldValue): FieldExpr {
    return this.set('contains', needle);
  }

  /** Does not contain. */
  ncontains(needle: FieldValue): FieldExpr {
    return this.set('ncontains', needle);
  }

  /** SQL LIKE: `%` matches any run of characters, `_` exactly one. */
  like(pattern: string): FieldExpr {
    return this.set('like', pattern);
  }

  /** Case-insensitive {@link like}. */
  ilike(pattern: string): FieldExpr {
    return this.set('ilike', pattern);
  }

  /** Negation of {@link like}. */
  nlike(pattern: string): FieldExpr {
    return this.set('nlike', pattern);
  }

  startsWith(prefix: string): FieldExpr {
    return this.set('startswith', prefix);
  }

  endsWith(suffix: string): FieldExpr {
    return this.set('endswith', suffix);
  }

  /** Inclusive range check: `min <= value <= max`. */
  between(min: FieldValue, max: FieldValue): FieldExpr {
    return this.set('between', [min, max]);
  }

  /** Negation of {@link between}. */
  notBetween(min: FieldValue, max: FieldValue): FieldExpr {
    return this.set('notbetween', [min, max]);
  }

  /** Key is absent or holds `null`/`undefined`. */
  isNull(): FieldExpr {
    return this.set('isnull');
  }

  isNotNull(): FieldExpr {
    return this.set('isnotnull');
  }

  /** Key is absent or holds an empty string, sequence or mapping. */
  isEmpty(): FieldExpr {
    return this.set('isempty');
  }

  isNotEmpty(): FieldExpr {
    return this.set('isnotempty');
  }

  /** Value is truthy (`true`, `"TRUE"`, a non-zero number, a non-empty collection). */
  isTrue(): FieldExpr {
    return this.set('istrue');
  }

  isFalse(): FieldExpr {
    return this.set('isfalse');
  }

  /**
   * Any operator by id, including custom operators registered at runtime.
   *
   * @param operator - Operator id, e.g. `'iequal'` or `'>='`.
   * @param value - Comparison operand passed to the operator.
   */
  op(operator: string, value?: FieldValue): FieldExpr {
    requireNonEmptyString(operator, 'op() operator');
    return this.set(operator, value);
  }

  /**
   * @throws {DslValidationError} If no operator method was called.
   */
  build(): LeafCondition {
    if (this.operator === undefined) {
      throw new DslValidationError(`Condition on field "${this.key}" has no operator`);
    }
    return this.value === undefined
      ? { key: this.key, operator: this.operator }
      : { key: this.key, operator: this.operator, value: this.value };
  }
}

/**
 * Starts a leaf condition on a data key.
 *
 * @param key - Key looked up in the data record.
 */
export function field(key: string): FieldExpr {
  return new FieldExpr(key);
}
