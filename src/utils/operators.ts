import type { FieldValue } from '../types/value.js';
import type { ComparisonOperator, StateOperator } from '../validation/constants.js';
import { compareValues, isEmpty, isEqual, isPlainMapping, toBool, toString } from './coercion.js';

/**
 * Přeloží SQL LIKE vzor na ukotvený regulární výraz.
 * `%` odpovídá libovolnému úseku, `_` právě jednomu znaku, vše ostatní doslovně.
 * Vzory pocházejí z dat podmínek, proto se kompilují při každém volání a nic se neukládá.
 */
export function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '%') source += '.*';
    else if (ch === '_') source += '.';
    else source += ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  }
  return new RegExp(`^${source}$`, 'su');
}

function isNil(value: FieldValue): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Vyhodnotí stavový operátor. Klíč nemusí v datech existovat.
 */
export function evaluateStateOperator(
  operator: StateOperator,
  value: FieldValue,
  exists: boolean
): boolean {
  switch (operator) {
    case 'isnull':
      return !exists || isNil(value);
    case 'isnotnull':
      return exists && !isNil(value);
    case 'isempty':
      return isEmpty(value);
    case 'isnotempty':
      return !isEmpty(value);
    case 'istrue':
      return toBool(value);
    case 'isfalse':
      return !toBool(value);
  }
}

/**
 * Zjistí, zda hodnota patří do kolekce.
 * Sekvence: rovnost s některým prvkem. Mapa: rovnost s některým klíčem.
 * Řetězec: hodnota je jeho podřetězcem.
 */
function isIn(value: FieldValue, collection: FieldValue): boolean {
  if (isNil(collection)) return false;

  if (typeof collection === 'string') {
    return collection.includes(toString(value));
  }
  if (Array.isArray(collection) || collection instanceof Set) {
    for (const item of collection) {
      if (isEqual(value, item)) return true;
    }
    return false;
  }
  if (collection instanceof Map) {
    for (const key of collection.keys()) {
      if (isEqual(value, key)) return true;
    }
    return false;
  }
  if (isPlainMapping(collection)) {
    return Object.keys(collection).some((key) => isEqual(value, key));
  }
  return false;
}

function contains(haystack: FieldValue, needle: FieldValue): boolean {
  if (isNil(haystack) || isNil(needle)) return false;
  return toString(haystack).includes(toString(needle));
}

function like(value: FieldValue, pattern: FieldValue, caseInsensitive: boolean): boolean {
  if (isNil(value) || isNil(pattern)) return false;

  let text = toString(value);
  let pat = toString(pattern);
  if (caseInsensitive) {
    text = text.toLowerCase();
    pat = pat.toLowerCase();
  }
  return likeToRegExp(pat).test(text);
}

function startsWith(value: FieldValue, prefix: FieldValue): boolean {
  if (isNil(value) || isNil(prefix)) return false;
  return toString(value).startsWith(toString(prefix));
}

function endsWith(value: FieldValue, suffix: FieldValue): boolean {
  if (isNil(value) || isNil(suffix)) return false;
  return toString(value).endsWith(toString(suffix));
}

/**
 * Zjistí, zda hodnota leží v uzavřeném intervalu `[min, max]`.
 * Hranice musí být pole o právě dvou prvcích.
 */
function between(value: FieldValue, bounds: FieldValue): boolean {
  if (isNil(value) || !Array.isArray(bounds) || bounds.length !== 2) return false;

  const [min, max]: readonly FieldValue[] = bounds;
  return compareValues(value, min) >= 0 && compareValues(value, max) <= 0;
}

/**
 * Vyhodnotí vestavěný porovnávací operátor nad existující hodnotou.
 */
export function evaluateComparisonOperator(
  operator: ComparisonOperator,
  value: FieldValue,
  expected: FieldValue
): boolean {
  switch (operator) {
    case 'eq':
      return isEqual(value, expected);

    case 'neq':
      return !isEqual(value, expected);

    case 'gt':
      return compareValues(value, expected) > 0;

    case 'gte':
      return compareValues(value, expected) >= 0;

    case 'lt':
      return compareValues(value, expected) < 0;

    case 'lte':
      return compareValues(value, expected) <= 0;

    case 'in':
      return isIn(value, expected);

    case 'nin':
      return !isIn(value, expected);

    case 'contains':
      return contains(value, expected);

    case 'ncontains':
      return !contains(value, expected);

    case 'like':
      return like(value, expected, false);

    case 'ilike':
      return like(value, expected, true);

    case 'nlike':
      return !like(value, expected, false);

    case 'startswith':
      return startsWith(value, expected);

    case 'endswith':
      return endsWith(value, expected);

    case 'between':
      return between(value, expected);

    case 'notbetween':
      return !between(value, expected);
  }
}
