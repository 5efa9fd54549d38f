export {
  toNumber,
  toString,
  toBool,
  toTime,
  toEpochNanos,
  isEmpty,
  isEqual,
  isPlainMapping,
  compareValues,
  type Ordering,
} from './coercion.js';
export {
  evaluateStateOperator,
  evaluateComparisonOperator,
  likeToRegExp,
} from './operators.js';
