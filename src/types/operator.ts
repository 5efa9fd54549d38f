import type { FieldValue } from './value.js';

/**
 * Validator of a custom operator.
 *
 * Receives the value stored under the condition key (`undefined` when the
 * key is absent) and the condition's expected value.
 */
export type OperatorValidator = (fieldValue: FieldValue, expectedValue: FieldValue) => boolean;

/** Where the result of a leaf evaluation came from. */
export type OperatorKind = 'state' | 'builtin' | 'custom' | 'unknown';
