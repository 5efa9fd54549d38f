/**
 * Debugging types for condition tracing.
 */

import type { FieldValue } from '../types/value.js';
import type { OperatorKind } from '../types/operator.js';

/** Detailed information about a single leaf evaluation */
export interface ConditionEvaluationResult {
  /** Location of the leaf in the evaluated structure, e.g. `children[1].children[0]` */
  path: string;

  /** Key looked up in the data record */
  key: string;

  /** Operator as written in the condition */
  operator: string;

  /** Which part of the engine answered the operator */
  operatorKind: OperatorKind;

  /** Whether the key is present in the data record */
  exists: boolean;

  /** The value found under the key (`undefined` when absent) */
  actualValue: FieldValue;

  /** The condition's comparison operand */
  expectedValue: FieldValue;

  /** Whether the condition passed */
  result: boolean;

  /** Duration of evaluation in milliseconds */
  durationMs: number;
}

/** Callback invoked after each leaf evaluation */
export type ConditionEvaluationCallback = (result: ConditionEvaluationResult) => void;

/** Information about a custom operator that threw */
export interface OperatorFailure {
  operator: string;
  key: string;
  path: string;
}

/** Callback receiving errors thrown by custom operator validators */
export type OperatorErrorHandler = (error: unknown, failure: OperatorFailure) => void;
