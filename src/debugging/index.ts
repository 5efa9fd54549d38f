export type {
  ConditionEvaluationResult,
  ConditionEvaluationCallback,
  OperatorFailure,
  OperatorErrorHandler,
} from './types.js';
