export { ConditionEvaluator } from './condition-evaluator.js';
export type { ConditionEvaluatorConfig, EvaluationOptions } from './condition-evaluator.js';
export { convertTreeToChain } from './chain-converter.js';
