import type { ConditionChain, ConditionNode } from '../types/condition.js';
import type { OperatorValidator } from '../types/operator.js';
import type { DataRecord } from '../types/value.js';
import type { OperatorErrorHandler } from '../debugging/types.js';
import { ConditionEvaluator, type EvaluationOptions } from '../evaluation/condition-evaluator.js';
import { convertTreeToChain } from '../evaluation/chain-converter.js';
import { OperatorRegistry } from './operator-registry.js';

export interface ConditionEngineConfig {
  /** Name used as a prefix in log output */
  name?: string;

  /** Shared registry; engines created with the same registry see the same custom operators */
  registry?: OperatorRegistry;

  /** Custom operators registered on start */
  operators?: Record<string, OperatorValidator>;

  /** Receives errors thrown by custom validators. Defaults to `console.error`. */
  onOperatorError?: OperatorErrorHandler;
}

/**
 * Entry point: evaluates conditions and manages custom operators.
 *
 * Every engine owns its registry unless one is passed in, so independent
 * engines (and tests) never see each other's operators.
 *
 * @example
 * ```typescript
 * const engine = new ConditionEngine();
 *
 * engine.registerOperator('iequal', (field, expected) =>
 *   toString(field).toLowerCase() === toString(expected).toLowerCase()
 * );
 *
 * engine.evaluate(
 *   { key: 'country', operator: 'iequal', value: 'th' },
 *   { country: 'TH' }
 * ); // true
 * ```
 */
export class ConditionEngine {
  private readonly registry: OperatorRegistry;
  private readonly evaluator: ConditionEvaluator;

  constructor(config: ConditionEngineConfig = {}) {
    this.registry = config.registry ?? new OperatorRegistry();
    this.evaluator = new ConditionEvaluator({
      registry: this.registry,
      ...(config.name !== undefined && { name: config.name }),
      ...(config.onOperatorError !== undefined && { onOperatorError: config.onOperatorError }),
    });

    for (const [id, validator] of Object.entries(config.operators ?? {})) {
      this.registry.register(id, validator);
    }
  }

  /** Evaluates a condition tree. */
  evaluate(node: ConditionNode, data: DataRecord, options?: EvaluationOptions): boolean {
    return this.evaluator.evaluate(node, data, options);
  }

  /** Evaluates a flat condition chain. */
  evaluateChain(chain: ConditionChain, data: DataRecord, options?: EvaluationOptions): boolean {
    return this.evaluator.evaluateChain(chain, data, options);
  }

  /** Evaluates a tree or a chain, whichever `input` is. */
  evaluateEither(
    input: ConditionNode | ConditionChain,
    data: DataRecord,
    options?: EvaluationOptions
  ): boolean {
    return this.evaluator.evaluateEither(input, data, options);
  }

  /**
   * Registers a custom operator.
   *
   * @throws {OperatorRegistrationError} When the validator is not a function
   *   or the id is empty or built-in.
   */
  registerOperator(id: string, validator: OperatorValidator): void {
    this.registry.register(id, validator);
  }

  /** Removes a custom operator. Returns `true` if it was registered. */
  unregisterOperator(id: string): boolean {
    return this.registry.unregister(id);
  }

  /** Ids of registered custom operators. */
  listOperators(): string[] {
    return this.registry.list();
  }

  /** Converts a tree into the equivalent chain. */
  convertTreeToChain(node: ConditionNode): ConditionChain {
    return convertTreeToChain(node);
  }

  /** The underlying evaluator, sharing this engine's registry. */
  getEvaluator(): ConditionEvaluator {
    return this.evaluator;
  }
}
