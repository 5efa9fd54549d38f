import type { OperatorValidator } from '../types/operator.js';
import { isBuiltinOperator } from '../validation/constants.js';

/**
 * Thrown when an operator is registered incorrectly.
 *
 * This is a programming error on the caller's side and is never caught by
 * the engine.
 */
export class OperatorRegistrationError extends Error {
  readonly operator: string;

  constructor(message: string, operator: string) {
    super(message);
    this.name = 'OperatorRegistrationError';
    this.operator = operator;
  }
}

export interface OperatorRegistryConfig {
  /** Operators registered at construction time. */
  operators?: Record<string, OperatorValidator>;
}

/**
 * Table of custom operators, extensible at runtime.
 *
 * Built-in operators are never stored here and cannot be overridden or
 * removed through this API.
 *
 * Writes replace the whole table with a new frozen snapshot instead of
 * mutating it. A lookup therefore always sees either the old or the new
 * table, readers never wait for each other, and the evaluator holds nothing
 * while a validator runs, so a validator may itself register or unregister
 * operators.
 */
export class OperatorRegistry {
  private snapshot: ReadonlyMap<string, OperatorValidator> = new Map();

  constructor(config: OperatorRegistryConfig = {}) {
    for (const [id, validator] of Object.entries(config.operators ?? {})) {
      this.register(id, validator);
    }
  }

  /**
   * Registers a custom operator, replacing any previous one with the same id.
   *
   * @throws {OperatorRegistrationError} When the validator is not a function,
   *   the id is empty, or the id names a built-in operator.
   */
  register(id: string, validator: OperatorValidator): void {
    if (typeof validator !== 'function') {
      throw new OperatorRegistrationError(`Validator for operator "${id}" must be a function`, id);
    }
    if (id === '') {
      throw new OperatorRegistrationError('Operator id must be a non-empty string', id);
    }
    if (isBuiltinOperator(id)) {
      throw new OperatorRegistrationError(`Operator "${id}" is built-in and cannot be overridden`, id);
    }

    const next = new Map(this.snapshot);
    next.set(id, validator);
    this.snapshot = next;
  }

  /**
   * Removes a custom operator.
   *
   * @returns `true` if the operator was registered.
   */
  unregister(id: string): boolean {
    if (!this.snapshot.has(id)) {
      return false;
    }
    const next = new Map(this.snapshot);
    next.delete(id);
    this.snapshot = next;
    return true;
  }

  /** Looks up a validator. */
  get(id: string): OperatorValidator | undefined {
    return this.snapshot.get(id);
  }

  has(id: string): boolean {
    return this.snapshot.has(id);
  }

  /** Snapshot of registered ids, in no particular order. */
  list(): string[] {
    return [...this.snapshot.keys()];
  }

  get size(): number {
    return this.snapshot.size;
  }

  /**
   * Removes all custom operators. Useful for tests.
   */
  clear(): void {
    this.snapshot = new Map();
  }
}
