/**
 * Values the engine compares.
 *
 * The union is closed on purpose: every operator works on these shapes
 * through the coercion helpers in `utils/coercion.ts`.
 */

/** Plain mapping of string keys to values (JSON object, YAML map). */
export interface FieldMapping {
  readonly [key: string]: FieldValue;
}

/**
 * Any value that can appear in a data record or as a comparison operand.
 *
 * - `undefined` stands for an absent key or an unset optional reference
 * - `bigint` stands for a 64-bit integer (epoch seconds when read as a time)
 * - `Date` is the native instant
 */
export type FieldValue =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Date
  | readonly FieldValue[]
  | ReadonlyMap<FieldValue, FieldValue>
  | ReadonlySet<FieldValue>
  | FieldMapping;

/** Data evaluated against a condition. Never mutated by the engine. */
export type DataRecord = Readonly<Record<string, FieldValue>>;
