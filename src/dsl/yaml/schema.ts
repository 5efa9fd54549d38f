/**
 * Wire-format validation and transformation into condition structures.
 *
 * The wire format is what JSON and YAML files contain:
 *
 * - tree: `{ logic, children }` groups and `{ key, operator, value }` leaves
 * - chain: `{ conditions: [{ key, operator, value, group, next_logic }] }`
 *
 * Only the shape is checked here (field types, `logic` values); semantic
 * warnings are the job of `ConditionInputValidator`.
 *
 * @module
 */

import type {
  ChainLink,
  ConditionChain,
  ConditionNode,
  Logic,
} from '../../types/condition.js';
import { isConditionChain } from '../../types/condition.js';
import type { DataRecord, FieldValue } from '../../types/value.js';
import { YamlValidationError } from '../helpers/errors.js';
import { LOGIC_OPERATORS, isLogic } from '../../validation/constants.js';

export { YamlValidationError };

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

/** Tree node as written in JSON/YAML. */
export interface WireConditionNode {
  logic?: Logic;
  children?: WireConditionNode[];
  key?: string;
  operator?: string;
  value?: FieldValue;
}

/** Chain link as written in JSON/YAML. */
export interface WireChainLink {
  key?: string;
  operator?: string;
  value?: FieldValue;
  group?: WireConditionChain;
  next_logic?: Logic;
}

/** Chain as written in JSON/YAML. */
export interface WireConditionChain {
  conditions: WireChainLink[];
}

// ---------------------------------------------------------------------------
// Primitive validators
// ---------------------------------------------------------------------------

function has(obj: Record<string, unknown>, key: string): boolean {
  return key in obj && obj[key] !== undefined && obj[key] !== null;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function requireObject(value: unknown, path: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new YamlValidationError(`must be an object, got ${describe(value)}`, path);
  }
  return Object.fromEntries(Object.entries(value));
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new YamlValidationError(`must be an array, got ${describe(value)}`, path);
  }
  return value;
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new YamlValidationError(`must be a string, got ${describe(value)}`, path);
  }
  return value;
}

function requireLogic(value: unknown, path: string): Logic {
  if (!isLogic(value)) {
    throw new YamlValidationError(
      `invalid logic ${JSON.stringify(value)}. Expected: ${LOGIC_OPERATORS.join(', ')}`,
      path,
    );
  }
  return value;
}

/**
 * Checks that a parsed value fits the {@link FieldValue} union and returns it.
 */
export function toFieldValue(value: unknown, path: string): FieldValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    value instanceof Date
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown, i: number) => toFieldValue(item, `${path}[${i}]`));
  }

  if (typeof value === 'object') {
    const mapping: Record<string, FieldValue> = {};
    for (const [k, v] of Object.entries(value)) {
      mapping[k] = toFieldValue(v, `${path}.${k}`);
    }
    return mapping;
  }

  throw new YamlValidationError(`unsupported value of type ${typeof value}`, path);
}

// ---------------------------------------------------------------------------
// Leaf fields (shared by tree nodes and chain links)
// ---------------------------------------------------------------------------

interface LeafFields {
  key?: string;
  operator?: string;
  value?: FieldValue;
}

function readLeafFields(o: Record<string, unknown>, path: string): LeafFields {
  const fields: LeafFields = {};
  if (has(o, 'key')) {
    fields.key = requireString(o['key'], `${path}.key`);
  }
  if (has(o, 'operator')) {
    fields.operator = requireString(o['operator'], `${path}.operator`);
  }
  if ('value' in o) {
    fields.value = toFieldValue(o['value'], `${path}.value`);
  }
  return fields;
}

// ---------------------------------------------------------------------------
// Tree
// ---------------------------------------------------------------------------

/**
 * Validates a wire tree node and converts it, recursively.
 *
 * @throws {YamlValidationError} On a structural error.
 */
export function parseConditionNode(input: unknown, path: string): ConditionNode {
  const o = requireObject(input, path);
  const node: ConditionNode = readLeafFields(o, path);

  if (has(o, 'logic')) {
    node.logic = requireLogic(o['logic'], `${path}.logic`);
  }
  if (has(o, 'children')) {
    node.children = requireArray(o['children'], `${path}.children`).map((child, i) =>
      parseConditionNode(child, `${path}.children[${i}]`),
    );
  }

  return node;
}

// ---------------------------------------------------------------------------
// Chain
// ---------------------------------------------------------------------------

function parseChainLink(input: unknown, path: string): ChainLink {
  const o = requireObject(input, path);
  const link: ChainLink = readLeafFields(o, path);

  if (has(o, 'group')) {
    link.group = parseConditionChain(o['group'], `${path}.group`);
  }

  const logicField = has(o, 'next_logic') ? 'next_logic' : 'nextLogic';
  if (has(o, logicField)) {
    link.nextLogic = requireLogic(o[logicField], `${path}.${logicField}`);
  }

  return link;
}

/**
 * Validates a wire chain and converts it, recursively.
 *
 * @throws {YamlValidationError} On a structural error.
 */
export function parseConditionChain(input: unknown, path: string): ConditionChain {
  const o = requireObject(input, path);
  if (!has(o, 'conditions')) {
    throw new YamlValidationError('missing required field "conditions"', path);
  }
  const links = requireArray(o['conditions'], `${path}.conditions`);
  return {
    conditions: links.map((link, i) => parseChainLink(link, `${path}.conditions[${i}]`)),
  };
}

/**
 * Converts either wire form. An object with a `conditions` field is a
 * chain, anything else is read as a tree node.
 *
 * @throws {YamlValidationError} On a structural error.
 */
export function parseConditionInput(input: unknown, path = 'condition'): ConditionNode | ConditionChain {
  const o = requireObject(input, path);
  return 'conditions' in o ? parseConditionChain(o, path) : parseConditionNode(o, path);
}

/**
 * Validates a data record.
 *
 * @throws {YamlValidationError} If `input` is not a mapping or holds unsupported values.
 */
export function parseDataRecord(input: unknown, path = 'data'): DataRecord {
  const o = requireObject(input, path);
  const record: Record<string, FieldValue> = {};
  for (const [k, v] of Object.entries(o)) {
    record[k] = toFieldValue(v, `${path}.${k}`);
  }
  return record;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function leafToWire(source: LeafFields): LeafFields {
  const out: LeafFields = {};
  if (source.key !== undefined) out.key = source.key;
  if (source.operator !== undefined) out.operator = source.operator;
  if (source.value !== undefined) out.value = source.value;
  return out;
}

function nodeToWire(node: ConditionNode): WireConditionNode {
  const out: WireConditionNode = {};
  if (node.logic !== undefined) out.logic = node.logic;
  if (node.children !== undefined) out.children = node.children.map(nodeToWire);
  return { ...out, ...leafToWire(node) };
}

function chainToWire(chain: ConditionChain): WireConditionChain {
  return {
    conditions: chain.conditions.map((link): WireChainLink => {
      const out: WireChainLink = leafToWire(link);
      if (link.group !== undefined) out.group = chainToWire(link.group);
      if (link.nextLogic !== undefined) out.next_logic = link.nextLogic;
      return out;
    }),
  };
}

/**
 * Converts a tree or chain to its wire form (`nextLogic` → `next_logic`),
 * ready for `JSON.stringify` or YAML output.
 */
export function toWireFormat(input: ConditionChain): WireConditionChain;
export function toWireFormat(input: ConditionNode): WireConditionNode;
export function toWireFormat(input: ConditionNode | ConditionChain): WireConditionNode | WireConditionChain;
export function toWireFormat(input: ConditionNode | ConditionChain): WireConditionNode | WireConditionChain {
  return isConditionChain(input) ? chainToWire(input) : nodeToWire(input);
}

