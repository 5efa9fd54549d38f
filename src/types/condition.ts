import type { FieldValue } from './value.js';

/** Logická spojka skupiny nebo článku řetězu */
export type Logic = 'AND' | 'OR';

/** Jednoduchá podmínka: porovnání hodnoty pod klíčem */
export interface LeafCondition {
  key: string;
  operator: string;
  value?: FieldValue;
}

/** Skupina podmínek spojených jednou logikou */
export interface ConditionGroup {
  logic: Logic;
  children: ConditionNode[];
}

/**
 * Uzel stromu podmínek.
 *
 * Všechna pole jsou volitelná, protože uzel přichází z volně typovaného
 * vstupu. O tom, čím uzel je, rozhoduje {@link classifyNode}.
 */
export interface ConditionNode {
  logic?: Logic;
  children?: ConditionNode[];
  key?: string;
  operator?: string;
  value?: FieldValue;
}

/** Článek plochého řetězu: list nebo vnořený řetěz + spojka k dalšímu článku */
export interface ChainLink {
  key?: string;
  operator?: string;
  value?: FieldValue;
  group?: ConditionChain;
  nextLogic?: Logic;
}

/** Plochý řetěz podmínek s explicitní spojkou mezi každou dvojicí */
export interface ConditionChain {
  conditions: ChainLink[];
}

/** Výsledek klasifikace uzlu stromu */
export type NodeKind =
  | { kind: 'group'; group: ConditionGroup }
  | { kind: 'leaf'; leaf: LeafCondition }
  | { kind: 'degenerate' };

/**
 * Rozhodne, zda je uzel skupina, list, nebo degenerovaný uzel.
 *
 * Skupina má nastavenou logiku a neprázdné děti. List má neprázdný klíč
 * i operátor. Vše ostatní je degenerovaný uzel, který se vyhodnotí jako true.
 */
export function classifyNode(node: ConditionNode): NodeKind {
  const { logic, children } = node;
  if ((logic === 'AND' || logic === 'OR') && children !== undefined && children.length > 0) {
    return { kind: 'group', group: { logic, children } };
  }

  const { key, operator } = node;
  if (key !== undefined && key !== '' && operator !== undefined && operator !== '') {
    return { kind: 'leaf', leaf: { key, operator, value: node.value } };
  }

  return { kind: 'degenerate' };
}

/** Type guard: vstup má tvar řetězu (pole `conditions`). */
export function isConditionChain(value: unknown): value is ConditionChain {
  return (
    typeof value === 'object' &&
    value !== null &&
    'conditions' in value &&
    Array.isArray(value.conditions)
  );
}

/** Type guard: vstup je objekt, který lze číst jako uzel stromu. */
export function isConditionNode(value: unknown): value is ConditionNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isConditionChain(value);
}
