/**
 * YAML/JSON loader pro podmínky a datové záznamy.
 *
 * YAML 1.2 je nadmnožinou JSON, takže oba formáty čte stejný parser.
 * Podmínka může být strom (`logic`/`children`, `key`/`operator`/`value`)
 * nebo řetěz (`conditions` s `next_logic`).
 *
 * @example
 * ```typescript
 * import { loadConditionFromYAML, loadDataFromFile } from 'condition-engine/dsl';
 *
 * const condition = loadConditionFromYAML(`
 *   logic: AND
 *   children:
 *     - key: age
 *       operator: gt
 *       value: 18
 *     - key: country
 *       operator: eq
 *       value: TH
 * `);
 *
 * const data = await loadDataFromFile('./data/customer.json');
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { ConditionChain, ConditionNode } from '../../types/condition.js';
import type { DataRecord } from '../../types/value.js';
import { parseConditionInput, parseDataRecord } from './schema.js';
import { YamlLoadError, YamlValidationError } from '../helpers/errors.js';

export { YamlLoadError };

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function parseDocument(content: string): unknown {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }
  return parsed;
}

async function readSource(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }
}

/** Přidá k chybě cestu k souboru. */
function withFilePath<T>(filePath: string, load: () => T): T {
  try {
    return load();
  } catch (err) {
    if (err instanceof YamlLoadError || err instanceof YamlValidationError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parsuje YAML/JSON řetězec a vrací strom nebo řetěz podmínek.
 *
 * @throws {YamlLoadError} Při syntaktické chybě nebo prázdném vstupu
 * @throws {YamlValidationError} Při chybné struktuře podmínky
 */
export function loadConditionFromYAML(content: string): ConditionNode | ConditionChain {
  const parsed = parseDocument(content);
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new YamlLoadError(`Expected a condition object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
  }
  return parseConditionInput(parsed);
}

/**
 * Načte podmínku ze souboru.
 *
 * @throws {YamlLoadError} Při chybě čtení souboru, syntaxi nebo struktuře
 */
export async function loadConditionFromFile(filePath: string): Promise<ConditionNode | ConditionChain> {
  const content = await readSource(filePath);
  return withFilePath(filePath, () => loadConditionFromYAML(content));
}

/**
 * Parsuje datový záznam (mapu klíčů na hodnoty).
 *
 * @throws {YamlLoadError} Při syntaktické chybě, prázdném vstupu nebo jiném typu než mapa
 * @throws {YamlValidationError} Při nepodporované hodnotě
 */
export function loadDataFromYAML(content: string): DataRecord {
  const parsed = parseDocument(content);
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new YamlLoadError(`Expected a data mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
  }
  return parseDataRecord(parsed);
}

/**
 * Načte datový záznam ze souboru.
 *
 * @throws {YamlLoadError} Při chybě čtení souboru, syntaxi nebo struktuře
 */
export async function loadDataFromFile(filePath: string): Promise<DataRecord> {
  const content = await readSource(filePath);
  return withFilePath(filePath, () => loadDataFromYAML(content));
}
