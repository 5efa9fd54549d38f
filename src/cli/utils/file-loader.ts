/**
 * Utility pro načítání podmínek a dat ze souborů (JSON i YAML).
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import type { ConditionChain, ConditionNode } from '../../types/condition.js';
import type { DataRecord } from '../../types/value.js';
import { loadConditionFromYAML, loadDataFromYAML } from '../../dsl/yaml/loader.js';
import { DslError } from '../../dsl/helpers/errors.js';
import { FileNotFoundError, ValidationError } from './errors.js';

/** Výsledek načtení souboru */
export interface LoadResult<T> {
  data: T;
  path: string;
}

function readSource(filePath: string): LoadResult<string> {
  const absolutePath = resolve(filePath);

  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(filePath);
  }

  return { data: readFileSync(absolutePath, 'utf-8'), path: absolutePath };
}

/** Převede chyby DSL loaderu na CLI ValidationError. */
function convertLoadError<T>(filePath: string, load: () => T): T {
  try {
    return load();
  } catch (err) {
    if (err instanceof DslError) {
      throw new ValidationError(`${filePath}: ${err.message}`, [], err);
    }
    throw err;
  }
}

/**
 * Načte soubor a vrátí parsovaný dokument bez kontroly struktury.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud soubor není validní JSON/YAML
 */
export function loadDocumentFile(filePath: string): LoadResult<unknown> {
  const source = readSource(filePath);
  try {
    return { data: parse(source.data), path: source.path };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid JSON/YAML in file: ${message}`);
  }
}

/**
 * Načte strom nebo řetěz podmínek.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud soubor není validní podmínka
 */
export function loadConditionFile(filePath: string): LoadResult<ConditionNode | ConditionChain> {
  const source = readSource(filePath);
  return { data: convertLoadError(filePath, () => loadConditionFromYAML(source.data)), path: source.path };
}

/**
 * Načte datový záznam.
 * @throws FileNotFoundError pokud soubor neexistuje
 * @throws ValidationError pokud soubor neobsahuje mapu hodnot
 */
export function loadDataFile(filePath: string): LoadResult<DataRecord> {
  const source = readSource(filePath);
  return { data: convertLoadError(filePath, () => loadDataFromYAML(source.data)), path: source.path };
}
