/**
 * Příkaz convert pro CLI.
 * Převede strom podmínek na ekvivalentní plochý řetěz.
 */

import { stringify } from 'yaml';
import type { GlobalOptions } from '../types.js';
import { isConditionChain } from '../../types/condition.js';
import { convertTreeToChain } from '../../evaluation/chain-converter.js';
import { toWireFormat } from '../../dsl/yaml/schema.js';
import { loadConditionFile } from '../utils/file-loader.js';
import { InvalidArgumentsError } from '../utils/errors.js';
import { print, printData } from '../utils/output.js';

/** Options pro příkaz convert */
export interface ConvertOptions extends GlobalOptions {
  yaml: boolean;
}

/**
 * Akce příkazu convert.
 */
export async function convertCommand(file: string, options: ConvertOptions): Promise<void> {
  const condition = loadConditionFile(file);

  if (isConditionChain(condition.data)) {
    throw new InvalidArgumentsError(`${file}: input is already a condition chain`);
  }

  const wire = toWireFormat(convertTreeToChain(condition.data));

  if (options.yaml) {
    print(stringify(wire).trimEnd());
    return;
  }

  printData({ type: 'condition', data: wire });
}
