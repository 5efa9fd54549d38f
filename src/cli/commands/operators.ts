/**
 * Příkaz operators pro CLI.
 * Vypíše vestavěné operátory a jejich aliasy. Vlastní operátory registruje
 * až aplikace přes knihovní API, CLI o nich neví.
 */

import type { GlobalOptions, OperatorsOutput } from '../types.js';
import {
  COMPARISON_OPERATORS,
  OPERATOR_ALIASES,
  STATE_OPERATORS
} from '../../validation/constants.js';
import { printData } from '../utils/output.js';

/** Options pro příkaz operators */
export type OperatorsOptions = GlobalOptions;

/**
 * Akce příkazu operators.
 */
export async function operatorsCommand(_options: OperatorsOptions): Promise<void> {
  const output: OperatorsOutput = {
    state: STATE_OPERATORS,
    comparison: COMPARISON_OPERATORS,
    aliases: OPERATOR_ALIASES
  };

  printData({ type: 'operators', data: output });
}
