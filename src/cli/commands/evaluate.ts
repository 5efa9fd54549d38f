/**
 * Příkaz evaluate pro CLI.
 * Vyhodnotí podmínku (strom nebo řetěz) nad datovým záznamem.
 */

import type { EvaluateOutput, GlobalOptions } from '../types.js';
import type { ConditionEvaluationResult } from '../../debugging/types.js';
import { isConditionChain } from '../../types/condition.js';
import { ConditionEngine } from '../../core/condition-engine.js';
import { loadConditionFile, loadDataFile } from '../utils/file-loader.js';
import { printData, printError, warning } from '../utils/output.js';

/** Options pro příkaz evaluate */
export interface EvaluateOptions extends GlobalOptions {
  trace: boolean;
}

/**
 * Akce příkazu evaluate.
 *
 * @returns Výsledek vyhodnocení; CLI z něj odvodí exit kód.
 */
export async function evaluateCommand(
  conditionFile: string,
  dataFile: string,
  options: EvaluateOptions
): Promise<boolean> {
  const condition = loadConditionFile(conditionFile);
  const data = loadDataFile(dataFile);

  const engine = new ConditionEngine({
    name: 'condition-engine',
    onOperatorError: (error, failure) => {
      const message = error instanceof Error ? error.message : String(error);
      printError(warning(`Operator "${failure.operator}" failed at ${failure.path}: ${message}`));
    }
  });

  const trace: ConditionEvaluationResult[] = [];
  const result = engine.evaluateEither(
    condition.data,
    data.data,
    options.trace ? { onConditionEvaluated: (entry) => trace.push(entry) } : undefined
  );

  const output: EvaluateOutput = {
    condition: condition.path,
    data: data.path,
    form: isConditionChain(condition.data) ? 'chain' : 'tree',
    result,
    ...(options.trace && { trace })
  };

  printData({ type: 'evaluation', data: output });

  return result;
}
