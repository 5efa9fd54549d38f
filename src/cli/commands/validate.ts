/**
 * Příkaz validate pro CLI.
 * Validuje podmínku (strom nebo řetěz) ze souboru.
 */

import type { GlobalOptions, ValidateOutput } from '../types.js';
import { isConditionChain } from '../../types/condition.js';
import { ConditionInputValidator } from '../../validation/condition-validator.js';
import { loadDocumentFile } from '../utils/file-loader.js';
import { ValidationError } from '../utils/errors.js';
import { printData, print, warning } from '../utils/output.js';

/** Options pro příkaz validate */
export interface ValidateOptions extends GlobalOptions {
  strict: boolean;
}

/**
 * Akce příkazu validate.
 */
export async function validateCommand(file: string, options: ValidateOptions): Promise<void> {
  const validator = new ConditionInputValidator({ strict: options.strict });

  const document = loadDocumentFile(file);
  const result = validator.validate(document.data);

  const output: ValidateOutput = {
    file: document.path,
    form: isConditionChain(document.data) ? 'chain' : 'tree',
    valid: result.valid,
    errorCount: result.errors.length,
    warningCount: result.warnings.length,
    errors: result.errors,
    warnings: result.warnings
  };

  printData({ type: 'validation', data: output });

  if (result.errors.length > 0) {
    throw new ValidationError(
      `Validation failed with ${result.errors.length} error(s)`,
      result.errors
    );
  }

  // Ve strict módu způsobí nenulový exit kód i varování
  if (!result.valid) {
    print('');
    print(warning('Strict mode: warnings treated as errors'));
    throw new ValidationError(
      `Strict validation failed with ${result.warnings.length} warning(s)`,
      result.warnings
    );
  }
}
