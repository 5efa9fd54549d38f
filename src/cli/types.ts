/**
 * CLI typy pro condition-engine.
 */

import type { ValidationIssue } from '../validation/types.js';
import type { ConditionEvaluationResult } from '../debugging/types.js';

/** Podporované výstupní formáty */
export type OutputFormat = 'json' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'pretty'];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  ConditionFalse: 7
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

/** CLI konfigurace (z konfiguračního souboru) */
export interface CliConfig {
  output: {
    format: OutputFormat;
    colors: boolean;
  };
}

/** Výchozí CLI konfigurace */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  output: {
    format: 'pretty',
    colors: true
  }
};

/** Výsledek příkazu evaluate */
export interface EvaluateOutput {
  condition: string;
  data: string;
  form: 'tree' | 'chain';
  result: boolean;
  trace?: ConditionEvaluationResult[];
}

/** Výsledek příkazu validate */
export interface ValidateOutput {
  file: string;
  form: 'tree' | 'chain';
  valid: boolean;
  errorCount: number;
  warningCount: number;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/** Výpis operátorů */
export interface OperatorsOutput {
  state: readonly string[];
  comparison: readonly string[];
  aliases: Readonly<Record<string, string>>;
}

/** Formátovatelná data pro výstup */
export type FormattableData =
  | { type: 'evaluation'; data: EvaluateOutput; meta?: Record<string, unknown> }
  | { type: 'validation'; data: ValidateOutput; meta?: Record<string, unknown> }
  | { type: 'operators'; data: OperatorsOutput; meta?: Record<string, unknown> }
  | { type: 'condition'; data: unknown; meta?: Record<string, unknown> }
  | { type: 'message'; data: string; meta?: Record<string, unknown> }
  | { type: 'error'; data: string; meta?: Record<string, unknown> };
