/**
 * Pretty formátter pro CLI výstup - lidsky čitelný formát.
 */

import type {
  EvaluateOutput,
  FormattableData,
  OperatorsOutput,
  ValidateOutput
} from '../types.js';
import type { OutputFormatter } from './index.js';
import type { ConditionEvaluationResult } from '../../debugging/types.js';
import type { FieldValue } from '../../types/value.js';
import { toString } from '../../utils/coercion.js';
import { jsonReplacer } from './json-formatter.js';

type Color = 'reset' | 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan';

const ANSI: Record<Color, string> = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m'
};

/** Hodnota z trace výpisu; řetězce v uvozovkách, aby šly odlišit od čísel */
function formatTraceValue(value: FieldValue): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  return toString(value);
}

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'evaluation':
        return this.formatEvaluation(data.data);
      case 'validation':
        return this.formatValidation(data.data);
      case 'operators':
        return this.formatOperators(data.data);
      case 'condition':
        return JSON.stringify(data.data, jsonReplacer, 2);
      case 'error':
        return this.color(`✗ ${data.data}`, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatEvaluation(output: EvaluateOutput): string {
    const lines: string[] = [];

    if (output.trace !== undefined) {
      lines.push(this.color(`Trace (${output.form}):`, 'cyan'));
      if (output.trace.length === 0) {
        lines.push(`  ${this.color('(no conditions evaluated)', 'dim')}`);
      }
      for (const entry of output.trace) {
        lines.push(`  ${this.formatTraceEntry(entry)}`);
      }
      lines.push('');
    }

    lines.push(output.result ? this.color('true', 'green') : this.color('false', 'red'));
    return lines.join('\n');
  }

  private formatTraceEntry(entry: ConditionEvaluationResult): string {
    const mark = entry.result ? this.color('✓', 'green') : this.color('✗', 'red');
    const expected = entry.operatorKind === 'state' ? '' : ` ${formatTraceValue(entry.expectedValue)}`;
    const actual = entry.exists ? formatTraceValue(entry.actualValue) : this.color('(missing)', 'dim');
    const kind = entry.operatorKind === 'builtin' ? '' : ` ${this.color(`[${entry.operatorKind}]`, 'magenta')}`;

    return (
      `${mark} ${this.color(entry.path, 'dim')} ` +
      `${this.color(entry.key, 'green')} ${this.color(entry.operator, 'yellow')}${expected}` +
      `${kind} ${this.color('actual:', 'dim')} ${actual}`
    );
  }

  private formatValidation(output: ValidateOutput): string {
    const lines: string[] = [];

    lines.push(this.color(`File: ${output.file}`, 'bold'));
    lines.push(`Form: ${output.form}`);
    lines.push('');

    if (output.valid && output.warningCount === 0) {
      lines.push(`${this.color('✓', 'green')} Condition is valid`);
    } else if (output.valid) {
      lines.push(`${this.color('✓', 'green')} Valid with ${output.warningCount} warning(s)`);
    } else {
      lines.push(this.color(`✗ ${output.errorCount} error(s), ${output.warningCount} warning(s)`, 'red'));
    }

    if (output.errors.length > 0) {
      lines.push('');
      lines.push(this.color('Errors:', 'red'));
      for (const err of output.errors) {
        lines.push(`  ${this.color('✗', 'red')} ${this.color(err.path, 'cyan')}: ${err.message}`);
      }
    }

    if (output.warnings.length > 0) {
      lines.push('');
      lines.push(this.color('Warnings:', 'yellow'));
      for (const warn of output.warnings) {
        lines.push(`  ${this.color('⚠', 'yellow')} ${this.color(warn.path, 'cyan')}: ${warn.message}`);
      }
    }

    return lines.join('\n');
  }

  private formatOperators(output: OperatorsOutput): string {
    const lines: string[] = [];

    lines.push(this.color('State operators:', 'cyan'));
    lines.push(`  ${output.state.join(', ')}`);
    lines.push('');
    lines.push(this.color('Comparison operators:', 'cyan'));
    lines.push(`  ${output.comparison.join(', ')}`);
    lines.push('');
    lines.push(this.color('Aliases:', 'cyan'));
    for (const [alias, canonical] of Object.entries(output.aliases)) {
      lines.push(`  ${this.color(alias, 'yellow')} → ${canonical}`);
    }

    return lines.join('\n');
  }

  private color(text: string, color: Color): string {
    if (!this.useColors) {
      return text;
    }
    return `${ANSI[color]}${text}${ANSI.reset}`;
  }
}
