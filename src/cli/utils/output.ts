/**
 * Výstup CLI: data jdou přes formátter na stdout, chyby na stderr.
 *
 * Nastavení (formát, tichý režim, barvy) určí `cli.ts` z globálních options
 * a konfigurace před spuštěním příkazu.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';

export interface OutputOptions {
  format: OutputFormat;
  /** Potlačí vše kromě chyb */
  quiet: boolean;
  noColor: boolean;
}

let outputOptions: OutputOptions = {
  format: 'pretty',
  quiet: false,
  noColor: false
};

export function setOutputOptions(options: Partial<OutputOptions>): void {
  outputOptions = { ...outputOptions, ...options };
}

/** `--no-color` a `NO_COLOR` vypínají barvy, `FORCE_COLOR` je zapíná i mimo TTY. */
function useColors(): boolean {
  if (outputOptions.noColor || process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  return process.env['FORCE_COLOR'] !== undefined || process.stdout.isTTY === true;
}

/** Žluté varování pro hlášky mimo formátovaná data (selhání operátoru, strict mód). */
export function warning(message: string): string {
  return useColors() ? `\x1b[33m⚠ ${message}\x1b[0m` : `⚠ ${message}`;
}

export function print(message: string): void {
  if (!outputOptions.quiet) {
    console.log(message);
  }
}

export function printError(message: string): void {
  console.error(message);
}

export function printData(data: FormattableData): void {
  if (data.type === 'error') {
    printError(createFormatter(outputOptions.format, useColors()).format(data));
    return;
  }
  print(createFormatter(outputOptions.format, useColors()).format(data));
}
