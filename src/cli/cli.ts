/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import { ExitCode, OUTPUT_FORMATS, type GlobalOptions } from './types.js';
import { isOutputFormat, loadConfig } from './utils/config.js';
import { setOutputOptions, printError } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { evaluateCommand, type EvaluateOptions } from './commands/evaluate.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { convertCommand, type ConvertOptions } from './commands/convert.js';
import { operatorsCommand } from './commands/operators.js';

/** CLI instance */
const cli = cac('condition-engine');

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery: musíme to udělat sami.
 */
let _actionPromise: Promise<void> | undefined;

/** Obalí async action handler tak, aby se jeho Promise dala awaitovat v run(). */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

/** Vypíše chybu a ukončí proces s odpovídajícím exit kódem */
function fail(err: unknown): never {
  printError(formatError(err));
  process.exit(getExitCode(err));
}

function stringOption(options: Record<string, unknown>, name: string): string | undefined {
  const value = options[name];
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, name: string): boolean {
  return options[name] === true;
}

/** Zpracuje globální options */
function processGlobalOptions(options: Record<string, unknown>): GlobalOptions {
  const configPath = stringOption(options, 'config');
  const config = loadConfig(configPath);

  const requestedFormat = options['format'];
  let format = config.output.format;
  if (requestedFormat !== undefined) {
    if (!isOutputFormat(requestedFormat)) {
      throw new InvalidArgumentsError(
        `Invalid format: ${String(requestedFormat)}. Valid values: ${OUTPUT_FORMATS.join(', ')}`
      );
    }
    format = requestedFormat;
  }

  const quiet = booleanOption(options, 'quiet');
  // CAC převádí --no-color na color: false
  const noColor = options['color'] === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    format,
    quiet,
    noColor,
    config: configPath
  };
}

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty', {
      default: undefined
    })
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

/** Registruje příkaz version */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`condition-engine v${version}`);
  });
}

/** Registruje příkaz evaluate */
function registerEvaluateCommand(): void {
  cli
    .command('evaluate <condition> <data>', 'Evaluate a condition file against a data file')
    .option('-t, --trace', 'Print every evaluated condition')
    .action(tracked(async (conditionFile: string, dataFile: string, options: Record<string, unknown>) => {
      try {
        const evaluateOptions: EvaluateOptions = {
          ...processGlobalOptions(options),
          trace: booleanOption(options, 'trace')
        };
        const result = await evaluateCommand(conditionFile, dataFile, evaluateOptions);
        if (!result) {
          process.exitCode = ExitCode.ConditionFalse;
        }
      } catch (err) {
        fail(err);
      }
    }));
}

/** Registruje příkaz validate */
function registerValidateCommand(): void {
  cli
    .command('validate <file>', 'Validate a condition file')
    .option('-s, --strict', 'Enable strict validation mode')
    .action(tracked(async (file: string, options: Record<string, unknown>) => {
      try {
        const validateOptions: ValidateOptions = {
          ...processGlobalOptions(options),
          strict: booleanOption(options, 'strict')
        };
        await validateCommand(file, validateOptions);
      } catch (err) {
        fail(err);
      }
    }));
}

/** Registruje příkaz convert */
function registerConvertCommand(): void {
  cli
    .command('convert <file>', 'Convert a condition tree into a flat chain')
    .option('-y, --yaml', 'Print the chain as YAML')
    .action(tracked(async (file: string, options: Record<string, unknown>) => {
      try {
        const convertOptions: ConvertOptions = {
          ...processGlobalOptions(options),
          yaml: booleanOption(options, 'yaml')
        };
        await convertCommand(file, convertOptions);
      } catch (err) {
        fail(err);
      }
    }));
}

/** Registruje příkaz operators */
function registerOperatorsCommand(): void {
  cli
    .command('operators', 'List built-in operators and aliases')
    .action(tracked(async (options: Record<string, unknown>) => {
      try {
        await operatorsCommand(processGlobalOptions(options));
      } catch (err) {
        fail(err);
      }
    }));
}

/** Inicializuje a spustí CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerEvaluateCommand();
  registerValidateCommand();
  registerConvertCommand();
  registerOperatorsCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    fail(err);
  }
}

export { cli };
