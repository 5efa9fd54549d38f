/**
 * CLI konfigurace - načítání a správa konfiguračního souboru.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CliConfig, OutputFormat } from '../types.js';
import { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS } from '../types.js';
import { InvalidArgumentsError } from './errors.js';

export const CONFIG_FILENAME = '.condition-engine.json';

/** Částečná konfigurace ze souboru */
interface PartialCliConfig {
  output?: Partial<CliConfig['output']>;
}

/** Hledá konfigurační soubor v hierarchii adresářů */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  // Zkus home adresář
  const homeConfig = join(homedir(), CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** Parsuje JSON konfiguraci s validací */
function parseConfig(content: string, filePath: string): PartialCliConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentsError(`Invalid configuration in ${filePath}: ${message}`);
  }

  if (!isRecord(parsed)) {
    throw new InvalidArgumentsError(`Invalid configuration in ${filePath}: Configuration must be an object`);
  }

  const output = parsed['output'];
  if (output === undefined) {
    return {};
  }
  if (!isRecord(output)) {
    throw new InvalidArgumentsError(`Invalid configuration in ${filePath}: "output" must be an object`);
  }

  const result: Partial<CliConfig['output']> = {};
  const { format, colors } = output;
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      throw new InvalidArgumentsError(
        `Invalid configuration in ${filePath}: "output.format" must be one of ${OUTPUT_FORMATS.join(', ')}`
      );
    }
    result.format = format;
  }
  if (colors !== undefined) {
    if (typeof colors !== 'boolean') {
      throw new InvalidArgumentsError(`Invalid configuration in ${filePath}: "output.colors" must be a boolean`);
    }
    result.colors = colors;
  }
  return { output: result };
}

/** Merge konfigurace s defaulty */
function mergeConfig(base: CliConfig, override: PartialCliConfig): CliConfig {
  return {
    output: {
      ...base.output,
      ...override.output
    }
  };
}

/** Cache pro načtenou konfiguraci */
let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Načte CLI konfiguraci.
 *
 * Priorita:
 * 1. Explicitně zadaná cesta
 * 2. Konfigurační soubor v aktuálním adresáři nebo jeho rodičích
 * 3. Konfigurační soubor v home adresáři
 * 4. Výchozí konfigurace
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

  // Vrať cached konfiguraci pokud je stejná cesta
  if (cachedConfig && cachedConfigPath === pathToLoad) {
    return cachedConfig;
  }

  if (!pathToLoad) {
    cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, {});
    cachedConfigPath = null;
    return cachedConfig;
  }

  if (!existsSync(pathToLoad)) {
    if (explicitPath) {
      throw new InvalidArgumentsError(`Configuration file not found: ${pathToLoad}`);
    }
    cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, {});
    cachedConfigPath = null;
    return cachedConfig;
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, parseConfig(content, pathToLoad));
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resetuje cache konfigurace (pro testování) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Vrátí cestu k načtené konfiguraci */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
