/**
 * CLI verze - načtená z package.json.
 */

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

function readVersionField(packageJson: unknown): string | undefined {
  if (typeof packageJson !== 'object' || packageJson === null || !('version' in packageJson)) {
    return undefined;
  }
  return typeof packageJson.version === 'string' ? packageJson.version : undefined;
}

function loadVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // src/cli i dist/cli jsou o 2 úrovně pod kořenem
    const packagePath = resolve(__dirname, '../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    return readVersionField(packageJson) ?? '0.0.0';
  } catch (err) {
    console.error('[condition-engine] Failed to read package version:', err);
    return '0.0.0';
  }
}

export const version = loadVersion();
