/**
 * JSON formátter pro CLI výstup.
 */

import type { FormattableData } from '../types.js';
import type { OutputFormatter } from './index.js';

/**
 * Replacer pro hodnoty, které JSON neumí: bigint jako řetězec,
 * Map jako objekt, Set jako pole.
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Map) {
    return Object.fromEntries([...value].map(([k, v]: [unknown, unknown]) => [String(k), v]));
  }
  if (value instanceof Set) {
    return [...value];
  }
  return value;
}

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly pretty: boolean = false) {}

  format(data: FormattableData): string {
    const output = this.toOutputObject(data);
    return this.pretty ? JSON.stringify(output, jsonReplacer, 2) : JSON.stringify(output, jsonReplacer);
  }

  private toOutputObject(data: FormattableData): Record<string, unknown> {
    switch (data.type) {
      case 'error':
        return {
          success: false,
          error: data.data,
          ...(data.meta && { meta: data.meta })
        };

      case 'message':
        return {
          success: true,
          message: data.data,
          ...(data.meta && { meta: data.meta })
        };

      case 'validation':
        return {
          success: true,
          validation: data.data,
          ...(data.meta && { meta: data.meta })
        };

      case 'evaluation':
      case 'operators':
      case 'condition':
        return {
          success: true,
          data: data.data,
          ...(data.meta && { meta: data.meta })
        };
    }
  }
}
