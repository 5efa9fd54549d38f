import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { resolve } from 'node:path';
import { evaluateCommand, type EvaluateOptions } from '../../../../src/cli/commands/evaluate.js';
import { FileNotFoundError, ValidationError } from '../../../../src/cli/utils/errors.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';

const fixturesDir = resolve(__dirname, '../../../fixtures');
const eligibility = resolve(fixturesDir, 'conditions/eligibility.yaml');
const eligibilityChain = resolve(fixturesDir, 'conditions/eligibility-chain.json');
const customer = resolve(fixturesDir, 'data/customer.yaml');
const adultSg = resolve(fixturesDir, 'data/adult-sg.json');

function createOptions(overrides: Partial<EvaluateOptions> = {}): EvaluateOptions {
  return {
    format: 'pretty',
    quiet: false,
    noColor: true,
    config: undefined,
    trace: false,
    ...overrides
  };
}

describe('evaluateCommand', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  function printed(): string {
    return consoleLogSpy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    setOutputOptions({ format: 'pretty', quiet: false, noColor: true });
  });

  describe('tree conditions', () => {
    it('returns true when the record matches', async () => {
      await expect(evaluateCommand(eligibility, customer, createOptions())).resolves.toBe(true);
      expect(printed()).toBe('true');
    });

    it('returns false when the record does not match', async () => {
      await expect(evaluateCommand(eligibility, adultSg, createOptions())).resolves.toBe(false);
      expect(printed()).toBe('false');
    });

    it('prints the evaluated leaves with --trace', async () => {
      await evaluateCommand(eligibility, customer, createOptions({ trace: true }));

      expect(printed()).toBe(
        [
          'Trace (tree):',
          '  ✓ children[0] age gt 18 actual: 25',
          '  ✓ children[1].children[0] country eq "TH" actual: "TH"',
          '',
          'true'
        ].join('\n')
      );
    });

    it('traces every OR branch when none matches', async () => {
      await evaluateCommand(eligibility, adultSg, createOptions({ trace: true }));

      expect(printed()).toBe(
        [
          'Trace (tree):',
          '  ✓ children[0] age gt 18 actual: 40',
          '  ✗ children[1].children[0] country eq "TH" actual: "SG"',
          '  ✗ children[1].children[1] country eq "VN" actual: "SG"',
          '',
          'false'
        ].join('\n')
      );
    });
  });

  describe('chain conditions', () => {
    it('folds links left to right', async () => {
      await expect(evaluateCommand(eligibilityChain, adultSg, createOptions())).resolves.toBe(true);
      await expect(evaluateCommand(eligibilityChain, customer, createOptions())).resolves.toBe(true);
    });

    it('traces every link', async () => {
      await evaluateCommand(eligibilityChain, adultSg, createOptions({ trace: true }));

      expect(printed()).toBe(
        [
          'Trace (chain):',
          '  ✓ conditions[0] age gt 30 actual: 40',
          '  ✗ conditions[1] country eq "TH" actual: "SG"',
          '',
          'true'
        ].join('\n')
      );
    });
  });

  describe('json output', () => {
    it('prints the result object', async () => {
      setOutputOptions({ format: 'json' });

      await evaluateCommand(eligibilityChain, customer, createOptions({ format: 'json' }));

      expect(JSON.parse(printed())).toEqual({
        success: true,
        data: { condition: eligibilityChain, data: customer, form: 'chain', result: true }
      });
    });
  });

  describe('quiet mode', () => {
    it('prints nothing but still returns the result', async () => {
      setOutputOptions({ quiet: true });

      await expect(evaluateCommand(eligibility, adultSg, createOptions({ quiet: true }))).resolves.toBe(false);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('errors', () => {
    it('throws FileNotFoundError for a missing condition file', async () => {
      const missing = resolve(fixturesDir, 'conditions/missing.yaml');

      await expect(evaluateCommand(missing, customer, createOptions())).rejects.toThrow(FileNotFoundError);
    });

    it('throws ValidationError for a malformed condition', async () => {
      const invalid = resolve(fixturesDir, 'conditions/invalid-logic.yaml');

      await expect(evaluateCommand(invalid, customer, createOptions())).rejects.toThrow(
        new ValidationError(`${invalid}: condition.logic: invalid logic "XOR". Expected: AND, OR`)
      );
    });

    it('throws ValidationError when the data is not a mapping', async () => {
      const list = resolve(fixturesDir, 'data/list.yaml');

      await expect(evaluateCommand(eligibility, list, createOptions())).rejects.toThrow(
        `${list}: Expected a data mapping, got array`
      );
    });
  });
});
