import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { resolve } from 'node:path';
import { validateCommand, type ValidateOptions } from '../../../../src/cli/commands/validate.js';
import { FileNotFoundError, ValidationError } from '../../../../src/cli/utils/errors.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';

const fixturesDir = resolve(__dirname, '../../../fixtures/rulesets');

function createOptions(overrides: Partial<ValidateOptions> = {}): ValidateOptions {
  return {
    format: 'pretty',
    quiet: false,
    noColor: true,
    config: undefined,
    strict: false,
    ...overrides
  };
}

describe('validateCommand', () => {
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, void>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setOutputOptions({ format: 'pretty', quiet: false, noColor: true });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    setOutputOptions({ format: 'pretty', quiet: false, noColor: false });
  });

  function printedLines(): string[] {
    return String(consoleLogSpy.mock.calls[0]?.[0]).split('\n');
  }

  it('should report a valid rule set', async () => {
    const file = resolve(fixturesDir, 'enrollment.yaml');

    await validateCommand(file, createOptions());

    expect(printedLines()).toEqual([`File: ${file}`, 'Rules: 7, facts: 8', '', '✓ Rule set is valid']);
  });

  it('should accept warnings outside strict mode', async () => {
    await expect(
      validateCommand(resolve(fixturesDir, 'strict-warnings.yaml'), createOptions())
    ).resolves.toBeUndefined();
  });

  it('should fail on warnings in strict mode', async () => {
    await expect(
      validateCommand(resolve(fixturesDir, 'strict-warnings.yaml'), createOptions({ strict: true }))
    ).rejects.toThrow('Strict validation failed with 1 warning(s)');

    expect(printedLines()).toContain('✓ Valid with 1 warning(s)');
    expect(consoleLogSpy).toHaveBeenLastCalledWith('⚠ Strict mode: warnings treated as errors');
  });

  it('should fail on an unbound consequent variable', async () => {
    const run = validateCommand(resolve(fixturesDir, 'invalid/unbound-consequent.yaml'), createOptions());

    await expect(run).rejects.toThrow(ValidationError);
    expect(printedLines()[3]).toBe('✗ 1 error(s), 0 warning(s)');
  });

  it('should print JSON output', async () => {
    setOutputOptions({ format: 'json' });

    await validateCommand(resolve(fixturesDir, 'grad-only.json'), createOptions({ format: 'json' }));

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.validation.ruleCount).toBe(1);
    expect(output.validation.factCount).toBe(2);
    expect(output.validation.errors).toEqual([]);
  });

  it('should throw FileNotFoundError for a missing file', async () => {
    await expect(
      validateCommand(resolve(fixturesDir, 'does-not-exist.json'), createOptions())
    ).rejects.toThrow(FileNotFoundError);
  });

  it('should reject a structurally invalid document', async () => {
    await expect(
      validateCommand(resolve(fixturesDir, 'invalid/missing-when.json'), createOptions())
    ).rejects.toThrow('Invalid rule set: rules[0]: missing required field "when"');
  });
});
