import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { resolve } from 'node:path';
import { runCommand, type RunCommandOptions } from '../../../../src/cli/commands/run.js';
import { DEFAULT_CLI_CONFIG } from '../../../../src/cli/types.js';
import {
  FileNotFoundError,
  InvalidArgumentsError,
  RunFailedError,
  ValidationError
} from '../../../../src/cli/utils/errors.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';

const fixturesDir = resolve(__dirname, '../../../fixtures/rulesets');

function createOptions(overrides: Partial<RunCommandOptions> = {}): RunCommandOptions {
  return {
    format: 'json',
    quiet: false,
    noColor: true,
    config: undefined,
    strategy: undefined,
    maxCycles: undefined,
    explain: false,
    trace: false,
    ...overrides
  };
}

describe('runCommand', () => {
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, void>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    setOutputOptions({ format: 'json', quiet: false, noColor: true });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    setOutputOptions({ format: 'pretty', quiet: false, noColor: false });
  });

  function printedJson(): { success: boolean; run: Record<string, unknown> & { result: Record<string, unknown> } } {
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
  }

  it('should run a YAML rule set with the configured strategy', async () => {
    await runCommand(resolve(fixturesDir, 'enrollment.yaml'), createOptions(), DEFAULT_CLI_CONFIG);

    const output = printedJson();
    expect(output.success).toBe(true);
    expect(output.run.result['strategy']).toBe('priority');
    expect(output.run.result['cycles']).toBe(6);
    expect(output.run.result['derivedFacts']).toEqual([
      ['cannot-enroll-course', 'Carol', 'CS550'],
      ['dropped-request', 'Carol', 'CS550'],
      ['notified-student', 'Carol', 'CS550']
    ]);
  });

  it('should use the strategy option', async () => {
    await runCommand(
      resolve(fixturesDir, 'enrollment.yaml'),
      createOptions({ strategy: 'order' }),
      DEFAULT_CLI_CONFIG
    );

    const output = printedJson();
    expect(output.run.result['strategy']).toBe('order');
  });

  it('should run a JSON rule set', async () => {
    await runCommand(resolve(fixturesDir, 'grad-only.json'), createOptions(), DEFAULT_CLI_CONFIG);

    const output = printedJson();
    expect(output.run.result['derivedFacts']).toEqual([['flag-violation', 'Alice', 'CS501']]);
    expect(output.run['explanations']).toEqual([]);
    expect(output.run['trace']).toEqual([]);
  });

  it('should include explanations and trace on request', async () => {
    await runCommand(
      resolve(fixturesDir, 'grad-only.json'),
      createOptions({ explain: true, trace: true }),
      DEFAULT_CLI_CONFIG
    );

    const output = printedJson();
    expect(output.run['explanations']).toHaveLength(1);
    expect(output.run['trace']).toHaveLength(9);
  });

  it('should print nothing when quiet', async () => {
    setOutputOptions({ quiet: true });

    await runCommand(resolve(fixturesDir, 'grad-only.json'), createOptions({ quiet: true }), DEFAULT_CLI_CONFIG);

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should fail when the cycle limit is reached', async () => {
    const run = runCommand(
      resolve(fixturesDir, 'enrollment.yaml'),
      createOptions({ maxCycles: 2 }),
      DEFAULT_CLI_CONFIG
    );

    await expect(run).rejects.toThrow(RunFailedError);
  });

  it('should report the cycle limit in the error', async () => {
    await expect(
      runCommand(resolve(fixturesDir, 'enrollment.yaml'), createOptions({ maxCycles: 2 }), DEFAULT_CLI_CONFIG)
    ).rejects.toThrow('Run failed: Run exceeded the limit of 2 firing cycles');
  });

  it('should reject an unknown strategy', async () => {
    await expect(
      runCommand(resolve(fixturesDir, 'grad-only.json'), createOptions({ strategy: 'random' }), DEFAULT_CLI_CONFIG)
    ).rejects.toThrow(InvalidArgumentsError);
  });

  it('should reject an invalid rule set', async () => {
    await expect(
      runCommand(resolve(fixturesDir, 'invalid/unbound-consequent.yaml'), createOptions(), DEFAULT_CLI_CONFIG)
    ).rejects.toThrow(ValidationError);
  });

  it('should throw FileNotFoundError for a missing file', async () => {
    await expect(
      runCommand(resolve(fixturesDir, 'missing.yaml'), createOptions(), DEFAULT_CLI_CONFIG)
    ).rejects.toThrow(FileNotFoundError);
  });

  it('should reject unsupported file types', async () => {
    await expect(
      runCommand(resolve(fixturesDir, 'rules.txt'), createOptions(), DEFAULT_CLI_CONFIG)
    ).rejects.toThrow('Unsupported file type ".txt", expected .json, .yaml or .yml');
  });
});
