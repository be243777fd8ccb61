import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { print, printData, printError, setOutputOptions, warning } from '../../../../src/cli/utils/output.js';

describe('output', () => {
  let consoleLogSpy: MockInstance<Parameters<typeof console.log>, void>;
  let consoleErrorSpy: MockInstance<Parameters<typeof console.error>, void>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setOutputOptions({ format: 'pretty', quiet: false, noColor: true });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    setOutputOptions({ format: 'pretty', quiet: false, noColor: false });
  });

  it('should print to stdout', () => {
    print('hello');

    expect(consoleLogSpy).toHaveBeenCalledWith('hello');
  });

  it('should stay silent when quiet', () => {
    setOutputOptions({ quiet: true });

    print('hello');
    printData({ type: 'explanation', data: { type: 'initial', fact: ['a'] } });

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should print failures to stderr even when quiet', () => {
    setOutputOptions({ quiet: true });

    printError('File not found: rules.yaml');

    expect(consoleErrorSpy).toHaveBeenCalledWith('✗ File not found: rules.yaml');
  });

  it('should render data in the selected format', () => {
    printData({ type: 'explanation', data: { type: 'initial', fact: ['graduate-only', 'CS501'] } });
    setOutputOptions({ format: 'json' });
    printData({ type: 'explanation', data: { type: 'initial', fact: ['graduate-only', 'CS501'] } });

    expect(consoleLogSpy.mock.calls[0]?.[0]).toBe('(graduate-only, CS501) [initial]');
    expect(JSON.parse(String(consoleLogSpy.mock.calls[1]?.[0]))).toEqual({
      success: true,
      data: { type: 'initial', fact: ['graduate-only', 'CS501'] }
    });
  });

  it('should format warnings without color when colors are off', () => {
    expect(warning('Strict mode: warnings treated as errors')).toBe('⚠ Strict mode: warnings treated as errors');
  });
});
