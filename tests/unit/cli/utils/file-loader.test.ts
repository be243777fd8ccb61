import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadJsonFile, fileExists } from '../../../../src/cli/utils/file-loader.js';
import { FileNotFoundError, ValidationError } from '../../../../src/cli/utils/errors.js';

const fixturesDir = resolve(__dirname, '../../../fixtures/rulesets');

describe('file-loader', () => {
  describe('loadJsonFile', () => {
    it('should load a valid JSON file', () => {
      const result = loadJsonFile(resolve(fixturesDir, 'grad-only.json'));

      expect(result.path).toBe(resolve(fixturesDir, 'grad-only.json'));
      expect(result.data).toHaveProperty('rules');
    });

    it('should throw FileNotFoundError for a missing file', () => {
      expect(() => loadJsonFile(resolve(fixturesDir, 'missing.json'))).toThrow(FileNotFoundError);
    });

    it('should throw ValidationError for invalid JSON', () => {
      expect(() => loadJsonFile(resolve(fixturesDir, 'invalid/not-json.json'))).toThrow(ValidationError);
      expect(() => loadJsonFile(resolve(fixturesDir, 'invalid/not-json.json'))).toThrow(/^Invalid JSON in file: /);
    });
  });

  describe('fileExists', () => {
    it('should report whether a file exists', () => {
      expect(fileExists(resolve(fixturesDir, 'enrollment.yaml'))).toBe(true);
      expect(fileExists(resolve(fixturesDir, 'missing.yaml'))).toBe(false);
    });
  });
});
