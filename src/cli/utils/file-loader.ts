/**
 * File loading helpers.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { FileNotFoundError, ValidationError } from './errors.js';

/** Result of loading a JSON file */
export interface LoadResult<T = unknown> {
  data: T;
  path: string;
}

/**
 * Loads and parses a JSON file.
 * @param filePath - Relative or absolute path
 * @returns Parsed data and the absolute path
 * @throws FileNotFoundError if the file does not exist
 * @throws ValidationError if the file is not valid JSON
 */
export function loadJsonFile(filePath: string): LoadResult {
  const absolutePath = resolve(filePath);

  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(filePath);
  }

  const content = readFileSync(absolutePath, 'utf-8');

  try {
    const data: unknown = JSON.parse(content);
    return { data, path: absolutePath };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid JSON in file: ${message}`);
  }
}

/**
 * Checks whether a file exists.
 */
export function fileExists(filePath: string): boolean {
  return existsSync(resolve(filePath));
}
