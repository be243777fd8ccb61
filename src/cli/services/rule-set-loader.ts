/**
 * Loads rule-set files for the CLI commands.
 *
 * `.json` files are parsed and checked against the same document schema as
 * YAML (`rules` plus optional `facts`, `when`/`then` aliases, `?name`
 * variables). `.yaml` and `.yml` files go through the YAML loader.
 */

import { extname, resolve } from 'node:path';
import type { RuleSet } from '../../types/rule.js';
import { loadRuleSetFromFile, validateRuleSet } from '../../dsl/yaml/index.js';
import { DslError } from '../../dsl/helpers/errors.js';
import { loadJsonFile, fileExists } from '../utils/file-loader.js';
import { FileNotFoundError, InvalidArgumentsError, ValidationError } from '../utils/errors.js';

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

/** Loaded rule set and the absolute path it came from */
export interface LoadedRuleSet {
  ruleSet: RuleSet;
  path: string;
}

/**
 * Loads and structurally validates a rule-set file.
 *
 * @throws FileNotFoundError if the file does not exist
 * @throws InvalidArgumentsError for an unsupported file extension
 * @throws ValidationError if the file cannot be parsed into a rule set
 */
export async function loadRuleSet(filePath: string): Promise<LoadedRuleSet> {
  const ext = extname(filePath).toLowerCase();

  if (ext === '.json') {
    const { data, path } = loadJsonFile(filePath);
    return { ruleSet: toRuleSet(() => validateRuleSet(data)), path };
  }

  if (YAML_EXTENSIONS.has(ext)) {
    if (!fileExists(filePath)) {
      throw new FileNotFoundError(filePath);
    }
    const path = resolve(filePath);
    try {
      return { ruleSet: await loadRuleSetFromFile(path), path };
    } catch (err) {
      if (err instanceof DslError) {
        throw new ValidationError(`Invalid rule set: ${err.message}`, [], err);
      }
      throw err;
    }
  }

  throw new InvalidArgumentsError(`Unsupported file type "${ext || '(none)'}", expected .json, .yaml or .yml`);
}

function toRuleSet(load: () => RuleSet): RuleSet {
  try {
    return load();
  } catch (err) {
    if (err instanceof DslError) {
      throw new ValidationError(`Invalid rule set: ${err.message}`, [], err);
    }
    throw err;
  }
}
