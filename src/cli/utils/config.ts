/**
 * CLI configuration: locating, loading and caching the configuration file.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CliConfig } from '../types.js';
import { DEFAULT_CLI_CONFIG } from '../types.js';
import { isConflictStrategy } from '../../validation/constants.js';
import { isObject } from '../../validation/types.js';

const CONFIG_FILENAME = '.forward-rules.json';

/** Looks for the configuration file up the directory hierarchy */
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

  // Fall back to the home directory
  const homeConfig = join(homedir(), CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/** Configuration file contents: any subset of the settings */
interface ConfigOverride {
  engine?: Partial<CliConfig['engine']>;
  output?: Partial<CliConfig['output']>;
}

/** Parses and checks the JSON configuration */
function parseConfig(content: string, filePath: string): ConfigOverride {
  try {
    const parsed: unknown = JSON.parse(content);

    if (!isObject(parsed)) {
      throw new Error('Configuration must be an object');
    }

    const override: ConfigOverride = {};

    const engine = parsed['engine'];
    if (isObject(engine)) {
      const settings: Partial<CliConfig['engine']> = {};
      const strategy = engine['strategy'];
      if (strategy !== undefined) {
        if (!isConflictStrategy(strategy)) {
          throw new Error(`Unknown strategy "${String(strategy)}"`);
        }
        settings.strategy = strategy;
      }
      const maxCycles = engine['maxCycles'];
      if (maxCycles !== undefined) {
        if (typeof maxCycles !== 'number' || !Number.isInteger(maxCycles) || maxCycles < 1) {
          throw new Error('engine.maxCycles must be a positive integer');
        }
        settings.maxCycles = maxCycles;
      }
      override.engine = settings;
    }

    const output = parsed['output'];
    if (isObject(output)) {
      const settings: Partial<CliConfig['output']> = {};
      const format = output['format'];
      if (format !== undefined) {
        if (format !== 'pretty' && format !== 'json') {
          throw new Error(`Unknown output format "${String(format)}"`);
        }
        settings.format = format;
      }
      const colors = output['colors'];
      if (colors !== undefined) {
        if (typeof colors !== 'boolean') {
          throw new Error('output.colors must be a boolean');
        }
        settings.colors = colors;
      }
      override.output = settings;
    }

    return override;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration in ${filePath}: ${message}`);
  }
}

/** Merges the configuration over the defaults */
function mergeConfig(base: CliConfig, override: ConfigOverride): CliConfig {
  return {
    engine: {
      ...base.engine,
      ...override.engine
    },
    output: {
      ...base.output,
      ...override.output
    }
  };
}

/** Loaded configuration cache */
let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Loads the CLI configuration.
 *
 * Priority:
 * 1. Explicit path
 * 2. Configuration file in the current directory or its parents
 * 3. Configuration file in the home directory
 * 4. Defaults
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

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
      throw new Error(`Configuration file not found: ${pathToLoad}`);
    }
    cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, {});
    cachedConfigPath = null;
    return cachedConfig;
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  const parsed = parseConfig(content, pathToLoad);
  cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, parsed);
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resets the configuration cache (for tests) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Path of the loaded configuration file */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
