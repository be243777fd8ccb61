/**
 * Main CLI setup using CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import type { CliConfig, GlobalOptions, OutputFormat } from './types.js';
import { loadConfig } from './utils/config.js';
import { setOutputOptions, printError } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { compareCommand, type CompareCommandOptions } from './commands/compare.js';
import { explainCommand, type ExplainCommandOptions } from './commands/explain.js';

/** CLI instance */
const cli = cac('forward-rules');

/**
 * Promise of the running async action.
 * CAC does not await async action handlers, so run() does.
 */
let _actionPromise: Promise<void> | undefined;

/** Wraps an async action handler so that run() can await it. */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args);
  };
}

// -----------------------------------------------------------------------------
// Option readers
// -----------------------------------------------------------------------------

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return value === undefined ? undefined : String(value);
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentsError(`--${key.replace(/[A-Z]/g, (c) => '-' + c.toLowerCase())} must be a number`);
  }
  return parsed;
}

function formatOption(value: string | undefined, config: CliConfig): OutputFormat {
  if (value === undefined) {
    return config.output.format;
  }
  if (value !== 'json' && value !== 'pretty') {
    throw new InvalidArgumentsError(`Unknown format "${value}", expected json or pretty`);
  }
  return value;
}

// -----------------------------------------------------------------------------
// Commands
// -----------------------------------------------------------------------------

/** Processes the global options */
function processGlobalOptions(options: Record<string, unknown>): { global: GlobalOptions; config: CliConfig } {
  const configPath = stringOption(options, 'config');
  const config = loadConfig(configPath);

  const format = formatOption(stringOption(options, 'format'), config);
  const quiet = booleanOption(options, 'quiet') ?? false;
  // `--no-color` reaches the handler as `color: false`
  const noColor = options['color'] === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    global: { format, quiet, noColor, config: configPath },
    config
  };
}

/** Registers the global options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty', {
      default: undefined
    })
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

/** Registers the version command */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`forward-rules v${version}`);
  });
}

/** Registers the run command */
function registerRunCommand(): void {
  cli
    .command('run <file>', 'Run a rule set to saturation')
    .option('-s, --strategy <strategy>', 'Conflict strategy: priority, specificity, order')
    .option('-e, --explain', 'Print the derivation tree of every derived fact')
    .option('-t, --trace', 'Print the engine trace')
    .option('--max-cycles <n>', 'Maximum number of firings')
    .action(tracked(async (file: string, options: Record<string, unknown>) => {
      try {
        const { global, config } = processGlobalOptions(options);
        const runOptions: RunCommandOptions = {
          ...global,
          strategy: stringOption(options, 'strategy'),
          maxCycles: numberOption(options, 'maxCycles'),
          explain: booleanOption(options, 'explain') ?? false,
          trace: booleanOption(options, 'trace') ?? false
        };
        await runCommand(file, runOptions, config);
      } catch (err) {
        printError(formatError(err));
        process.exit(getExitCode(err));
      }
    }));
}

/** Registers the compare command */
function registerCompareCommand(): void {
  cli
    .command('compare <file>', 'Run a rule set under every conflict strategy')
    .option('--max-cycles <n>', 'Maximum number of firings per strategy')
    .action(tracked(async (file: string, options: Record<string, unknown>) => {
      try {
        const { global, config } = processGlobalOptions(options);
        const compareOptions: CompareCommandOptions = {
          ...global,
          maxCycles: numberOption(options, 'maxCycles')
        };
        await compareCommand(file, compareOptions, config);
      } catch (err) {
        printError(formatError(err));
        process.exit(getExitCode(err));
      }
    }));
}

/** Registers the validate command */
function registerValidateCommand(): void {
  cli
    .command('validate <file>', 'Validate a rule-set file')
    .option('--strict', 'Enable strict validation mode')
    .action(tracked(async (file: string, options: Record<string, unknown>) => {
      try {
        const { global } = processGlobalOptions(options);
        const validateOptions: ValidateOptions = {
          ...global,
          strict: booleanOption(options, 'strict') ?? false
        };
        await validateCommand(file, validateOptions);
      } catch (err) {
        printError(formatError(err));
        process.exit(getExitCode(err));
      }
    }));
}

/** Registers the explain command */
function registerExplainCommand(): void {
  cli
    .command('explain <file> [...fact]', 'Explain how a fact was derived')
    .option('-s, --strategy <strategy>', 'Conflict strategy: priority, specificity, order')
    .option('--max-cycles <n>', 'Maximum number of firings')
    .example('forward-rules explain enrollment.yaml flag-violation Alice CS501')
    .action(tracked(async (file: string, fact: (string | number)[], options: Record<string, unknown>) => {
      try {
        const { global, config } = processGlobalOptions(options);
        const explainOptions: ExplainCommandOptions = {
          ...global,
          strategy: stringOption(options, 'strategy'),
          maxCycles: numberOption(options, 'maxCycles')
        };
        await explainCommand(file, fact, explainOptions, config);
      } catch (err) {
        printError(formatError(err));
        process.exit(getExitCode(err));
      }
    }));
}

/**
 * Runs the CLI.
 */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerRunCommand();
  registerCompareCommand();
  registerValidateCommand();
  registerExplainCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

export { cli };
