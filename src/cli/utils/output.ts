/**
 * CLI output writers.
 *
 * `print` and `printData` honour `--quiet`; `printData` renders through the
 * formatter selected by `--format`. Styles are written only when colors are
 * enabled.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';
import { issueLine } from './style.js';

interface OutputSettings {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

let settings: OutputSettings = {
  quiet: false,
  noColor: false,
  format: 'pretty'
};

/** Updates the output settings from the global options */
export function setOutputOptions(options: Partial<OutputSettings>): void {
  settings = { ...settings, ...options };
}

/** Whether styles are written: off for `--no-color`, `NO_COLOR` and non-TTY output */
function colorsEnabled(): boolean {
  if (settings.noColor || process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY === true;
}

/** A warning line for stdout */
export function warning(message: string): string {
  return issueLine('warning', message, colorsEnabled());
}

/** Prints to stdout unless quiet */
export function print(message: string): void {
  if (!settings.quiet) {
    console.log(message);
  }
}

/** Prints a failure to stderr, quiet or not */
export function printError(message: string): void {
  console.error(issueLine('error', message, colorsEnabled()));
}

/** Prints command output in the selected format */
export function printData(data: FormattableData): void {
  if (settings.quiet) {
    return;
  }
  print(createFormatter(settings.format, colorsEnabled()).format(data));
}
