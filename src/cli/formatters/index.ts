/**
 * Formatter factory for CLI output.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { JsonFormatter } from './json-formatter.js';
import { PrettyFormatter } from './pretty-formatter.js';

/** Output formatter */
export interface OutputFormatter {
  format(data: FormattableData): string;
}

/** Creates the formatter for an output format */
export function createFormatter(format: OutputFormat, useColors: boolean = true): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(true);
    case 'pretty':
      return new PrettyFormatter(useColors);
    default:
      return new PrettyFormatter(useColors);
  }
}

export { JsonFormatter } from './json-formatter.js';
export { PrettyFormatter } from './pretty-formatter.js';
