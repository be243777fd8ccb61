/**
 * JSON formatter for CLI output.
 *
 * Every document carries `success`: whether the run saturated, or whether
 * the rule set validated.
 */

import type { FormattableData } from '../types.js';
import type { OutputFormatter } from './index.js';

/** Binding sets are Maps; JSON gets them as plain objects. */
function replacer(_key: string, value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly pretty: boolean = false) {}

  format(data: FormattableData): string {
    const output = this.toOutputObject(data);
    return this.pretty ? JSON.stringify(output, replacer, 2) : JSON.stringify(output, replacer);
  }

  private toOutputObject(data: FormattableData): unknown {
    switch (data.type) {
      case 'validation':
        return { success: data.data.valid, validation: data.data };

      case 'run':
        return { success: data.data.result.state === 'saturated', run: data.data };

      case 'comparison':
      case 'explanation':
        return { success: true, data: data.data };
    }
  }
}
