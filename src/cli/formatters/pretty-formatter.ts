/**
 * Pretty formatter for CLI output: a human-readable layout.
 */

import type { FormattableData, RunOutput, ValidateOutput } from '../types.js';
import type { OutputFormatter } from './index.js';
import type { FiringRecord } from '../../types/engine.js';
import type { Explanation } from '../../types/explanation.js';
import type { TraceEntry } from '../../debugging/types.js';
import type { StrategyComparison } from '../../core/strategy-comparison.js';
import { renderBindings, renderExplanation, renderFact } from '../../explanation/render.js';
import { issueMarker, paint, paintState, type Style } from '../utils/style.js';

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'run':
        return this.formatRun(data.data);
      case 'comparison':
        return this.formatComparison(data.data);
      case 'explanation':
        return this.formatExplanation(data.data);
      case 'validation':
        return this.formatValidation(data.data);
    }
  }

  private formatRun(output: RunOutput): string {
    const { result } = output;
    const lines: string[] = [];

    lines.push(this.color(`File: ${output.file}`, 'bold'));
    lines.push(`${this.color('Strategy:', 'cyan')} ${result.strategy}`);
    lines.push(`${this.color('State:', 'cyan')}    ${paintState(result.state, this.useColors)}`);
    lines.push(`${this.color('Cycles:', 'cyan')}   ${result.cycles}`);

    lines.push('');
    lines.push(this.color(`Firings (${result.firings.length}):`, 'cyan'));
    if (result.firings.length === 0) {
      lines.push(`  ${this.color('(none)', 'dim')}`);
    }
    for (const firing of result.firings) {
      lines.push(`  ${this.formatFiring(firing)}`);
    }

    lines.push('');
    lines.push(this.color(`Derived facts (${result.derivedFacts.length}):`, 'cyan'));
    if (result.derivedFacts.length === 0) {
      lines.push(`  ${this.color('(none)', 'dim')}`);
    }
    for (const fact of result.derivedFacts) {
      lines.push(`  ${this.color(renderFact(fact), 'green')}`);
    }

    if (output.explanations.length > 0) {
      lines.push('');
      lines.push(this.color('Explanations:', 'cyan'));
      for (const explanation of output.explanations) {
        lines.push(this.indent(renderExplanation(explanation), '  '));
      }
    }

    if (output.trace.length > 0) {
      lines.push('');
      lines.push(this.color(`Trace (${output.trace.length} entries):`, 'cyan'));
      for (const entry of output.trace) {
        lines.push(`  ${this.formatTraceEntry(entry)}`);
      }
    }

    return lines.join('\n');
  }

  private formatTraceEntry(entry: TraceEntry): string {
    const details = Object.entries(entry.details)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');
    const rule = entry.rule !== undefined ? ` ${this.color(entry.rule, 'magenta')}` : '';
    return `${this.color(`#${entry.cycle}`, 'dim')} ${this.color(entry.type, 'blue')}${rule}${details ? ' ' + details : ''}`;
  }

  private formatFiring(firing: FiringRecord): string {
    const cycle = this.color(`[${firing.cycle}]`, 'dim');
    const rule = this.color(firing.rule, 'magenta');
    const fact = firing.derived
      ? this.color(renderFact(firing.fact), 'green')
      : `${renderFact(firing.fact)} ${this.color('(already known)', 'dim')}`;
    return `${cycle} ${rule} ${renderBindings(firing.bindings)} → ${fact}`;
  }

  private formatComparison(comparison: StrategyComparison): string {
    const lines: string[] = [this.color('Strategy comparison', 'bold'), ''];

    for (const run of comparison.runs) {
      const { result } = run;
      lines.push(
        `${this.color(run.strategy, 'cyan')} ${this.color(`(${result.firings.length} firing(s), ${result.derivedFacts.length} derived)`, 'dim')}`
      );
      result.firings.forEach((firing, i) => {
        lines.push(`  ${i + 1}. ${this.color(firing.rule, 'magenta')} → ${renderFact(firing.fact)}`);
      });
      if (result.firings.length === 0) {
        lines.push(`  ${this.color('(nothing fired)', 'dim')}`);
      }
      lines.push('');
    }

    lines.push(
      comparison.sameFinalFacts
        ? this.color('✓ All strategies reached the same final facts', 'green')
        : this.color('⚠ Strategies reached different final facts', 'yellow')
    );

    return lines.join('\n');
  }

  private formatExplanation(explanation: Explanation): string {
    return renderExplanation(explanation);
  }

  private formatValidation(output: ValidateOutput): string {
    const lines: string[] = [];

    lines.push(this.color(`File: ${output.file}`, 'bold'));
    lines.push(`Rules: ${output.ruleCount}, facts: ${output.factCount}`);
    lines.push('');

    if (output.valid && output.warningCount === 0) {
      lines.push(this.color('✓ Rule set is valid', 'green'));
    } else if (output.valid) {
      lines.push(this.color(`✓ Valid with ${output.warningCount} warning(s)`, 'green'));
    } else {
      lines.push(this.color(`✗ ${output.errorCount} error(s), ${output.warningCount} warning(s)`, 'red'));
    }

    if (output.errors.length > 0) {
      lines.push('');
      lines.push(this.color('Errors:', 'red'));
      for (const err of output.errors) {
        lines.push(`  ${issueMarker(err.severity, this.useColors)} ${this.color(err.path, 'cyan')}: ${err.message}`);
      }
    }

    if (output.warnings.length > 0) {
      lines.push('');
      lines.push(this.color('Warnings:', 'yellow'));
      for (const warn of output.warnings) {
        lines.push(`  ${issueMarker(warn.severity, this.useColors)} ${this.color(warn.path, 'cyan')}: ${warn.message}`);
      }
    }

    return lines.join('\n');
  }

  private indent(text: string, prefix: string): string {
    return text
      .split('\n')
      .map((line) => prefix + line)
      .join('\n');
  }

  private color(text: string, style: Style): string {
    return paint(text, style, this.useColors);
  }
}
