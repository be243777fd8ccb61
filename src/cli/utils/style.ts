/**
 * ANSI styling for CLI output: engine states and validation issue markers
 * look the same in every command and in error output.
 */

import type { EngineState } from '../../types/engine.js';
import type { ValidationIssue } from '../../validation/types.js';

export type Style = 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan';

const STYLE_CODES: Record<Style, string> = {
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m'
};

const RESET = '\x1b[0m';

/** Wraps text in an ANSI style, or returns it as is when `enabled` is false */
export function paint(text: string, style: Style, enabled: boolean): string {
  return enabled ? `${STYLE_CODES[style]}${text}${RESET}` : text;
}

const STATE_STYLES: Record<EngineState, Style> = {
  running: 'yellow',
  saturated: 'green',
  failed: 'red'
};

/** Engine state, colored by outcome */
export function paintState(state: EngineState, enabled: boolean): string {
  return paint(state, STATE_STYLES[state], enabled);
}

type Severity = ValidationIssue['severity'];

const ISSUE_MARKERS: Record<Severity, { marker: string; style: Style }> = {
  error: { marker: '✗', style: 'red' },
  warning: { marker: '⚠', style: 'yellow' }
};

/** `✗` or `⚠`, colored by severity */
export function issueMarker(severity: Severity, enabled: boolean): string {
  const { marker, style } = ISSUE_MARKERS[severity];
  return paint(marker, style, enabled);
}

/** A marked line: `✗ message` or `⚠ message`, marker and text colored alike */
export function issueLine(severity: Severity, message: string, enabled: boolean): string {
  const { style } = ISSUE_MARKERS[severity];
  return `${issueMarker(severity, enabled)} ${paint(message, style, enabled)}`;
}
