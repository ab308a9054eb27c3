/**
 * Log line formatting.
 */

import type { ChalkInstance } from 'chalk';
import type { LogRecord } from '../models/types.js';
import type { Severity } from '../models/severity.js';
import { splitLines } from '../../shared/utils/text.js';

const LABELS: Record<Severity, string> = {
  trace: '[TRACE]',
  debug: '[DEBUG]',
  info: '[INFO]',
  warn: '[WARN]',
  error: '[ERROR]',
};

const COLORS = {
  trace: 'magenta',
  debug: 'gray',
  info: 'blue',
  warn: 'yellow',
  error: 'red',
} as const satisfies Record<Severity, keyof ChalkInstance>;

export const CONTINUATION_PREFIX = '  | ';

/**
 * Render a record as complete lines (no terminators).
 * Multi-line messages continue under a `  | ` gutter.
 */
export function formatLogRecord(record: LogRecord, paint: ChalkInstance): string[] {
  const color = paint[COLORS[record.severity]];
  const prefix = LABELS[record.severity] + (record.scope ? `[${record.scope}]` : '');
  const [first = '', ...rest] = splitLines(record.message);

  const lines = [color(first ? `${prefix} ${first}` : prefix)];
  for (const line of rest) {
    lines.push(color(CONTINUATION_PREFIX + line));
  }
  return lines;
}
