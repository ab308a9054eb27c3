/**
 * Log severity and verbosity ordering
 */

export const SEVERITIES = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** A verbosity threshold; 'off' suppresses everything */
export type VerbosityLevel = Severity | 'off';

export const VERBOSITY_LEVELS = [...SEVERITIES, 'off'] as const;

export const DEFAULT_VERBOSITY: VerbosityLevel = 'info';

const PRIORITY: Record<VerbosityLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

/**
 * Whether a record of the given severity passes the verbosity threshold.
 */
export function shouldEmit(severity: Severity, level: VerbosityLevel = DEFAULT_VERBOSITY): boolean {
  if (level === 'off') {
    return false;
  }
  return PRIORITY[severity] >= PRIORITY[level];
}

export function isVerbosityLevel(value: string): value is VerbosityLevel {
  return (VERBOSITY_LEVELS as readonly string[]).includes(value);
}
