/**
 * CLI helper functions
 *
 * Option value parsers and global option resolution.
 */

import { InvalidArgumentError } from 'commander';
import type { ColorMode, OutputConfig, PromptPolicy } from '../../core/models/types.js';
import type { VerbosityLevel } from '../../core/models/severity.js';
import { verbosityFromFlags } from './verbosity.js';

/** Global options as commander hands them over */
export interface GlobalOptions {
  verbose: number;
  quiet: number;
  color?: ColorMode;
  yes?: boolean;
  nonInteractive?: boolean;
  config?: string;
}

/** Accumulator for repeatable count flags (-vv) */
export function increaseCount(_value: string, previous: number): number {
  return previous + 1;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export interface ResolvedGlobalSettings {
  level: VerbosityLevel;
  color: ColorMode;
  promptPolicy: PromptPolicy | undefined;
}

/** Flags win over the configuration file */
export function resolveGlobalSettings(opts: GlobalOptions, config: OutputConfig): ResolvedGlobalSettings {
  let promptPolicy = config.prompt;
  if (opts.yes) {
    promptPolicy = 'yes';
  } else if (opts.nonInteractive) {
    promptPolicy = 'no';
  }
  return {
    level: verbosityFromFlags(opts.verbose, opts.quiet) ?? config.logLevel,
    color: opts.color ?? config.color,
    promptPolicy,
  };
}
