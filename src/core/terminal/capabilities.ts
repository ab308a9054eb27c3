/**
 * Terminal capability detection and render strategy selection.
 */

import type { ColorSupportLevel } from 'chalk';
import type {
  ColorMode,
  RenderStrategyName,
  TerminalCapabilities,
  TerminalStream,
} from '../models/types.js';

type Env = Readonly<Record<string, string | undefined>>;

function positiveInteger(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return undefined;
  }
  return Math.floor(value);
}

/** Current column count of a stream, or undefined when it reports none */
export function measureWidth(stream: TerminalStream): number | undefined {
  return positiveInteger(stream.columns);
}

/**
 * Inspect a stream once. Anything that cannot be determined
 * degrades to the non-interactive answer.
 */
export function detectCapabilities(stream: TerminalStream, env: Env = process.env): TerminalCapabilities {
  const isInteractive = stream.isTTY === true;
  const supportsAnsi = isInteractive && env.TERM !== 'dumb';
  return {
    isInteractive,
    supportsAnsi,
    width: isInteractive ? measureWidth(stream) : undefined,
    height: isInteractive ? positiveInteger(stream.rows) : undefined,
  };
}

export function selectStrategy(capabilities: TerminalCapabilities): RenderStrategyName {
  if (!capabilities.isInteractive) {
    return 'non-interactive';
  }
  return capabilities.supportsAnsi ? 'interactive-ansi' : 'interactive-plain';
}

/**
 * Chalk level for a coordinator.
 * Non-interactive output never carries color, whatever the mode.
 */
export function resolveColorLevel(
  mode: ColorMode,
  capabilities: TerminalCapabilities,
  env: Env = process.env,
): ColorSupportLevel {
  if (mode === 'never' || !capabilities.isInteractive) {
    return 0;
  }
  if (mode === 'always') {
    return 1;
  }
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== '') {
    return 0;
  }
  return capabilities.supportsAnsi ? 1 : 0;
}

/**
 * Frame height limit derived from the terminal height:
 * half the screen minus a margin, at least one line.
 */
export function defaultMaxBars(capabilities: TerminalCapabilities): number | undefined {
  if (capabilities.height === undefined) {
    return undefined;
  }
  return Math.max(1, Math.floor(capabilities.height / 2) - 2);
}
