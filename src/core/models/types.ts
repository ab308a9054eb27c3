/**
 * Core type definitions for the output coordinator
 */

import type { Severity, VerbosityLevel } from './severity.js';

/** Color output mode */
export type ColorMode = 'auto' | 'always' | 'never';

/** How prompts behave: ask, auto-confirm, or refuse */
export type PromptPolicy = 'interactive' | 'yes' | 'no';

/** Progress reporting when the stream has no cursor control */
export type NonInteractiveProgress = 'milestones' | 'silent';

/** Render strategies, selected once per coordinator */
export type RenderStrategyName = 'interactive-ansi' | 'interactive-plain' | 'non-interactive';

/** What the attached terminal can do */
export interface TerminalCapabilities {
  isInteractive: boolean;
  supportsAnsi: boolean;
  width?: number;
  height?: number;
}

/**
 * Minimal writable terminal stream.
 * process.stdout and process.stderr satisfy it.
 */
export interface TerminalStream {
  write(chunk: string, callback?: (error?: Error | null) => void): boolean;
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  on?(event: 'error', listener: (error: Error) => void): unknown;
}

export interface LogRecord {
  severity: Severity;
  message: string;
  /** Scope tag rendered as `[scope]`, e.g. a worker name */
  scope?: string;
}

/** Debug log configuration */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Resolved output configuration (config file + env + flags) */
export interface OutputConfig {
  logLevel: VerbosityLevel;
  color: ColorMode;
  /** Unset means: decided from the CI environment */
  prompt?: PromptPolicy;
  minRenderIntervalMs: number;
  animationIntervalMs: number;
  milestoneIntervalMs: number;
  nonInteractiveProgress: NonInteractiveProgress;
  maxBars?: number;
  debug: DebugConfig;
}
