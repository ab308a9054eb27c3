/**
 * Diagnostic log for the library itself.
 *
 * One line per entry, appended to a file when `debug.enabled` is set and
 * echoed to stderr in trace mode. Never touches the coordinated stream,
 * so it can record what happened to the terminal.
 *
 *   2026-01-02T03:04:05.678Z WARN render-surface: stream write failed {"lines":3}
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/types.js';
import { toError } from './error.js';

type DebugLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

interface DebugState {
  /** Null while file logging is off */
  logFile: string | null;
  stderr: boolean;
  initialized: boolean;
  /** Error that turned file logging off */
  writeError: Error | null;
}

function initialState(): DebugState {
  return { logFile: null, stderr: false, initialized: false, writeError: null };
}

let state = initialState();

function defaultLogFile(projectDir: string): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return join(projectDir, '.linegate', 'logs', `debug-${stamp}.log`);
}

function encodeData(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  try {
    return JSON.stringify(data) ?? String(data);
  } catch (err) {
    return `<unserializable: ${toError(err).message}>`;
  }
}

function formatEntry(level: DebugLevel, component: string, message: string, data: unknown): string {
  const entry = `${new Date().toISOString()} ${level} ${component}: ${message}`;
  return data === undefined ? entry : `${entry} ${encodeData(data)}`;
}

function record(level: DebugLevel, component: string, message: string, data: unknown): void {
  if (!state.stderr && state.logFile === null) {
    return;
  }
  const entry = formatEntry(level, component, message, data);
  if (state.stderr) {
    process.stderr.write(`${entry}\n`);
  }
  if (state.logFile === null) {
    return;
  }
  try {
    appendFileSync(state.logFile, `${entry}\n`, 'utf-8');
  } catch (err) {
    // Output keeps working without its diagnostic log.
    state.writeError = toError(err);
    state.logFile = null;
  }
}

/**
 * Open the log file. Only the first call per process takes effect.
 * @param projectDir - base for the default `.linegate/logs/` location
 */
export function initDebugLogger(config?: DebugConfig, projectDir?: string): void {
  if (state.initialized) {
    return;
  }
  state.initialized = true;
  if (!config?.enabled) {
    return;
  }

  const logFile = config.logFile ?? (projectDir === undefined ? null : defaultLogFile(projectDir));
  if (logFile === null) {
    return;
  }
  mkdirSync(dirname(logFile), { recursive: true });
  writeFileSync(logFile, `# linegate debug log, started ${new Date().toISOString()}\n`, 'utf-8');
  state.logFile = logFile;
}

export function resetDebugLogger(): void {
  state = initialState();
}

/** Echo entries to stderr as well */
export function setVerboseConsole(enabled: boolean): void {
  state.stderr = enabled;
}

export function isDebugEnabled(): boolean {
  return state.logFile !== null;
}

export function getDebugLogFile(): string | null {
  return state.logFile;
}

export function getDebugWriteError(): Error | null {
  return state.writeError;
}

export function createLogger(component: string): ComponentLogger {
  return {
    debug: (message, data) => record('DEBUG', component, message, data),
    info: (message, data) => record('INFO', component, message, data),
    warn: (message, data) => record('WARN', component, message, data),
    error: (message, data) => record('ERROR', component, message, data),
  };
}
