/**
 * Process-wide output coordinator.
 *
 * initOutput() is the single construction point; everything else reaches
 * the coordinator through getOutput() or the module-level helpers below.
 */

import {
  OutputCoordinator,
  type OutputCoordinatorOptions,
} from '../../core/output/OutputCoordinator.js';
import type { Logger } from '../../core/output/Logger.js';
import type { ProgressBar } from '../../core/output/ProgressBar.js';
import type { PromptOptions } from '../../core/output/PromptController.js';
import type { ProgressOptions } from '../../core/progress/ProgressHandle.js';

let instance: OutputCoordinator | null = null;

export function initOutput(options: OutputCoordinatorOptions = {}): OutputCoordinator {
  if (instance) {
    throw new Error('Output coordinator is already initialized');
  }
  instance = new OutputCoordinator(options);
  return instance;
}

export function getOutput(): OutputCoordinator {
  if (!instance) {
    throw new Error('Output coordinator is not initialized; call initOutput() first');
  }
  return instance;
}

export function isOutputInitialized(): boolean {
  return instance !== null;
}

/** Drop the coordinator (for testing) */
export function resetOutput(): void {
  instance = null;
}

export function trace(message: string): void {
  getOutput().emitLog({ severity: 'trace', message });
}

export function debug(message: string): void {
  getOutput().emitLog({ severity: 'debug', message });
}

export function info(message: string): void {
  getOutput().emitLog({ severity: 'info', message });
}

export function warn(message: string): void {
  getOutput().emitLog({ severity: 'warn', message });
}

export function error(message: string): void {
  getOutput().emitLog({ severity: 'error', message });
}

export function print(text: string): void {
  getOutput().print(text);
}

export function logger(scope?: string): Logger {
  return getOutput().logger(scope);
}

export function progress(label: string, options?: ProgressOptions): ProgressBar {
  return getOutput().progress(label, options);
}

export function prompt(text: string, options?: PromptOptions): Promise<string | null> {
  return getOutput().prompt(text, options);
}

export function confirm(message: string, defaultYes = true): Promise<boolean> {
  return getOutput().confirm(message, defaultYes);
}
