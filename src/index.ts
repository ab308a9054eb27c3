/**
 * linegate - coordinated terminal output for concurrent tasks
 */

export { OutputCoordinator, defaultPromptPolicy } from './core/output/OutputCoordinator.js';
export type { OutputCoordinatorOptions, ExitHooks } from './core/output/OutputCoordinator.js';
export { ExclusiveSection } from './core/output/ExclusiveSection.js';
export type { Release } from './core/output/ExclusiveSection.js';
export { Logger } from './core/output/Logger.js';
export type { LogSink } from './core/output/Logger.js';
export { LineWriter } from './core/output/LineWriter.js';
export { ProgressBar } from './core/output/ProgressBar.js';
export { ReadlineLineSource } from './core/output/LineSource.js';
export type { LineSource } from './core/output/LineSource.js';
export type { PromptOptions, PromptSession, PromptState } from './core/output/PromptController.js';

export { ProgressRegistry } from './core/progress/ProgressRegistry.js';
export { ProgressHandle } from './core/progress/ProgressHandle.js';
export { formatBytes } from './core/progress/format.js';
export type { ProgressOptions, ProgressSnapshot, ProgressOutcome } from './core/progress/ProgressHandle.js';

export { detectCapabilities, selectStrategy } from './core/terminal/capabilities.js';
export { RenderSurface } from './core/terminal/RenderSurface.js';

export * from './core/models/index.js';

export {
  initOutput,
  getOutput,
  isOutputInitialized,
  resetOutput,
  trace,
  debug,
  info,
  warn,
  error,
  print,
  logger,
  progress,
  prompt,
  confirm,
} from './shared/ui/index.js';

export { InvalidHandleError, PromptNotAllowedError, ConfigError } from './shared/utils/error.js';
export { loadOutputConfig, toCoordinatorOptions } from './infra/config/index.js';
