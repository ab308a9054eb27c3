export type {
  ColorMode,
  PromptPolicy,
  NonInteractiveProgress,
  RenderStrategyName,
  TerminalCapabilities,
  TerminalStream,
  LogRecord,
  DebugConfig,
  OutputConfig,
} from './types.js';

export type { Severity, VerbosityLevel } from './severity.js';
export { SEVERITIES, VERBOSITY_LEVELS, DEFAULT_VERBOSITY, shouldEmit, isVerbosityLevel } from './severity.js';

export {
  VerbosityLevelSchema,
  ColorModeSchema,
  PromptPolicySchema,
  NonInteractiveProgressSchema,
  DebugConfigSchema,
  OutputConfigFileSchema,
} from './schemas.js';
export type { OutputConfigFile } from './schemas.js';
