/**
 * Output configuration loading
 *
 * Resolution order: defaults, then `.linegate.yaml` (or --config),
 * then LINEGATE_* environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { OutputConfigFileSchema, type OutputConfigFile } from '../../core/models/schemas.js';
import type { OutputConfig } from '../../core/models/types.js';
import type { OutputCoordinatorOptions } from '../../core/output/OutputCoordinator.js';
import { ConfigError, getErrorMessage } from '../../shared/utils/error.js';
import { createLogger } from '../../shared/utils/debug.js';
import { applyOutputConfigEnvOverrides } from './env/config-env-overrides.js';
import { getDefaultConfigPath, resolveConfigPath } from './paths.js';

const log = createLogger('config');

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  logLevel: 'info',
  color: 'auto',
  minRenderIntervalMs: 100,
  animationIntervalMs: 100,
  milestoneIntervalMs: 5000,
  nonInteractiveProgress: 'milestones',
  debug: { enabled: false },
};

export interface LoadConfigOptions {
  /** Explicit config path; must exist */
  path?: string;
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read ${configPath}: ${getErrorMessage(err)}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a mapping`);
  }
  return parsed;
}

function normalizeConfig(file: OutputConfigFile): OutputConfig {
  return {
    logLevel: file.log_level,
    color: file.color,
    prompt: file.prompt,
    minRenderIntervalMs: file.min_render_interval_ms,
    animationIntervalMs: file.animation_interval_ms,
    milestoneIntervalMs: file.milestone_interval_ms,
    nonInteractiveProgress: file.non_interactive_progress,
    maxBars: file.max_bars,
    debug: {
      enabled: file.debug?.enabled ?? false,
      logFile: file.debug?.log_file,
    },
  };
}

export function loadOutputConfig(options: LoadConfigOptions = {}): OutputConfig {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.path !== undefined
    ? resolveConfigPath(options.path, cwd)
    : getDefaultConfigPath(cwd);

  const raw: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    Object.assign(raw, readConfigFile(configPath));
  } else if (options.path !== undefined) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  applyOutputConfigEnvOverrides(raw, options.env ?? process.env);

  const result = OutputConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration (${configPath}): ${details}`);
  }

  const config = normalizeConfig(result.data);
  log.debug('Loaded output config', { configPath, config });
  return config;
}

/** Coordinator options carried by the configuration */
export function toCoordinatorOptions(config: OutputConfig): OutputCoordinatorOptions {
  return {
    level: config.logLevel,
    color: config.color,
    promptPolicy: config.prompt,
    minRenderIntervalMs: config.minRenderIntervalMs,
    animationIntervalMs: config.animationIntervalMs,
    milestoneIntervalMs: config.milestoneIntervalMs,
    nonInteractiveProgress: config.nonInteractiveProgress,
    maxBars: config.maxBars,
  };
}
