/**
 * Tests for output configuration loading
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_OUTPUT_CONFIG,
  loadOutputConfig,
  toCoordinatorOptions,
} from '../infra/config/loadConfig.js';
import {
  applyOutputConfigEnvOverrides,
  envVarNameFromPath,
} from '../infra/config/env/config-env-overrides.js';
import { ConfigError } from '../shared/utils/error.js';

describe('loadOutputConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linegate-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return the defaults without a config file', () => {
    expect(loadOutputConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_OUTPUT_CONFIG);
  });

  it('should read .linegate.yaml from the working directory', () => {
    writeFileSync(join(dir, '.linegate.yaml'), [
      'log_level: debug',
      'color: never',
      'prompt: no',
      'max_bars: 4',
      'debug:',
      '  enabled: true',
      '  log_file: out.log',
      '',
    ].join('\n'));

    const config = loadOutputConfig({ cwd: dir, env: {} });

    expect(config).toMatchObject({
      logLevel: 'debug',
      color: 'never',
      prompt: 'no',
      maxBars: 4,
      minRenderIntervalMs: 100,
      debug: { enabled: true, logFile: 'out.log' },
    });
  });

  it('should treat an empty file as no settings', () => {
    writeFileSync(join(dir, '.linegate.yaml'), '');

    expect(loadOutputConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_OUTPUT_CONFIG);
  });

  it('should let environment variables override the file', () => {
    writeFileSync(join(dir, '.linegate.yaml'), 'log_level: debug\nmin_render_interval_ms: 50\n');

    const config = loadOutputConfig({
      cwd: dir,
      env: { LINEGATE_LOG_LEVEL: 'warn', LINEGATE_DEBUG_ENABLED: 'true' },
    });

    expect(config.logLevel).toBe('warn');
    expect(config.minRenderIntervalMs).toBe(50);
    expect(config.debug.enabled).toBe(true);
  });

  it('should load an explicit path relative to cwd', () => {
    writeFileSync(join(dir, 'ci.yaml'), 'non_interactive_progress: silent\n');

    expect(loadOutputConfig({ cwd: dir, path: 'ci.yaml', env: {} }).nonInteractiveProgress).toBe('silent');
  });

  it('should fail when an explicit path does not exist', () => {
    expect(() => loadOutputConfig({ cwd: dir, path: 'missing.yaml', env: {} })).toThrow(ConfigError);
  });

  it('should reject unknown keys and bad values', () => {
    writeFileSync(join(dir, '.linegate.yaml'), 'colour: never\n');
    expect(() => loadOutputConfig({ cwd: dir, env: {} })).toThrow(/colour/);

    writeFileSync(join(dir, '.linegate.yaml'), 'log_level: loud\n');
    expect(() => loadOutputConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
  });

  it('should reject a file that is not a mapping', () => {
    writeFileSync(join(dir, '.linegate.yaml'), '- info\n- warn\n');

    expect(() => loadOutputConfig({ cwd: dir, env: {} })).toThrow('must contain a mapping');
  });

  it('should reject malformed YAML', () => {
    writeFileSync(join(dir, '.linegate.yaml'), 'log_level: [unclosed\n');

    expect(() => loadOutputConfig({ cwd: dir, env: {} })).toThrow(/Failed to read/);
  });
});

describe('environment overrides', () => {
  it('should derive variable names from config paths', () => {
    expect(envVarNameFromPath('min_render_interval_ms')).toBe('LINEGATE_MIN_RENDER_INTERVAL_MS');
    expect(envVarNameFromPath('debug.log_file')).toBe('LINEGATE_DEBUG_LOG_FILE');
  });

  it('should parse typed values into nested keys', () => {
    const target: Record<string, unknown> = {};

    applyOutputConfigEnvOverrides(target, {
      LINEGATE_MAX_BARS: '6',
      LINEGATE_DEBUG: '{"enabled":false}',
      LINEGATE_DEBUG_LOG_FILE: 'trace.log',
    });

    expect(target).toEqual({ max_bars: 6, debug: { enabled: false, log_file: 'trace.log' } });
  });

  it('should reject values of the wrong type', () => {
    expect(() => applyOutputConfigEnvOverrides({}, { LINEGATE_MAX_BARS: 'many' })).toThrow(ConfigError);
    expect(() => applyOutputConfigEnvOverrides({}, { LINEGATE_DEBUG_ENABLED: 'yes' })).toThrow(
      'LINEGATE_DEBUG_ENABLED must be one of: true, false',
    );
  });
});

describe('toCoordinatorOptions', () => {
  it('should carry the rendering settings', () => {
    expect(toCoordinatorOptions({ ...DEFAULT_OUTPUT_CONFIG, prompt: 'yes', maxBars: 3 })).toEqual({
      level: 'info',
      color: 'auto',
      promptPolicy: 'yes',
      minRenderIntervalMs: 100,
      animationIntervalMs: 100,
      milestoneIntervalMs: 5000,
      nonInteractiveProgress: 'milestones',
      maxBars: 3,
    });
  });
});
