/**
 * Tests for CLI flag handling
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  increaseCount,
  parseNonNegativeInt,
  parsePositiveInt,
  resolveGlobalSettings,
} from '../app/cli/helpers.js';
import { verbosityFromFlags } from '../app/cli/verbosity.js';
import { DEFAULT_OUTPUT_CONFIG } from '../infra/config/loadConfig.js';

describe('verbosityFromFlags', () => {
  it('should leave the level to configuration without flags', () => {
    expect(verbosityFromFlags(0, 0)).toBeUndefined();
  });

  it('should map net flag counts to levels', () => {
    expect(verbosityFromFlags(0, 2)).toBe('off');
    expect(verbosityFromFlags(0, 1)).toBe('error');
    expect(verbosityFromFlags(1, 1)).toBe('info');
    expect(verbosityFromFlags(1, 0)).toBe('debug');
    expect(verbosityFromFlags(3, 0)).toBe('trace');
  });
});

describe('option parsers', () => {
  it('should count repeated flags', () => {
    expect(increaseCount('', increaseCount('', 0))).toBe(2);
  });

  it('should accept integers in range', () => {
    expect(parsePositiveInt('4')).toBe(4);
    expect(parseNonNegativeInt('0')).toBe(0);
  });

  it('should reject everything else', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('-1')).toThrow(InvalidArgumentError);
    expect(() => parseNonNegativeInt('abc')).toThrow(InvalidArgumentError);
  });
});

describe('resolveGlobalSettings', () => {
  const config = { ...DEFAULT_OUTPUT_CONFIG, logLevel: 'warn' as const, color: 'never' as const, prompt: 'no' as const };

  it('should fall back to configuration', () => {
    expect(resolveGlobalSettings({ verbose: 0, quiet: 0 }, config)).toEqual({
      level: 'warn',
      color: 'never',
      promptPolicy: 'no',
    });
  });

  it('should let flags win', () => {
    expect(resolveGlobalSettings({ verbose: 1, quiet: 0, color: 'always', yes: true }, config)).toEqual({
      level: 'debug',
      color: 'always',
      promptPolicy: 'yes',
    });
  });

  it('should prefer --yes over --non-interactive', () => {
    const settings = resolveGlobalSettings(
      { verbose: 0, quiet: 0, yes: true, nonInteractive: true },
      { ...DEFAULT_OUTPUT_CONFIG },
    );
    expect(settings.promptPolicy).toBe('yes');
  });

  it('should map --non-interactive to no', () => {
    const settings = resolveGlobalSettings({ verbose: 0, quiet: 0, nonInteractive: true }, { ...DEFAULT_OUTPUT_CONFIG });
    expect(settings.promptPolicy).toBe('no');
  });
});
