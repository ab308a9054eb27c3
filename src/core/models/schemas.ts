/**
 * Zod schemas for configuration validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';
import { VERBOSITY_LEVELS } from './severity.js';

export const VerbosityLevelSchema = z.enum(VERBOSITY_LEVELS);

export const ColorModeSchema = z.enum(['auto', 'always', 'never']);

export const PromptPolicySchema = z.enum(['interactive', 'yes', 'no']);

export const NonInteractiveProgressSchema = z.enum(['milestones', 'silent']);

/** Debug configuration schema */
export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  log_file: z.string().min(1).optional(),
});

/** `.linegate.yaml` schema (snake_case keys, as written on disk) */
export const OutputConfigFileSchema = z.strictObject({
  log_level: VerbosityLevelSchema.optional().default('info'),
  color: ColorModeSchema.optional().default('auto'),
  prompt: PromptPolicySchema.optional(),
  min_render_interval_ms: z.number().int().min(0).optional().default(100),
  animation_interval_ms: z.number().int().min(0).optional().default(100),
  milestone_interval_ms: z.number().int().min(0).optional().default(5000),
  non_interactive_progress: NonInteractiveProgressSchema.optional().default('milestones'),
  max_bars: z.number().int().positive().optional(),
  debug: DebugConfigSchema.optional(),
});

export type OutputConfigFile = z.infer<typeof OutputConfigFileSchema>;
