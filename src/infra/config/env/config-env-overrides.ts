import { ConfigError } from '../../../shared/utils/error.js';

type EnvValueType = 'string' | 'boolean' | 'number' | 'json';

type Env = Readonly<Record<string, string | undefined>>;

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `LINEGATE_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  if (type === 'string') {
    return raw;
  }
  if (type === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new ConfigError(`${envKey} must be one of: true, false`);
  }
  if (type === 'number') {
    const value = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(value)) {
      throw new ConfigError(`${envKey} must be a number`);
    }
    return value;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigError(`${envKey} must be valid JSON`);
  }
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = target;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const leaf = parts[parts.length - 1];
  if (!leaf) return;
  current[leaf] = value;
}

function applyEnvOverrides(target: Record<string, unknown>, specs: readonly EnvSpec[], env: Env): void {
  for (const spec of specs) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}

const OUTPUT_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'log_level', type: 'string' },
  { path: 'color', type: 'string' },
  { path: 'prompt', type: 'string' },
  { path: 'min_render_interval_ms', type: 'number' },
  { path: 'animation_interval_ms', type: 'number' },
  { path: 'milestone_interval_ms', type: 'number' },
  { path: 'non_interactive_progress', type: 'string' },
  { path: 'max_bars', type: 'number' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
];

/**
 * Apply LINEGATE_* overrides onto raw (snake_case) config in place.
 * Whole-object JSON overrides apply before their nested keys.
 */
export function applyOutputConfigEnvOverrides(target: Record<string, unknown>, env: Env = process.env): void {
  applyEnvOverrides(target, OUTPUT_ENV_SPECS, env);
}
