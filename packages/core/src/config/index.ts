/**
 * Configuration loading for the session engine.
 *
 * Sources, lowest precedence first: schema defaults, config.yaml in the
 * data directory, explicit overrides (CLI flags). The result is read
 * once at Coordinator construction and treated as opaque values.
 */

import { promises as fs } from 'node:fs';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';
import { ValidationError } from '../errors.js';
import { atomicWrite } from '../utils/atomic-write.js';
import { getConfigPath } from '../utils/paths.js';
import { VpnConfigSchema } from './types.js';
import type { VpnConfig, VpnConfigInput } from './types.js';

export { VpnConfigSchema, TimingConfigSchema, LoginModeSchema } from './types.js';
export type { VpnConfig, VpnConfigInput, TimingConfig, LoginMode } from './types.js';

/** Partial overrides; `timing` merges key by key. */
export type ConfigOverrides = Partial<Omit<VpnConfigInput, 'timing'>> & {
  timing?: Partial<NonNullable<VpnConfigInput['timing']>>;
};

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((i) => `${i.path.join('.') || '/'}: ${i.message}`).join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads config.yaml from the data directory.
 * Returns an empty object when the file does not exist.
 *
 * @throws {ValidationError} If the file is not a YAML mapping
 */
export async function readConfigFile(dataDir: string): Promise<Record<string, unknown>> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return {};
    throw err;
  }

  const parsed: unknown = YAML.parse(raw);
  if (parsed == null) return {};
  if (!isRecord(parsed)) {
    throw new ValidationError(`${configPath} must contain a mapping`, configPath);
  }
  return parsed;
}

/**
 * Merges defaults, config.yaml and overrides, then validates.
 *
 * @throws {ValidationError} With one detail per failing field
 */
export function resolveConfig(
  fileConfig: Record<string, unknown>,
  overrides: ConfigOverrides = {},
): VpnConfig {
  const fileTiming = isRecord(fileConfig['timing']) ? fileConfig['timing'] : {};
  const merged = {
    ...fileConfig,
    ...stripUndefined(overrides),
    timing: { ...fileTiming, ...stripUndefined(overrides.timing ?? {}) },
  };

  const result = VpnConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ValidationError(
      `Invalid configuration: ${formatIssues(result.error.issues)}`,
      'config',
      result.error.issues,
    );
  }
  return result.data;
}

/** Loads and validates the configuration for a data directory. */
export async function loadConfig(
  dataDir: string,
  overrides: ConfigOverrides = {},
): Promise<VpnConfig> {
  const fileConfig = await readConfigFile(dataDir);
  return resolveConfig(fileConfig, overrides);
}

/** Writes config.yaml, validating it first. */
export async function saveConfig(dataDir: string, config: VpnConfigInput): Promise<VpnConfig> {
  const validated = resolveConfig({}, config);
  await atomicWrite(getConfigPath(dataDir), YAML.stringify(config), 0o644);
  return validated;
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, v]) => v !== undefined),
  );
}
