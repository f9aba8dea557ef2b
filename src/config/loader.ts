// Config loader: reads an optional YAML file, deep-merges it over DEFAULT_CONFIG,
// applies environment overrides, then validates the result with zod.
// Precedence (lowest first): defaults, file, environment. CLI flags are applied by the caller.
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_CONFIG } from './defaults.js';
import { GuideCheckConfigSchema, type GuideCheckConfig } from './schema.js';
import { GuideCheckError, GuideCheckErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const CONFIG_FILE_NAME = 'install-guide-check.yaml';

export interface ConfigResult {
  config: GuideCheckConfig;
  // null when only built-in defaults were used
  configPath: string | null;
}

export interface LoadConfigOptions {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options);

  let fileConfig: Record<string, unknown> = {};
  if (configPath) {
    fileConfig = readConfigFile(configPath);
    logger.debug({ configPath }, 'Loaded config file');
  }

  const merged = deepMerge(deepMerge(toRecord(DEFAULT_CONFIG), fileConfig), envOverrides(env));
  const parsed = GuideCheckConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join('; ')}`, {
      configPath,
      issues,
    });
  }
  return { config: parsed.data, configPath };
}

function resolveConfigPath(options: LoadConfigOptions): string | null {
  if (options.explicitPath) {
    if (!existsSync(options.explicitPath)) {
      throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, `Config file not found: ${options.explicitPath}`);
    }
    return options.explicitPath;
  }
  const candidate = path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);
  return existsSync(candidate) ? candidate : null;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, `Failed to parse config ${configPath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new GuideCheckError(GuideCheckErrorCode.CONFIG_INVALID, `Config ${configPath} must be a YAML mapping`);
  }
  return parsed;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const image = env['INSTALL_GUIDE_CHECK_IMAGE'];
  if (image) overrides['image'] = image;
  const timeout = env['INSTALL_GUIDE_CHECK_TIMEOUT_SECONDS'];
  // Left as a number (possibly NaN) so the schema reports a bad value
  if (timeout) overrides['timeout_seconds'] = Number(timeout);
  const artifactsDir = env['INSTALL_GUIDE_CHECK_ARTIFACTS_DIR'];
  if (artifactsDir) overrides['artifacts_dir'] = artifactsDir;
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(config: GuideCheckConfig): Record<string, unknown> {
  return { ...config };
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays are replaced, not merged. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
