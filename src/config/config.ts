import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import { configSchema, type SightcheckConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { isRecord } from '../utils/guards.js';

const GLOBAL_CONFIG_DIR = join(homedir(), '.sightcheck');
const GLOBAL_CONFIG_FILE = join(GLOBAL_CONFIG_DIR, 'config.json');
const LOCAL_CONFIG_FILE = join('.sightcheck', 'config.json');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

async function loadJsonFile(path: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }

  let data: unknown;
  try {
    data = JSON5.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON5 in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Config file ${path} must contain an object`);
  }
  return data;
}

export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const key of Object.keys(override)) {
    const val = override[key];
    if (isRecord(val)) {
      const existing = result[key];
      result[key] = deepMerge(isRecord(existing) ? existing : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Validate merged config data, filling anything missing from the defaults. */
export function validateConfig(data: Record<string, unknown>): SightcheckConfig {
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue ? `"${issue.path.join('.')}" ${issue.message}` : 'Invalid config');
  }
  return parsed.data;
}

let cachedConfig: SightcheckConfig | null = null;

export async function loadConfig(projectRoot?: string): Promise<SightcheckConfig> {
  if (cachedConfig) return cachedConfig;

  let merged: Record<string, unknown> = {};

  const globalConfig = await loadJsonFile(GLOBAL_CONFIG_FILE);
  if (globalConfig) {
    logger.debug('Loaded global config from ' + GLOBAL_CONFIG_FILE);
    merged = deepMerge(merged, globalConfig);
  }

  const localPath = projectRoot ? join(projectRoot, LOCAL_CONFIG_FILE) : LOCAL_CONFIG_FILE;
  const localConfig = await loadJsonFile(localPath);
  if (localConfig) {
    logger.debug('Loaded local config from ' + localPath);
    merged = deepMerge(merged, localConfig);
  }

  cachedConfig = validateConfig(merged);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}
