import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { ConfigSchema, type Config } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';

export type { Config, StorageConfig, VaultConfig } from './schema.js';
export { ConfigSchema } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

/** Environment variables that override `storage.s3.*` keys from the config file. */
const S3_ENV_OVERRIDES = {
  VAULT_S3_ENDPOINT: 'endpoint',
  VAULT_S3_REGION: 'region',
  VAULT_S3_BUCKET: 'bucket',
  VAULT_S3_ACCESS_KEY_ID: 'accessKeyId',
  VAULT_S3_SECRET_ACCESS_KEY: 'secretAccessKey',
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge VAULT_S3_* environment variables into the raw (unvalidated) config so
 * credentials never have to live in config.json.
 */
export function applyEnvOverrides(rawConfig: unknown, env: NodeJS.ProcessEnv): unknown {
  const overrides: Record<string, string> = {};
  for (const [variable, key] of Object.entries(S3_ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      overrides[key] = value;
    }
  }

  if (Object.keys(overrides).length === 0 || !isRecord(rawConfig)) {
    return rawConfig;
  }

  const storage = isRecord(rawConfig.storage) ? rawConfig.storage : {};
  const s3 = isRecord(storage.s3) ? storage.s3 : {};

  return {
    ...rawConfig,
    storage: { ...storage, s3: { ...s3, ...overrides } },
  };
}

export function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Config {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  // Validate with Zod
  const result = ConfigSchema.safeParse(applyEnvOverrides(rawConfig, env));

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}
