/**
 * Configuration loading: `.env`-style files and explicit sync settings.
 *
 * Credentials are read once here and passed to the API client as a
 * `SyncConfig`; nothing downstream reads the environment.
 */
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse } from 'dotenv';
import type { SyncConfig } from '../types/cloudflare';
import { SyncConfigSchema, validateInput } from './validation';

export const DEFAULT_ENV_FILE = '.env';

export type EnvSource = Record<string, string | undefined>;

export interface ConfigOverrides {
  apiToken?: string;
  apiBaseUrl?: string;
  templatesFile?: string;
}

/**
 * Reads a key=value file and copies every entry into `target`.
 * Blank lines and `#` comments are skipped; a missing file yields no entries.
 * @returns The entries read from the file
 */
export function loadEnvFile(filePath: string = DEFAULT_ENV_FILE, target: EnvSource = process.env): Record<string, string> {
  const fullPath = resolve(filePath);
  let content: string;

  try {
    content = readFileSync(fullPath, 'utf-8');
  } catch (error) {
    console.warn(`[Config] Could not read env file ${fullPath}, continuing without it:`, error instanceof Error ? error.message : error);
    return {};
  }

  const entries = parse(content);
  for (const [key, value] of Object.entries(entries)) {
    target[key] = value;
  }

  console.log(`[Config] Loaded ${Object.keys(entries).length} entries from ${fullPath}`);
  return entries;
}

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value.trim() : undefined;

/**
 * Builds the sync configuration from environment values, with explicit
 * overrides taking precedence. A missing token only logs a warning: the
 * API rejects the first request in that case.
 */
export function resolveConfig(env: EnvSource = process.env, overrides: ConfigOverrides = {}): SyncConfig {
  const config = validateInput(SyncConfigSchema, {
    apiToken: nonEmpty(overrides.apiToken) ?? nonEmpty(env.CLOUDFLARE_API_TOKEN),
    apiBaseUrl: nonEmpty(overrides.apiBaseUrl) ?? nonEmpty(env.CLOUDFLARE_API_BASE_URL),
    templatesFile: nonEmpty(overrides.templatesFile) ?? nonEmpty(env.WAF_RULES_FILE)
  });

  if (!config.apiToken) {
    console.warn('[Config] No CLOUDFLARE_API_TOKEN configured; API requests will be unauthorized');
  }

  return {
    ...config,
    apiBaseUrl: config.apiBaseUrl.replace(/\/+$/, '')
  };
}
