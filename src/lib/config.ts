import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import JSON5 from 'json5';
import { ChatwootClient } from './chatwoot-client.js';
import type { ClientConfig, StoredConfig } from './chatwoot-client-types.js';
import { ConfigurationError } from './errors.js';

const CONFIG_DIR = join(homedir(), '.config', 'chatwoot');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json5');

export const CONFIG_KEYS: (keyof StoredConfig)[] = ['domain', 'apiAccessToken', 'accountId', 'inboxId', 'timeoutMs'];

// Environment variable names per key; later names win
const ENV_VARS: Record<Exclude<keyof StoredConfig, 'timeoutMs'>, string[]> = {
  domain: ['DOMAIN', 'CHATWOOT_DOMAIN'],
  apiAccessToken: ['API_ACCESS_TOKEN', 'CHATWOOT_API_ACCESS_TOKEN'],
  accountId: ['ACCOUNT_ID', 'CHATWOOT_ACCOUNT_ID'],
  inboxId: ['INBOX_ID', 'CHATWOOT_INBOX_ID'],
};

export function getConfigPath(): string {
  return CONFIG_FILE;
}

export function isConfigKey(key: string): key is keyof StoredConfig {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

function parseTimeout(value: unknown, source: string): number {
  const timeoutMs = typeof value === 'string' ? Number(value) : value;
  if (typeof timeoutMs !== 'number' || !Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`Invalid timeoutMs in ${source}: expected a positive integer`, ['timeoutMs']);
  }
  return timeoutMs;
}

function normalizeStored(raw: unknown, source: string): StoredConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`Invalid config in ${source}: expected an object`);
  }

  const config: StoredConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null || !isConfigKey(key)) continue;
    if (key === 'timeoutMs') {
      config.timeoutMs = parseTimeout(value, source);
    } else if (typeof value === 'string' || typeof value === 'number') {
      // Ids are often written as numbers in the file
      config[key] = String(value);
    } else {
      throw new ConfigurationError(`Invalid ${key} in ${source}: expected a string`, [key]);
    }
  }
  return config;
}

export function loadConfig(path: string = CONFIG_FILE): StoredConfig {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not read ${path}: ${reason}`);
  }
  return normalizeStored(parsed, path);
}

export function saveConfig(config: StoredConfig, path: string = CONFIG_FILE): void {
  mkdirSync(dirname(path), { recursive: true });
  const content = JSON5.stringify(config, null, 2);
  writeFileSync(path, `${content}\n`, { encoding: 'utf-8', mode: 0o600 });
}

export function setConfigValue(key: keyof StoredConfig, value: string, path: string = CONFIG_FILE): StoredConfig {
  const config = loadConfig(path);
  if (key === 'timeoutMs') {
    config.timeoutMs = parseTimeout(value, 'value');
  } else {
    config[key] = value;
  }
  saveConfig(config, path);
  return config;
}

export function deleteConfigValue(key: keyof StoredConfig, path: string = CONFIG_FILE): StoredConfig {
  const config = loadConfig(path);
  delete config[key];
  saveConfig(config, path);
  return config;
}

/**
 * Overlay environment variables on top of stored values.
 */
export function resolveConfig(stored: StoredConfig, env: NodeJS.ProcessEnv = process.env): StoredConfig {
  const resolved: StoredConfig = { ...stored };
  for (const [key, names] of Object.entries(ENV_VARS)) {
    if (!isConfigKey(key) || key === 'timeoutMs') continue;
    for (const name of names) {
      const value = env[name]?.trim();
      if (value) {
        resolved[key] = value;
      }
    }
  }
  if (env.CHATWOOT_TIMEOUT_MS?.trim()) {
    resolved.timeoutMs = parseTimeout(env.CHATWOOT_TIMEOUT_MS.trim(), 'CHATWOOT_TIMEOUT_MS');
  }
  return resolved;
}

export function createClientFromConfig(
  stored: StoredConfig = loadConfig(),
  env: NodeJS.ProcessEnv = process.env,
  overrides: Pick<ClientConfig, 'verbose' | 'fetch'> = {},
): ChatwootClient {
  const resolved = resolveConfig(stored, env);
  return new ChatwootClient({
    domain: resolved.domain ?? '',
    apiAccessToken: resolved.apiAccessToken ?? '',
    accountId: resolved.accountId ?? '',
    inboxId: resolved.inboxId ?? '',
    timeoutMs: resolved.timeoutMs,
    ...overrides,
  });
}
