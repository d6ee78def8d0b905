import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createClientFromConfig,
  deleteConfigValue,
  loadConfig,
  resolveConfig,
  saveConfig,
  setConfigValue,
} from '../src/lib/config.js';
import { ConfigurationError } from '../src/lib/errors.js';

let dir: string;
let configPath: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'chatwoot-config-'));
  configPath = join(dir, 'nested', 'config.json5');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('config file', () => {
  it('returns an empty config when the file does not exist', () => {
    expect(loadConfig(configPath)).toEqual({});
  });

  it('reads JSON5 with comments and numeric ids', () => {
    const path = join(dir, 'config.json5');
    writeFileSync(
      path,
      `{
        // staging instance
        domain: 'https://chat.example.com',
        apiAccessToken: 'test-token',
        accountId: 1,
        inboxId: 2,
        timeoutMs: 5000,
      }`,
    );

    expect(loadConfig(path)).toEqual({
      domain: 'https://chat.example.com',
      apiAccessToken: 'test-token',
      accountId: '1',
      inboxId: '2',
      timeoutMs: 5000,
    });
  });

  it('ignores unknown keys', () => {
    const path = join(dir, 'config.json5');
    writeFileSync(path, "{ domain: 'https://chat.example.com', theme: 'dark' }");

    expect(loadConfig(path)).toEqual({ domain: 'https://chat.example.com' });
  });

  it('fails loudly on a file it cannot parse', () => {
    const path = join(dir, 'config.json5');
    writeFileSync(path, '{ domain: ');

    expect(() => loadConfig(path)).toThrow(ConfigurationError);
  });

  it('reports a config path it cannot read as a configuration error', () => {
    const path = join(dir, 'config.json5');
    mkdirSync(path);

    let caught: unknown;
    try {
      loadConfig(path);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toHaveProperty('message', expect.stringContaining(`Could not read ${path}: EISDIR`));
  });

  it('rejects a timeout that is not a positive integer', () => {
    const path = join(dir, 'config.json5');
    writeFileSync(path, '{ timeoutMs: -1 }');

    expect(() => loadConfig(path)).toThrow(`Invalid timeoutMs in ${path}: expected a positive integer`);
  });

  it('round-trips values through set and unset', () => {
    setConfigValue('domain', 'https://chat.example.com', configPath);
    setConfigValue('timeoutMs', '2500', configPath);
    expect(loadConfig(configPath)).toEqual({ domain: 'https://chat.example.com', timeoutMs: 2500 });

    deleteConfigValue('domain', configPath);
    expect(loadConfig(configPath)).toEqual({ timeoutMs: 2500 });
  });

  it('writes the file as JSON5', () => {
    saveConfig({ accountId: '1' }, configPath);
    expect(readFileSync(configPath, 'utf-8')).toBe("{\n  accountId: '1',\n}\n");
  });
});

describe('resolveConfig', () => {
  it('overlays environment variables on stored values', () => {
    const resolved = resolveConfig(
      { domain: 'https://stored.example.com', accountId: '1', inboxId: '2' },
      { DOMAIN: 'https://env.example.com', API_ACCESS_TOKEN: 'test-token', INBOX_ID: '  ' },
    );

    expect(resolved).toEqual({
      domain: 'https://env.example.com',
      apiAccessToken: 'test-token',
      accountId: '1',
      inboxId: '2',
    });
  });

  it('prefers CHATWOOT_ prefixed variables', () => {
    const resolved = resolveConfig({}, { ACCOUNT_ID: '1', CHATWOOT_ACCOUNT_ID: '9', CHATWOOT_TIMEOUT_MS: '1000' });

    expect(resolved).toEqual({ accountId: '9', timeoutMs: 1000 });
  });
});

describe('createClientFromConfig', () => {
  it('builds a client from stored values and environment', () => {
    const client = createClientFromConfig(
      { domain: 'https://chat.example.com', accountId: '1' },
      { API_ACCESS_TOKEN: 'test-token', INBOX_ID: '2' },
    );

    expect(client.toString()).toBe('Chatwoot client for account 1 & inbox 2');
  });

  it('reports every value still missing', () => {
    expect(() => createClientFromConfig({ domain: 'https://chat.example.com' }, {})).toThrow(
      'Missing required configuration: apiAccessToken, accountId, inboxId',
    );
  });
});
