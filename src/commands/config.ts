import type { Command } from 'commander';
import { fail } from '../cli/action.js';
import type { CliContext } from '../cli/shared.js';
import { CONFIG_KEYS, deleteConfigValue, isConfigKey, loadConfig, resolveConfig, setConfigValue } from '../lib/config.js';
import { formatError } from '../lib/output.js';

const SECRET_KEYS = new Set<string>(['apiAccessToken']);

export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return `${value.slice(0, 4)}****${value.slice(-4)}`;
}

function guarded(ctx: CliContext, action: () => void): void {
  try {
    action();
  } catch (error) {
    console.log(formatError(error, ctx));
    process.exitCode = 1;
  }
}

export function configCommand(program: Command, getContext: () => CliContext): void {
  const config = program.command('config').description('Manage configuration');

  config
    .command('show')
    .description('Show the effective configuration (file overlaid with environment)')
    .action(() => {
      const ctx = getContext();
      guarded(ctx, () => {
        const current = resolveConfig(loadConfig(ctx.configPath), ctx.env);
        const masked: Record<string, string | number> = {};
        for (const key of CONFIG_KEYS) {
          const value = current[key];
          if (value === undefined) continue;
          masked[key] = SECRET_KEYS.has(key) ? maskValue(String(value)) : value;
        }

        if (ctx.json) {
          console.log(JSON.stringify(masked, null, 2));
          return;
        }

        const { colors } = ctx;
        console.log('');
        console.log(colors.highlight('Configuration'));
        console.log(colors.muted(`Path: ${ctx.configPath}`));
        console.log('');
        for (const key of CONFIG_KEYS) {
          const value = masked[key];
          const display = value === undefined ? colors.muted('(not set)') : String(value);
          console.log(`  ${colors.primary(key)}: ${display}`);
        }
        console.log('');
      });
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action((key: string, value: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        fail(ctx, `Invalid key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
        return;
      }

      guarded(ctx, () => {
        const updated = setConfigValue(key, value, ctx.configPath);
        if (ctx.json) {
          const shown = SECRET_KEYS.has(key) ? maskValue(value) : updated[key];
          console.log(JSON.stringify({ success: true, key, value: shown }));
        } else {
          console.log(ctx.colors.success(`Set ${key}`));
        }
      });
    });

  config
    .command('unset')
    .description('Remove a configuration value')
    .argument('<key>', 'Configuration key to remove')
    .action((key: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        fail(ctx, `Invalid key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`);
        return;
      }

      guarded(ctx, () => {
        deleteConfigValue(key, ctx.configPath);
        if (ctx.json) {
          console.log(JSON.stringify({ success: true, key, deleted: true }));
        } else {
          console.log(ctx.colors.success(`Removed ${key}`));
        }
      });
    });

  config
    .command('path')
    .description('Show configuration file path')
    .action(() => {
      const ctx = getContext();
      if (ctx.json) {
        console.log(JSON.stringify({ path: ctx.configPath }));
      } else {
        console.log(ctx.configPath);
      }
    });
}
