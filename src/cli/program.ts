import { createRequire } from 'node:module';
import { Command } from 'commander';
import kleur from 'kleur';
import { configCommand } from '../commands/config.js';
import { contactsCommand } from '../commands/contacts.js';
import { conversationsCommand } from '../commands/conversations.js';
import { inboxesCommand } from '../commands/inboxes.js';
import { messagesCommand } from '../commands/messages.js';
import type { ChatwootClient } from '../lib/chatwoot-client.js';
import { createClientFromConfig, getConfigPath, loadConfig } from '../lib/config.js';
import type { CliColors, CliContext } from './shared.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

export interface ProgramOptions {
  // Config file location; defaults to $CHATWOOT_CONFIG, then ~/.config/chatwoot/config.json5
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
}

function createColors(): CliColors {
  return {
    primary: kleur.cyan,
    secondary: kleur.magenta,
    success: kleur.green,
    error: kleur.red,
    warning: kleur.yellow,
    info: kleur.blue,
    muted: kleur.gray,
    highlight: kleur.bold,
  };
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.CHATWOOT_CONFIG ?? getConfigPath();

  program
    .name('chatwoot')
    .description('Search contacts and post conversations and messages through the Chatwoot API')
    .version(pkg.version);

  // Global options
  program.option('--json', 'Output as JSON').option('-v, --verbose', 'Verbose output');

  const getContext = (): CliContext => {
    const opts = program.opts<{ json?: boolean; verbose?: boolean }>();
    const json = opts.json ?? false;
    const verbose = opts.verbose ?? false;
    return {
      colors: createColors(),
      json,
      verbose,
      configPath,
      env,
      createClient: (): ChatwootClient =>
        createClientFromConfig(loadConfig(configPath), env, {
          verbose: verbose && !json,
          fetch: options.fetch,
        }),
    };
  };

  // Register commands
  contactsCommand(program, getContext);
  conversationsCommand(program, getContext);
  messagesCommand(program, getContext);
  inboxesCommand(program, getContext);
  configCommand(program, getContext);

  return program;
}
