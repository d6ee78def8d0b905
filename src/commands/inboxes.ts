import type { Command } from 'commander';
import { withClient } from '../cli/action.js';
import type { CliContext } from '../cli/shared.js';
import { formatInboxes } from '../lib/output.js';

export function inboxesCommand(program: Command, getContext: () => CliContext): void {
  const inboxes = program.command('inboxes').description('Inspect inboxes of the account');

  inboxes
    .command('list')
    .alias('ls')
    .description('List all inboxes in the account')
    .action(async () => {
      const ctx = getContext();
      await withClient(ctx, 'Listing inboxes', async (client) => formatInboxes(await client.listInboxes(), ctx));
    });
}
