import type { Command } from 'commander';
import { fail, withClient } from '../cli/action.js';
import type { CliContext } from '../cli/shared.js';
import type { ConversationStatus } from '../lib/chatwoot-client-types.js';
import { formatConversation, formatCreated } from '../lib/output.js';

const STATUSES: ConversationStatus[] = ['open', 'resolved', 'pending', 'snoozed'];

interface CreateOptions {
  contactId?: string;
  assigneeId?: string;
  teamId?: string;
  status?: string;
}

function isStatus(value: string): value is ConversationStatus {
  return STATUSES.some((status) => status === value);
}

export function conversationsCommand(program: Command, getContext: () => CliContext): void {
  const conversations = program
    .command('conversations')
    .alias('conv')
    .description('Create and inspect conversations in the configured inbox');

  conversations
    .command('create')
    .description('Open a conversation for a contact and print its id')
    .argument('<sourceId>', 'Contact source id returned by `contacts create`')
    .option('--contact-id <id>', 'Contact id')
    .option('--assignee-id <id>', 'Agent to assign the conversation to')
    .option('--team-id <id>', 'Team to assign the conversation to')
    .option('-s, --status <status>', `Initial status: ${STATUSES.join(', ')} (default: open)`)
    .action(async (sourceId: string, options: CreateOptions) => {
      const ctx = getContext();

      const status = options.status;
      if (status !== undefined && !isStatus(status)) {
        fail(ctx, `Invalid status: ${status}. Valid: ${STATUSES.join(', ')}`);
        return;
      }

      await withClient(ctx, `Creating conversation for source ${sourceId}`, async (client) => {
        const id = await client.createConversation({
          sourceId,
          contactId: options.contactId,
          assigneeId: options.assigneeId,
          teamId: options.teamId,
          status,
        });
        return formatCreated('conversationId', id, ctx);
      });
    });

  conversations
    .command('show')
    .description('Show a conversation with its messages')
    .argument('<conversationId>', 'Numeric conversation id')
    .action(async (conversationId: string) => {
      const ctx = getContext();
      await withClient(ctx, `Fetching conversation ${conversationId}`, async (client) =>
        formatConversation(await client.getConversation(conversationId), ctx),
      );
    });
}
