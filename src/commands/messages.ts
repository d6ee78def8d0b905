import type { Command } from 'commander';
import { withClient } from '../cli/action.js';
import type { CliContext } from '../cli/shared.js';
import { formatCreated, formatMessages } from '../lib/output.js';

interface SendOptions {
  outgoing?: boolean;
  private?: boolean;
}

export function messagesCommand(program: Command, getContext: () => CliContext): void {
  const messages = program.command('messages').alias('msg').description('Send and list conversation messages');

  messages
    .command('send')
    .description('Post a message to a conversation and print its id')
    .argument('<conversationId>', 'Numeric conversation id')
    .argument('<content>', 'Message text')
    .option('-o, --outgoing', 'Send as an outgoing (agent) message instead of incoming')
    .option('--private', 'Post as a private note')
    .action(async (conversationId: string, content: string, options: SendOptions) => {
      const ctx = getContext();
      await withClient(ctx, `Sending message to conversation ${conversationId}`, async (client) => {
        const id = await client.createMessage(conversationId, {
          content,
          messageType: options.outgoing ? 'outgoing' : 'incoming',
          private: options.private ?? false,
        });
        return formatCreated('messageId', id, ctx);
      });
    });

  messages
    .command('list')
    .alias('ls')
    .description('List the messages of a conversation')
    .argument('<conversationId>', 'Numeric conversation id')
    .action(async (conversationId: string) => {
      const ctx = getContext();
      await withClient(ctx, `Listing messages of conversation ${conversationId}`, async (client) =>
        formatMessages(await client.listMessages(conversationId), ctx),
      );
    });
}
