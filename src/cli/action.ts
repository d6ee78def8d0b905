import type { ChatwootClient } from '../lib/chatwoot-client.js';
import { formatError, formatVerbose } from '../lib/output.js';
import type { CliContext } from './shared.js';

/**
 * Run a command body against a configured client and print its output.
 * Failures are printed and turn into exit code 1.
 */
export async function withClient(
  ctx: CliContext,
  description: string,
  body: (client: ChatwootClient) => Promise<string>,
): Promise<void> {
  try {
    const client = ctx.createClient();

    const verboseMsg = formatVerbose(`${description} (${client.toString()})`, ctx);
    if (verboseMsg) console.log(verboseMsg);

    console.log(await body(client));
  } catch (error) {
    console.log(formatError(error, ctx));
    process.exitCode = 1;
  }
}

export function fail(ctx: CliContext, message: string): void {
  console.log(formatError(message, ctx));
  process.exitCode = 1;
}
