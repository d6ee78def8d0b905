import type { Command } from 'commander';
import { fail, withClient } from '../cli/action.js';
import type { CliContext } from '../cli/shared.js';
import type { JsonObject } from '../lib/chatwoot-client-types.js';
import { formatContacts, formatCreated } from '../lib/output.js';

interface SearchOptions {
  page?: string;
}

interface CreateOptions {
  email?: string;
  phone?: string;
  identifier?: string;
  attr: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `key=value` pairs. Values that read as JSON numbers or
 * booleans are stored as such.
 */
export function parseAttributes(pairs: string[]): JsonObject | string {
  const attributes: JsonObject = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      return `Invalid attribute "${pair}" (expected key=value)`;
    }
    const key = pair.slice(0, separator).trim();
    const raw = pair.slice(separator + 1);
    if (raw === 'true' || raw === 'false') {
      attributes[key] = raw === 'true';
    } else if (/^-?\d+(\.\d+)?$/.test(raw)) {
      attributes[key] = Number(raw);
    } else {
      attributes[key] = raw;
    }
  }
  return attributes;
}

export function contactsCommand(program: Command, getContext: () => CliContext): void {
  const contacts = program.command('contacts').alias('c').description('Search and create contacts');

  contacts
    .command('search')
    .alias('s')
    .description('Search contacts by name, identifier, email or phone number')
    .argument('<query>', 'Search key')
    .option('-p, --page <n>', 'Page number (page size is set by the server)')
    .action(async (query: string, options: SearchOptions) => {
      const ctx = getContext();

      const page = options.page === undefined ? undefined : Number(options.page);
      if (page !== undefined && (!Number.isInteger(page) || page < 1)) {
        fail(ctx, 'Page must be a positive integer');
        return;
      }

      await withClient(ctx, `Searching contacts for: ${query}`, async (client) => {
        const response = await client.searchContacts(query, { page });
        return formatContacts(response, ctx);
      });
    });

  contacts
    .command('create')
    .description('Create a contact in the configured inbox and print its source id')
    .argument('<name>', 'Contact name')
    .option('-e, --email <email>', 'Email address')
    .option('--phone <phone>', 'Phone number in E.164 format')
    .option('-i, --identifier <id>', 'Identifier in an external system')
    .option('-a, --attr <key=value>', 'Custom attribute (repeatable)', collect, [])
    .action(async (name: string, options: CreateOptions) => {
      const ctx = getContext();

      const customAttributes = parseAttributes(options.attr);
      if (typeof customAttributes === 'string') {
        fail(ctx, customAttributes);
        return;
      }

      await withClient(ctx, `Creating contact: ${name}`, async (client) => {
        const created = await client.createContact({
          name,
          email: options.email,
          phoneNumber: options.phone,
          identifier: options.identifier,
          customAttributes,
        });
        return formatCreated('sourceId', created.sourceId, ctx);
      });
    });
}
