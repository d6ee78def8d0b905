import type { CliContext } from '../cli/shared.js';
import type { JsonObject, JsonValue } from './chatwoot-client-types.js';
import { isJsonObject } from './chatwoot-client.js';
import { isApiError } from './errors.js';

const RULE = '────────────────────────────────────────────────────────────';

function text(value: JsonValue | undefined): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

// Chatwoot wraps most collections as { payload: [...] }, some as { data: { payload: [...] } }
export function extractRecords(response: JsonValue): JsonObject[] {
  let list: JsonValue | undefined = response;
  if (isJsonObject(list) && list.data !== undefined) {
    list = list.data;
  }
  if (isJsonObject(list) && list.payload !== undefined) {
    list = list.payload;
  }
  if (!Array.isArray(list)) return [];
  return list.filter(isJsonObject);
}

export function formatJson(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}

export function formatContacts(response: JsonValue, ctx: CliContext): string {
  if (ctx.json) {
    return formatJson(response);
  }

  const { colors } = ctx;
  const contacts = extractRecords(response);
  const lines: string[] = [];

  lines.push('');
  lines.push(colors.highlight(`Found ${contacts.length} contact(s)`));
  lines.push(colors.muted(RULE));

  for (const contact of contacts) {
    lines.push(colors.primary(`▸ ${text(contact.name) ?? '(unnamed)'} ${colors.muted(`#${text(contact.id) ?? '?'}`)}`));

    const email = text(contact.email);
    if (email) {
      lines.push(`  ${colors.muted('Email:')} ${email}`);
    }

    const phone = text(contact.phone_number);
    if (phone) {
      lines.push(`  ${colors.muted('Phone:')} ${phone}`);
    }

    const identifier = text(contact.identifier);
    if (identifier) {
      lines.push(`  ${colors.muted('Identifier:')} ${identifier}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

export function formatConversation(response: JsonValue, ctx: CliContext): string {
  if (ctx.json || !isJsonObject(response)) {
    return formatJson(response);
  }

  const { colors } = ctx;
  const lines: string[] = [];

  lines.push('');
  lines.push(colors.highlight(`Conversation #${text(response.id) ?? '?'}`));
  lines.push(colors.muted(RULE));

  const status = text(response.status);
  if (status) {
    lines.push(`  ${colors.muted('Status:')} ${status}`);
  }

  const inboxId = text(response.inbox_id);
  if (inboxId) {
    lines.push(`  ${colors.muted('Inbox:')} ${inboxId}`);
  }

  const meta = response.meta;
  const sender = isJsonObject(meta) ? meta.sender : undefined;
  if (isJsonObject(sender)) {
    lines.push(`  ${colors.muted('Contact:')} ${text(sender.name) ?? text(sender.id) ?? '?'}`);
  }

  const messages = Array.isArray(response.messages) ? response.messages.filter(isJsonObject) : [];
  if (messages.length > 0) {
    lines.push('');
    lines.push(formatMessageLines(messages, ctx).join('\n'));
  }

  lines.push('');
  return lines.join('\n');
}

// Chatwoot encodes message_type as 0 (incoming), 1 (outgoing), 2 (activity), 3 (template)
function messageDirection(value: JsonValue | undefined): string {
  switch (value) {
    case 0:
    case 'incoming':
      return 'in';
    case 1:
    case 'outgoing':
      return 'out';
    case 2:
    case 'activity':
      return 'activity';
    default:
      return text(value) ?? '?';
  }
}

function formatMessageLines(messages: JsonObject[], ctx: CliContext): string[] {
  const { colors } = ctx;
  return messages.map((message) => {
    const direction = messageDirection(message.message_type);
    const marker = direction === 'out' ? colors.success('→') : direction === 'in' ? colors.info('←') : colors.muted('•');
    const note = message.private === true ? ` ${colors.warning('[private]')}` : '';
    return `  ${marker} ${colors.muted(`#${text(message.id) ?? '?'}`)} ${text(message.content) ?? ''}${note}`;
  });
}

export function formatMessages(response: JsonValue, ctx: CliContext): string {
  if (ctx.json) {
    return formatJson(response);
  }

  const messages = extractRecords(response);
  const lines = ['', ctx.colors.highlight(`${messages.length} message(s)`), ctx.colors.muted(RULE)];
  lines.push(...formatMessageLines(messages, ctx));
  lines.push('');
  return lines.join('\n');
}

export function formatInboxes(response: JsonValue, ctx: CliContext): string {
  if (ctx.json) {
    return formatJson(response);
  }

  const { colors } = ctx;
  const inboxes = extractRecords(response);
  const lines = ['', colors.highlight(`${inboxes.length} inbox(es)`), colors.muted(RULE)];

  for (const inbox of inboxes) {
    const channel = text(inbox.channel_type);
    const suffix = channel ? ` ${colors.muted(`(${channel})`)}` : '';
    lines.push(`  ${colors.primary(`#${text(inbox.id) ?? '?'}`)} ${text(inbox.name) ?? '(unnamed)'}${suffix}`);
  }

  lines.push('');
  return lines.join('\n');
}

export function formatCreated(kind: string, id: string, ctx: CliContext): string {
  if (ctx.json) {
    return JSON.stringify({ success: true, [kind]: id }, null, 2);
  }
  return ctx.colors.success(`Created ${kind} ${id}`);
}

export function formatError(error: unknown, ctx: CliContext): string {
  const message = error instanceof Error ? error.message : String(error);
  if (ctx.json) {
    const status = isApiError(error) ? { status: error.status } : {};
    return JSON.stringify({ success: false, error: message, ...status }, null, 2);
  }
  return ctx.colors.error(`Error: ${message}`);
}

export function formatVerbose(message: string, ctx: CliContext): string {
  if (ctx.json || !ctx.verbose) {
    return '';
  }
  return ctx.colors.muted(`[verbose] ${message}`);
}
