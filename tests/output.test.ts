import { describe, expect, it } from 'vitest';
import type { CliColors, CliContext } from '../src/cli/shared.js';
import { NotFoundError } from '../src/lib/errors.js';
import {
  extractRecords,
  formatContacts,
  formatConversation,
  formatCreated,
  formatError,
  formatInboxes,
  formatMessages,
  formatVerbose,
} from '../src/lib/output.js';

const RULE = '────────────────────────────────────────────────────────────';

const plain = (text: string | number): string => String(text);

const colors: CliColors = {
  primary: plain,
  secondary: plain,
  success: plain,
  error: plain,
  warning: plain,
  info: plain,
  muted: plain,
  highlight: plain,
};

function createContext(overrides: Partial<CliContext> = {}): CliContext {
  return {
    colors,
    json: false,
    verbose: false,
    configPath: '/tmp/chatwoot/config.json5',
    env: {},
    createClient: () => {
      throw new Error('no client in formatter tests');
    },
    ...overrides,
  };
}

describe('extractRecords', () => {
  it('unwraps payload and data.payload collections', () => {
    expect(extractRecords({ payload: [{ id: 1 }] })).toEqual([{ id: 1 }]);
    expect(extractRecords({ data: { meta: {}, payload: [{ id: 2 }] } })).toEqual([{ id: 2 }]);
  });

  it('keeps only objects from bare arrays', () => {
    expect(extractRecords([{ id: 1 }, 'stray', null, [1]])).toEqual([{ id: 1 }]);
  });

  it('returns nothing for scalar responses', () => {
    expect(extractRecords('ok')).toEqual([]);
    expect(extractRecords(null)).toEqual([]);
  });
});

describe('formatContacts', () => {
  it('lists contacts with the fields they carry', () => {
    const output = formatContacts(
      {
        payload: [
          { id: 1, name: 'henrique', email: 'henrique@example.com' },
          { id: 2, name: '', phone_number: '+15550100', identifier: 'crm-2' },
        ],
      },
      createContext(),
    );

    expect(output).toBe(
      [
        '',
        'Found 2 contact(s)',
        RULE,
        '▸ henrique #1',
        '  Email: henrique@example.com',
        '▸ (unnamed) #2',
        '  Phone: +15550100',
        '  Identifier: crm-2',
        '',
      ].join('\n'),
    );
  });

  it('prints the raw response in JSON mode', () => {
    const response = { payload: [{ id: 1 }] };
    expect(formatContacts(response, createContext({ json: true }))).toBe(JSON.stringify(response, null, 2));
  });
});

describe('formatConversation', () => {
  it('shows status, contact and messages', () => {
    const output = formatConversation(
      {
        id: 12,
        status: 'open',
        inbox_id: 2,
        meta: { sender: { id: 7, name: 'Ana' } },
        messages: [
          { id: 1, content: 'hello', message_type: 0 },
          { id: 2, content: 'checking', message_type: 1, private: true },
        ],
      },
      createContext(),
    );

    expect(output).toBe(
      [
        '',
        'Conversation #12',
        RULE,
        '  Status: open',
        '  Inbox: 2',
        '  Contact: Ana',
        '',
        '  ← #1 hello\n  → #2 checking [private]',
        '',
      ].join('\n'),
    );
  });

  it('falls back to JSON for responses that are not objects', () => {
    expect(formatConversation(['unexpected'], createContext())).toBe('[\n  "unexpected"\n]');
  });
});

describe('formatMessages', () => {
  it('marks message direction', () => {
    const output = formatMessages(
      {
        payload: [
          { id: 1, content: 'hi', message_type: 'incoming' },
          { id: 2, content: 'Conversation was resolved', message_type: 2 },
        ],
      },
      createContext(),
    );

    expect(output).toBe(['', '2 message(s)', RULE, '  ← #1 hi', '  • #2 Conversation was resolved', ''].join('\n'));
  });
});

describe('formatInboxes', () => {
  it('lists inbox ids, names and channels', () => {
    const output = formatInboxes(
      {
        payload: [
          { id: 2, name: 'Website', channel_type: 'Channel::WebWidget' },
          { id: 3, name: 'Support API' },
        ],
      },
      createContext(),
    );

    expect(output).toBe(
      ['', '2 inbox(es)', RULE, '  #2 Website (Channel::WebWidget)', '  #3 Support API', ''].join('\n'),
    );
  });
});

describe('status lines', () => {
  it('formats created ids', () => {
    expect(formatCreated('messageId', '99', createContext())).toBe('Created messageId 99');
    expect(formatCreated('messageId', '99', createContext({ json: true }))).toBe(
      '{\n  "success": true,\n  "messageId": "99"\n}',
    );
  });

  it('formats errors, with the HTTP status in JSON mode', () => {
    const error = new NotFoundError('not here', {
      status: 404,
      body: null,
      method: 'GET',
      url: 'https://chat.example.com/api/v1/accounts/1/conversations/5',
    });

    expect(formatError(error, createContext())).toBe('Error: not here');
    expect(formatError(error, createContext({ json: true }))).toBe(
      '{\n  "success": false,\n  "error": "not here",\n  "status": 404\n}',
    );
    expect(formatError('plain message', createContext({ json: true }))).toBe(
      '{\n  "success": false,\n  "error": "plain message"\n}',
    );
  });

  it('only emits verbose lines when asked and not in JSON mode', () => {
    expect(formatVerbose('hello', createContext())).toBe('');
    expect(formatVerbose('hello', createContext({ verbose: true }))).toBe('[verbose] hello');
    expect(formatVerbose('hello', createContext({ verbose: true, json: true }))).toBe('');
  });
});
