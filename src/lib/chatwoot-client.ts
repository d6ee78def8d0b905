import type {
  ClientConfig,
  ContactCreation,
  CreateContactParams,
  CreateConversationParams,
  CreateMessageParams,
  HttpMethod,
  Identifier,
  JsonObject,
  JsonValue,
  RequestOptions,
  SearchContactsOptions,
} from './chatwoot-client-types.js';
import { ConfigurationError, NetworkError, RemoteServiceError, ValidationError, apiErrorFor } from './errors.js';

export const DEFAULT_TIMEOUT_MS = 30000;
export const ACCESS_TOKEN_HEADER = 'api-access-token';

const REQUIRED_FIELDS = ['domain', 'apiAccessToken', 'accountId', 'inboxId'] as const;

interface ResolvedConfig {
  readonly domain: string;
  readonly apiAccessToken: string;
  readonly accountId: string;
  readonly inboxId: string;
  readonly timeoutMs: number;
  readonly verbose: boolean;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value === 'number') return !Number.isFinite(value);
  return true;
}

// Drop keys left undefined so they never reach the request body
function compact(fields: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function requireText(field: string, value: string): void {
  if (isBlank(value)) {
    throw new ValidationError(field, `${field} must be a non-empty string`);
  }
}

function requireIdentifier(field: string, value: Identifier): void {
  if (isBlank(value)) {
    throw new ValidationError(field, `${field} is required`);
  }
}

/**
 * Client for the Chatwoot application API, scoped to one account and one inbox.
 *
 * Each method issues exactly one HTTP request and either returns the parsed
 * JSON body or throws one of the errors in `./errors.js`. Nothing is retried,
 * paginated or cached.
 */
export class ChatwootClient {
  private readonly config: ResolvedConfig;
  private readonly transport: typeof fetch;

  constructor(config: ClientConfig) {
    const missing = REQUIRED_FIELDS.filter((field) => isBlank(config[field]));
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`, missing);
    }

    const domain = config.domain.trim().replace(/\/+$/, '');
    if (!/^https?:\/\/[^/]/i.test(domain) || !URL.canParse(domain)) {
      throw new ConfigurationError(`Invalid domain: ${config.domain} (expected an http(s) URL)`, ['domain']);
    }

    const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`Invalid timeoutMs: ${timeoutMs} (expected a positive integer)`, ['timeoutMs']);
    }

    this.config = Object.freeze({
      domain,
      apiAccessToken: config.apiAccessToken.trim(),
      accountId: String(config.accountId).trim(),
      inboxId: String(config.inboxId).trim(),
      timeoutMs,
      verbose: config.verbose ?? false,
    });
    this.transport = config.fetch ?? globalThis.fetch.bind(globalThis);
  }

  get domain(): string {
    return this.config.domain;
  }

  get accountId(): string {
    return this.config.accountId;
  }

  get inboxId(): string {
    return this.config.inboxId;
  }

  toString(): string {
    return `Chatwoot client for account ${this.config.accountId} & inbox ${this.config.inboxId}`;
  }

  // Contacts

  /**
   * Search resolved contacts (those with an identifier, email or phone number)
   * by name, identifier, email or phone number. Returns the single page the
   * service sends back; `page` is only sent when given.
   */
  async searchContacts(query: string, options: SearchContactsOptions = {}): Promise<JsonValue> {
    requireText('query', query);
    if (options.page !== undefined && (!Number.isInteger(options.page) || options.page < 1)) {
      throw new ValidationError('page', `page must be a positive integer, got ${options.page}`);
    }

    const response = await this.request('GET', 'contacts/search', {
      query: { q: query, page: options.page },
    });
    return response.body;
  }

  /**
   * Create a contact in the configured inbox.
   *
   * Conversations are tied to a contact through the `source_id` of its
   * contact-inbox record, which is returned as `sourceId`.
   */
  async createContact(params: CreateContactParams): Promise<ContactCreation> {
    requireText('name', params.name);

    const response = await this.request('POST', 'contacts', {
      body: compact({
        inbox_id: this.config.inboxId,
        name: params.name,
        email: params.email,
        phone_number: params.phoneNumber,
        identifier: params.identifier,
        custom_attributes: params.customAttributes ?? {},
      }),
    });

    const { body } = response;
    const payload = isJsonObject(body) ? body.payload : undefined;
    const contactInbox = isJsonObject(payload) ? payload.contact_inbox : undefined;
    const sourceId = isJsonObject(contactInbox) ? contactInbox.source_id : undefined;
    if (!isJsonObject(body) || (typeof sourceId !== 'string' && typeof sourceId !== 'number')) {
      throw unexpectedBody(response, 'payload.contact_inbox.source_id');
    }

    return { sourceId: String(sourceId), response: body };
  }

  // Conversations

  /**
   * Open a conversation in the configured inbox. Returns the new conversation id.
   */
  async createConversation(params: CreateConversationParams): Promise<string> {
    requireText('sourceId', params.sourceId);

    const body = compact({
      source_id: params.sourceId,
      inbox_id: this.config.inboxId,
      contact_id: params.contactId,
      additional_attributes: params.additionalAttributes ?? {},
      status: params.status ?? 'open',
      assignee_id: params.assigneeId,
      team_id: params.teamId,
    });

    const response = await this.request('POST', 'conversations', {
      body: { ...body, ...params.extra },
    });
    return this.extractId(response);
  }

  /**
   * Conversation details, including its messages.
   */
  async getConversation(conversationId: Identifier): Promise<JsonValue> {
    requireIdentifier('conversationId', conversationId);
    const response = await this.request('GET', this.conversationPath(conversationId));
    return response.body;
  }

  // Messages

  async createMessage(conversationId: Identifier, params: CreateMessageParams): Promise<string> {
    requireIdentifier('conversationId', conversationId);
    requireText('content', params.content);

    const path = `${this.conversationPath(conversationId)}/messages`;
    const response = await this.request('POST', path, {
      body: {
        content: params.content,
        message_type: params.messageType ?? 'incoming',
        private: params.private ?? false,
      },
    });
    return this.extractId(response);
  }

  async listMessages(conversationId: Identifier): Promise<JsonValue> {
    requireIdentifier('conversationId', conversationId);
    const response = await this.request('GET', `${this.conversationPath(conversationId)}/messages`);
    return response.body;
  }

  // Inboxes

  async listInboxes(): Promise<JsonValue> {
    const response = await this.request('GET', 'inboxes');
    return response.body;
  }

  /**
   * Build the full URL for a path relative to the account.
   */
  buildUrl(path: string, query: RequestOptions['query'] = {}): URL {
    const url = new URL(
      `${this.config.domain}/api/v1/accounts/${encodeURIComponent(this.config.accountId)}/${path}`,
    );
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  private conversationPath(conversationId: Identifier): string {
    return `conversations/${encodeURIComponent(String(conversationId).trim())}`;
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[chatwoot] ${message}`);
    }
  }

  private async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const url = this.buildUrl(path, options.query).toString();
    const headers: Record<string, string> = {
      [ACCESS_TOKEN_HEADER]: this.config.apiAccessToken,
      Accept: 'application/json',
    };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    this.log(`${method} ${url}`);
    const { status, ok, text } = await this.send(method, url, {
      method,
      headers,
      body: options.body ? JSON.stringify(options.body) : undefined,
    });
    this.log(`${method} ${url} -> ${status}`);

    const body = parseBody(text);
    const details = { status, body: body.value, method, url };

    if (!ok) {
      throw apiErrorFor(details);
    }
    if (!body.json) {
      throw new RemoteServiceError(`${method} ${url} returned a body that is not JSON`, details);
    }
    return { status, method, url, body: body.value };
  }

  private async send(
    method: HttpMethod,
    url: string,
    init: RequestInit,
  ): Promise<{ status: number; ok: boolean; text: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    try {
      const response = await this.transport(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { status: response.status, ok: response.ok, text };
    } catch (error) {
      const reason = timedOut
        ? `Request timed out after ${this.config.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : 'Unknown fetch error';
      throw new NetworkError(`${method} ${url} failed: ${reason}`, { method, url, timedOut, cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private extractId(response: ApiResponse): string {
    const id = isJsonObject(response.body) ? response.body.id : undefined;
    if (typeof id !== 'string' && typeof id !== 'number') {
      throw unexpectedBody(response, 'id');
    }
    return String(id);
  }
}

interface ApiResponse {
  status: number;
  method: HttpMethod;
  url: string;
  body: JsonValue;
}

function unexpectedBody(response: ApiResponse, field: string): RemoteServiceError {
  return new RemoteServiceError(`${response.method} ${response.url} succeeded but the response has no ${field}`, {
    status: response.status,
    body: response.body,
    method: response.method,
    url: response.url,
  });
}

function parseBody(text: string): { json: boolean; value: JsonValue } {
  if (text.trim() === '') {
    return { json: true, value: null };
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return { json: true, value };
  } catch {
    return { json: false, value: text };
  }
}
