// JSON payloads are passed through as-is; the API's shapes are not modelled
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type Identifier = string | number;

// Client configuration
export interface ClientConfig {
  domain: string;
  apiAccessToken: string;
  accountId: Identifier;
  inboxId: Identifier;
  timeoutMs?: number;
  verbose?: boolean;
  fetch?: typeof fetch;
}

// What the config file and environment may hold
export interface StoredConfig {
  domain?: string;
  apiAccessToken?: string;
  accountId?: string;
  inboxId?: string;
  timeoutMs?: number;
}

export type HttpMethod = 'GET' | 'POST';

// Per-request options used internally by the client
export interface RequestOptions {
  query?: Record<string, string | number | undefined>;
  body?: JsonObject;
}

// Contacts
export interface SearchContactsOptions {
  page?: number;
}

export interface CreateContactParams {
  name: string;
  email?: string;
  phoneNumber?: string;
  // Unique identifier of the contact in an external system
  identifier?: string;
  customAttributes?: JsonObject;
}

export interface ContactCreation {
  sourceId: string;
  response: JsonObject;
}

// Conversations
export type ConversationStatus = 'open' | 'resolved' | 'pending' | 'snoozed';

export interface CreateConversationParams {
  sourceId: string;
  contactId?: Identifier;
  assigneeId?: Identifier;
  teamId?: Identifier;
  additionalAttributes?: JsonObject;
  status?: ConversationStatus;
  // Merged over the generated body, for fields this client does not name
  extra?: JsonObject;
}

// Messages
export type MessageType = 'incoming' | 'outgoing';

export interface CreateMessageParams {
  content: string;
  messageType?: MessageType;
  private?: boolean;
}
