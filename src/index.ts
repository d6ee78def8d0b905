// Library exports

export { ACCESS_TOKEN_HEADER, ChatwootClient, DEFAULT_TIMEOUT_MS, isJsonObject } from './lib/chatwoot-client.js';
export type {
  ClientConfig,
  ContactCreation,
  ConversationStatus,
  CreateContactParams,
  CreateConversationParams,
  CreateMessageParams,
  Identifier,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  MessageType,
  SearchContactsOptions,
  StoredConfig,
} from './lib/chatwoot-client-types.js';
export {
  AuthenticationError,
  ChatwootApiError,
  ChatwootError,
  ConfigurationError,
  NetworkError,
  NotFoundError,
  RemoteServiceError,
  ValidationError,
  isApiError,
  isChatwootError,
} from './lib/errors.js';
export type { ApiErrorDetails } from './lib/errors.js';
export { createClientFromConfig, loadConfig, resolveConfig } from './lib/config.js';
