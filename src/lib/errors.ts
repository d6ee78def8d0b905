import type { HttpMethod, JsonValue } from './chatwoot-client-types.js';

export class ChatwootError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatwootError';
  }
}

/**
 * A required configuration value is missing or malformed.
 */
export class ConfigurationError extends ChatwootError {
  readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.fields = fields;
  }
}

/**
 * A method argument was rejected before any request was sent.
 */
export class ValidationError extends ChatwootError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export interface ApiErrorDetails {
  status: number;
  body: JsonValue;
  method: HttpMethod;
  url: string;
}

/**
 * The service answered with a status the client does not treat as success.
 * `body` holds the parsed JSON when the response was JSON, the raw text otherwise.
 */
export class ChatwootApiError extends ChatwootError {
  readonly status: number;
  readonly body: JsonValue;
  readonly method: HttpMethod;
  readonly url: string;

  constructor(message: string, details: ApiErrorDetails) {
    super(message);
    this.name = 'ChatwootApiError';
    this.status = details.status;
    this.body = details.body;
    this.method = details.method;
    this.url = details.url;
  }
}

export class AuthenticationError extends ChatwootApiError {
  constructor(message: string, details: ApiErrorDetails) {
    super(message, details);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends ChatwootApiError {
  constructor(message: string, details: ApiErrorDetails) {
    super(message, details);
    this.name = 'NotFoundError';
  }
}

export class RemoteServiceError extends ChatwootApiError {
  constructor(message: string, details: ApiErrorDetails) {
    super(message, details);
    this.name = 'RemoteServiceError';
  }
}

/**
 * The request never produced a response: DNS failure, refused connection, timeout.
 */
export class NetworkError extends ChatwootError {
  readonly method: HttpMethod;
  readonly url: string;
  readonly timedOut: boolean;

  constructor(message: string, details: { method: HttpMethod; url: string; timedOut: boolean; cause: unknown }) {
    super(message, { cause: details.cause });
    this.name = 'NetworkError';
    this.method = details.method;
    this.url = details.url;
    this.timedOut = details.timedOut;
  }
}

export function isChatwootError(error: unknown): error is ChatwootError {
  return error instanceof ChatwootError;
}

export function isApiError(error: unknown): error is ChatwootApiError {
  return error instanceof ChatwootApiError;
}

export function apiErrorFor(details: ApiErrorDetails): ChatwootApiError {
  const summary = `${details.method} ${details.url} failed with HTTP ${details.status}`;
  switch (details.status) {
    case 401:
      return new AuthenticationError(`${summary}: invalid or missing access token`, details);
    case 404:
      return new NotFoundError(`${summary}: resource not found`, details);
    default:
      return new RemoteServiceError(summary, details);
  }
}
