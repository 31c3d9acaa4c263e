/**
 * Error taxonomy
 * Every failure surfaced by the library is a HookcacheError with a stable code
 */

export type ErrorCode =
  | 'FETCH_FAILED'
  | 'MISSING_TOKEN'
  | 'SEND_FAILED'
  | 'REST_FAILED'
  | 'INVALID_EVENT'
  | 'INVALID_CONFIG';

export class HookcacheError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The fetch capability failed; the store was left as it was */
export class WebhookFetchError extends HookcacheError {
  /** Webhook id, or channel id for channel-wide lookups */
  readonly resourceId: string;

  constructor(resourceId: string, cause: unknown, subject = `webhook ${resourceId}`) {
    super('FETCH_FAILED', `Fetching ${subject} failed: ${errorMessage(cause)}`, { cause });
    this.resourceId = resourceId;
  }
}

/** Neither the caller nor the cached record supplied a token */
export class MissingTokenError extends HookcacheError {
  readonly webhookId: string;

  constructor(webhookId: string) {
    super('MISSING_TOKEN', `No token available for webhook ${webhookId}`);
    this.webhookId = webhookId;
  }
}

export class WebhookSendError extends HookcacheError {
  readonly webhookId: string;

  constructor(webhookId: string, cause: unknown) {
    super('SEND_FAILED', `Executing webhook ${webhookId} failed: ${errorMessage(cause)}`, { cause });
    this.webhookId = webhookId;
  }
}

export class RestError extends HookcacheError {
  readonly status: number;
  /** Platform error code from the JSON body, when present */
  readonly apiCode?: number;
  /** Set on 429 responses */
  readonly retryAfterMs?: number;

  constructor(
    route: string,
    status: number,
    detail: { message?: string; apiCode?: number; retryAfterMs?: number } = {},
  ) {
    super('REST_FAILED', `${route} failed: ${status}${detail.message ? ` ${detail.message}` : ''}`);
    this.status = status;
    this.apiCode = detail.apiCode;
    this.retryAfterMs = detail.retryAfterMs;
  }
}

export class EventParseError extends HookcacheError {
  readonly eventType: string;

  constructor(eventType: string, cause: unknown) {
    super('INVALID_EVENT', `Invalid ${eventType} payload: ${errorMessage(cause)}`, { cause });
    this.eventType = eventType;
  }
}

export class ConfigError extends HookcacheError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isHookcacheError(error: unknown): error is HookcacheError {
  return error instanceof HookcacheError;
}
