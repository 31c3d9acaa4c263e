import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  HookcacheError,
  MissingTokenError,
  RestError,
  WebhookFetchError,
  WebhookSendError,
  errorMessage,
  isHookcacheError,
} from './errors.js';

describe('error classes', () => {
  it('carry a code, a name and the cause', () => {
    const cause = new Error('socket hang up');
    const err = new WebhookFetchError('1', cause);

    expect(err).toBeInstanceOf(HookcacheError);
    expect(err.code).toBe('FETCH_FAILED');
    expect(err.name).toBe('WebhookFetchError');
    expect(err.cause).toBe(cause);
    expect(err.resourceId).toBe('1');
    expect(err.message).toBe('Fetching webhook 1 failed: socket hang up');
  });

  it('describes channel-wide lookups by subject', () => {
    const err = new WebhookFetchError('100', 'nope', 'webhooks of channel 100');
    expect(err.message).toBe('Fetching webhooks of channel 100 failed: nope');
  });

  it('formats the rest of the taxonomy', () => {
    expect(new MissingTokenError('5').message).toBe('No token available for webhook 5');
    expect(new WebhookSendError('5', new Error('boom')).code).toBe('SEND_FAILED');
    expect(new RestError('GET /webhooks/5', 404, { message: 'Unknown Webhook', apiCode: 10015 }).message)
      .toBe('GET /webhooks/5 failed: 404 Unknown Webhook');
    expect(new RestError('GET /webhooks/5', 502).message).toBe('GET /webhooks/5 failed: 502');
    expect(new ConfigError(['a', 'b']).message).toBe('Invalid configuration: a; b');
  });
});

describe('helpers', () => {
  it('errorMessage handles non-errors', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });

  it('isHookcacheError narrows library errors only', () => {
    expect(isHookcacheError(new MissingTokenError('1'))).toBe(true);
    expect(isHookcacheError(new Error('x'))).toBe(false);
  });
});
