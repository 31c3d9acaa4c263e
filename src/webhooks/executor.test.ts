import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { WebhookExecutor } from './executor.js';
import { WebhookStore } from './store.js';
import { MissingTokenError, WebhookFetchError, WebhookSendError } from '../lib/errors.js';
import type { Snowflake, WebhookMessage, WebhookRecord } from './types.js';

function webhook(overrides: Partial<WebhookRecord> = {}): WebhookRecord {
  return {
    id: '5',
    channelId: '100',
    guildId: '10',
    name: 'Relay',
    avatar: null,
    token: 'T',
    applicationId: null,
    applicationOwned: false,
    ...overrides,
  };
}

describe('WebhookExecutor', () => {
  let store: WebhookStore;
  let fetcher: Mock<(id: Snowflake) => Promise<WebhookRecord>>;
  let sender: Mock<(id: Snowflake, token: string, message: WebhookMessage) => Promise<string>>;
  let executor: WebhookExecutor<string>;

  beforeEach(() => {
    store = new WebhookStore();
    fetcher = vi.fn<(id: Snowflake) => Promise<WebhookRecord>>(async (id) => webhook({ id }));
    sender = vi.fn<(id: Snowflake, token: string, message: WebhookMessage) => Promise<string>>(async () => 'sent');
    executor = new WebhookExecutor({ store, fetch: fetcher, send: sender });
  });

  it('fetches an uncached webhook and sends with its token', async () => {
    await expect(executor.execute('5', { content: 'hi' })).resolves.toBe('sent');

    expect(fetcher).toHaveBeenCalledWith('5');
    expect(sender).toHaveBeenCalledWith('5', 'T', { content: 'hi' });
    expect(store.get('5')?.token).toBe('T');
  });

  it('prefers the token hint over the cached token', async () => {
    await executor.execute('5', { content: 'hi' }, { token: 'X' });
    expect(sender).toHaveBeenCalledWith('5', 'X', { content: 'hi' });
  });

  it('uses the cache on later calls', async () => {
    await executor.execute('5', { content: 'one' });
    await executor.execute('5', { content: 'two' });
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(sender).toHaveBeenCalledTimes(2);
  });

  it('fails with MissingTokenError without sending', async () => {
    fetcher.mockResolvedValueOnce(webhook({ token: null }));

    const err = await executor.execute('5', { content: 'hi' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MissingTokenError);
    expect(err).toMatchObject({ code: 'MISSING_TOKEN' });
    expect(sender).not.toHaveBeenCalled();
  });

  it('accepts a hint when the record has no token', async () => {
    store.insert(webhook({ token: null }));
    await executor.execute('5', { content: 'hi' }, { token: 'X' });
    expect(sender).toHaveBeenCalledWith('5', 'X', { content: 'hi' });
  });

  it('ignores an empty token hint', async () => {
    await executor.execute('5', { content: 'hi' }, { token: '' });
    expect(sender).toHaveBeenCalledWith('5', 'T', { content: 'hi' });
  });

  it('propagates fetch failures as WebhookFetchError', async () => {
    fetcher.mockRejectedValueOnce(new Error('Unknown Webhook'));

    await expect(executor.execute('5', { content: 'hi' })).rejects.toBeInstanceOf(WebhookFetchError);
    expect(sender).not.toHaveBeenCalled();
  });

  it('wraps send failures in WebhookSendError', async () => {
    const cause = new Error('rate limited');
    sender.mockRejectedValueOnce(cause);

    const err = await executor.execute('5', { content: 'hi' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WebhookSendError);
    expect(err).toMatchObject({ cause, message: 'Executing webhook 5 failed: rate limited' });
  });

  it('shares one lookup across concurrent executions', async () => {
    await Promise.all([
      executor.execute('5', { content: 'a' }),
      executor.execute('5', { content: 'b' }),
      executor.execute('5', { content: 'c' }),
    ]);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(sender).toHaveBeenCalledTimes(3);
  });
});
