import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { createHookcache } from './hookcache.js';
import type { HookcacheConfig } from './config/config.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const config: HookcacheConfig = {
  botToken: 'test-secret',
  apiBase: 'http://api.test',
  cdnBase: 'http://cdn.test',
  requestTimeoutMs: 1000,
  defaultWebhookName: 'relay',
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('createHookcache', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterAll(() => {
    vi.unstubAllGlobals();
  });

  it('builds independent stores', () => {
    const a = createHookcache(config);
    const b = createHookcache(config);
    a.dispatch('WEBHOOK_CREATE', { id: '1', type: 1, channel_id: '100', token: 'test-token' });

    expect(a.store.has('1')).toBe(true);
    expect(b.store.has('1')).toBe(false);
  });

  it('creates a channel webhook under the configured name when none is usable', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse(200, []))
      .mockResolvedValueOnce(jsonResponse(200, { id: '7', type: 1, channel_id: '100', name: 'relay', token: 'test-token' }));

    const hookcache = createHookcache(config);
    const webhook = await hookcache.channelWebhook('100');

    expect(webhook.id).toBe('7');
    expect(mockFetch.mock.calls.map(([url]) => String(url))).toEqual([
      'http://api.test/channels/100/webhooks',
      'http://api.test/channels/100/webhooks',
    ]);
    expect(hookcache.store.findUsable('100')?.id).toBe('7');
  });

  it('executes through the cache with the REST transport', async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const hookcache = createHookcache(config);
    hookcache.dispatch('WEBHOOK_CREATE', { id: '1', type: 1, channel_id: '100', token: 'test-token' });

    await expect(hookcache.executor.execute('1', { content: 'hi' })).resolves.toBeNull();
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(String(mockFetch.mock.calls[0][0])).toBe('http://api.test/webhooks/1/test-token');
  });

  it('builds avatar URLs under the configured CDN base', () => {
    const { members } = createHookcache(config);
    const user = { id: '42', username: 'alpha', avatar: 'abc' };

    expect(members.fromUser(user).avatarUrl).toBe('http://cdn.test/avatars/42/abc.png');
    expect(members.fromMember({ guildId: '10', nick: 'Al', avatar: 'def', user })).toEqual({
      name: 'Al',
      avatarUrl: 'http://cdn.test/guilds/10/users/42/avatars/def.png',
    });
    expect(members.minimalMember('beta', { hash: 'ghi', userId: '43' }).avatarUrl)
      .toBe('http://cdn.test/avatars/43/ghi.png');
  });
});
