/**
 * Minimal REST client for the webhook routes
 * Raw fetch against the platform API, responses validated with zod.
 * No retries: a 429 surfaces as RestError with retryAfterMs set.
 */

import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import { ConfigError, RestError } from '../lib/errors.js';
import { DEFAULT_API_BASE } from '../config/config.js';
import type { HookcacheConfig } from '../config/config.js';
import { SnowflakeSchema, WebhookPayloadSchema, toRecord } from '../webhooks/wire.js';
import type {
  Snowflake,
  WebhookFetcher,
  WebhookMessage,
  WebhookRecord,
  WebhookSender,
} from '../webhooks/types.js';

const log = createLogger('rest');

export interface RestClientConfig {
  botToken?: string;
  apiBase?: string;
  requestTimeoutMs?: number;
}

export interface ExecutedMessage {
  id: Snowflake;
  channelId: Snowflake;
}

interface RequestOptions {
  /** Send the bot Authorization header */
  auth: boolean;
  body?: unknown;
  query?: Record<string, string | undefined>;
}

const MessagePayloadSchema = z.object({
  id: SnowflakeSchema,
  channel_id: SnowflakeSchema,
});

const ApiErrorSchema = z.object({
  message: z.string().optional(),
  code: z.number().optional(),
  retry_after: z.number().optional(),
});

export class RestClient {
  private botToken?: string;
  private apiBase: string;
  private requestTimeoutMs: number;

  constructor(config: RestClientConfig = {}) {
    this.botToken = config.botToken;
    this.apiBase = config.apiBase ?? DEFAULT_API_BASE;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 15_000;
  }

  static fromConfig(config: HookcacheConfig): RestClient {
    return new RestClient({
      botToken: config.botToken,
      apiBase: config.apiBase,
      requestTimeoutMs: config.requestTimeoutMs,
    });
  }

  /** Needs a bot token; the response includes the webhook token only for incoming webhooks the bot may see */
  async getWebhook(id: Snowflake): Promise<WebhookRecord> {
    const data = await this.request('GET', `/webhooks/${id}`, { auth: true });
    return toRecord(WebhookPayloadSchema.parse(data));
  }

  async getWebhookWithToken(id: Snowflake, token: string): Promise<WebhookRecord> {
    const data = await this.request('GET', `/webhooks/${id}/${token}`, { auth: false });
    // The tokenised route omits the token from its response
    return { ...toRecord(WebhookPayloadSchema.parse(data)), token };
  }

  async listChannelWebhooks(channelId: Snowflake): Promise<WebhookRecord[]> {
    const data = await this.request('GET', `/channels/${channelId}/webhooks`, { auth: true });
    return z.array(WebhookPayloadSchema).parse(data).map(toRecord);
  }

  async createWebhook(channelId: Snowflake, name: string): Promise<WebhookRecord> {
    const data = await this.request('POST', `/channels/${channelId}/webhooks`, {
      auth: true,
      body: { name },
    });
    return toRecord(WebhookPayloadSchema.parse(data));
  }

  /** Returns the created message when `message.wait` is set, null otherwise */
  async executeWebhook(id: Snowflake, token: string, message: WebhookMessage): Promise<ExecutedMessage | null> {
    const data = await this.request('POST', `/webhooks/${id}/${token}`, {
      auth: false,
      query: {
        wait: message.wait ? 'true' : undefined,
        thread_id: message.threadId,
      },
      body: {
        content: message.content,
        username: message.username,
        avatar_url: message.avatarUrl,
        tts: message.tts,
        embeds: message.embeds,
      },
    });

    if (data === null) return null;
    const parsed = MessagePayloadSchema.parse(data);
    return { id: parsed.id, channelId: parsed.channel_id };
  }

  fetcher(): WebhookFetcher {
    return (id) => this.getWebhook(id);
  }

  sender(): WebhookSender<ExecutedMessage | null> {
    return (id, token, message) => this.executeWebhook(id, token, message);
  }

  private async request(method: 'GET' | 'POST', path: string, opts: RequestOptions): Promise<unknown> {
    // Tokens are part of the path on tokenised routes; keep them out of errors and logs
    const route = `${method} ${path.replace(/^(\/webhooks\/\d+)\/[^/]+$/, '$1/:token')}`;

    const headers: Record<string, string> = {};
    if (opts.auth) {
      if (!this.botToken) throw new ConfigError([`botToken is required for ${route}`]);
      headers['Authorization'] = `Bot ${this.botToken}`;
    }
    if (opts.body !== undefined) headers['Content-Type'] = 'application/json';

    const url = new URL(`${this.apiBase}${path}`);
    for (const [key, value] of Object.entries(opts.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    log.debug(route);
    const res = await fetch(url, {
      method,
      headers,
      body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });

    if (!res.ok) {
      const body = ApiErrorSchema.safeParse(await res.json().catch(() => null));
      const detail: z.infer<typeof ApiErrorSchema> = body.success ? body.data : {};
      const retryAfterSeconds = detail.retry_after ?? numberOrUndefined(res.headers.get('retry-after'));
      log.debug(`${route} → ${res.status}`);
      throw new RestError(route, res.status, {
        message: detail.message ?? res.statusText,
        apiCode: detail.code,
        retryAfterMs: res.status === 429 && retryAfterSeconds !== undefined
          ? Math.ceil(retryAfterSeconds * 1000)
          : undefined,
      });
    }

    if (res.status === 204) return null;
    return res.json();
  }
}

function numberOrUndefined(value: string | null): number | undefined {
  if (value === null) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}
