/**
 * Webhook executor: resolve the webhook through the store, then send
 *
 * One linear step per call: getOrFetch → pick token → send.
 * Retries are the transport's business, not this module's.
 */

import { createLogger } from '../lib/logger.js';
import { MissingTokenError, WebhookSendError } from '../lib/errors.js';
import type { WebhookStore } from './store.js';
import type { Snowflake, WebhookFetcher, WebhookMessage, WebhookSender } from './types.js';

const log = createLogger('executor');

export interface WebhookExecutorConfig<TOutcome> {
  store: WebhookStore;
  fetch: WebhookFetcher;
  send: WebhookSender<TOutcome>;
}

export interface ExecuteOptions {
  /** Token to use instead of the cached one */
  token?: string;
  /** Abort waiting for the webhook lookup */
  signal?: AbortSignal;
}

export class WebhookExecutor<TOutcome> {
  readonly store: WebhookStore;
  private fetcher: WebhookFetcher;
  private sender: WebhookSender<TOutcome>;

  constructor(config: WebhookExecutorConfig<TOutcome>) {
    this.store = config.store;
    this.fetcher = config.fetch;
    this.sender = config.send;
  }

  /**
   * Execute webhook `id` with `message`.
   *
   * Throws WebhookFetchError if the webhook can't be resolved,
   * MissingTokenError if no token is known (send is never called),
   * WebhookSendError if the send itself fails.
   */
  async execute(id: Snowflake, message: WebhookMessage, opts: ExecuteOptions = {}): Promise<TOutcome> {
    const webhook = await this.store.getOrFetch(id, this.fetcher, { signal: opts.signal });

    // An empty hint counts as no hint
    const token = opts.token || webhook.token;
    if (!token) throw new MissingTokenError(id);

    log.debug(`executing ${id}${opts.token ? ' (token hint)' : ''}`);
    try {
      return await this.sender(id, token, message);
    } catch (err) {
      log.debug(`send failed for ${id}: ${err}`);
      throw new WebhookSendError(id, err);
    }
  }
}
