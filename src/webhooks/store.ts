/**
 * Webhook store: in-memory cache of webhook records keyed by webhook id
 *
 * Reads are plain map lookups and never wait on a fetch.
 * Misses are filled through a caller-supplied fetcher, one fetch per id at a time.
 * Platform events keep entries current (see apply()).
 *
 * Mutations are synchronous, so each one is atomic on the event loop.
 * A fill that was in flight while its id was mutated does not write its
 * (now older) result back.
 */

import { createLogger } from '../lib/logger.js';
import { WebhookFetchError } from '../lib/errors.js';
import { InflightRegistry, awaitWithSignal } from './inflight.js';
import { applyPatch, freezeRecord, isEmptyPatch } from './patch.js';
import type {
  ChannelWebhookLister,
  Snowflake,
  WebhookCreator,
  WebhookEvent,
  WebhookFetcher,
  WebhookPatch,
  WebhookRecord,
} from './types.js';

const log = createLogger('store');

export interface GetOrFetchOptions {
  /** Stop waiting for this caller only; the shared fetch carries on */
  signal?: AbortSignal;
}

export interface GetOrCreateOptions {
  list: ChannelWebhookLister;
  create: WebhookCreator;
  /** Name for a newly created webhook */
  name: string;
  signal?: AbortSignal;
}

/** Ids mutated while an async fill was outstanding */
interface MutationWatch {
  touched: Set<Snowflake>;
  cleared: boolean;
}

export class WebhookStore {
  private entries = new Map<Snowflake, WebhookRecord>();
  private fetches = new InflightRegistry<Snowflake, WebhookRecord>();
  private channelLookups = new InflightRegistry<Snowflake, WebhookRecord>();
  private watches = new Set<MutationWatch>();

  get(id: Snowflake): WebhookRecord | undefined {
    return this.entries.get(id);
  }

  has(id: Snowflake): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): WebhookRecord[] {
    return Array.from(this.entries.values());
  }

  /**
   * Cached record, or fetch it. Concurrent misses for the same id share one
   * fetcher call and all see the same record or the same WebhookFetchError.
   */
  async getOrFetch(id: Snowflake, fetcher: WebhookFetcher, opts: GetOrFetchOptions = {}): Promise<WebhookRecord> {
    const cached = this.entries.get(id);
    if (cached) return cached;
    // Nothing would observe the fetch's outcome
    if (opts.signal?.aborted) throw new WebhookFetchError(id, opts.signal.reason);

    const shared = this.fetches.run(id, () => this.fill(id, fetcher));
    try {
      return await awaitWithSignal(shared, opts.signal);
    } catch (err) {
      if (err instanceof WebhookFetchError) throw err;
      throw new WebhookFetchError(id, err);
    }
  }

  insert(record: WebhookRecord): void {
    this.write(freezeRecord(record));
  }

  /**
   * Merge a patch into the cached record.
   * Returns false (and changes nothing) when the id isn't cached. Events
   * can arrive for webhooks this process never saw.
   * An empty patch leaves the snapshot (and any in-flight fill) alone.
   */
  update(id: Snowflake, patch: WebhookPatch): boolean {
    const current = this.entries.get(id);
    if (isEmptyPatch(patch)) return current !== undefined;
    // A fill racing with this event may hold pre-update data
    this.touch(id);
    if (!current) {
      log.debug(`update miss: ${id}`);
      return false;
    }
    this.entries.set(id, applyPatch(current, patch));
    return true;
  }

  remove(id: Snowflake): WebhookRecord | undefined {
    const prev = this.entries.get(id);
    this.entries.delete(id);
    this.touch(id);
    if (prev) log.debug(`removed: ${id}`);
    return prev;
  }

  clear(): void {
    log.debug(`cleared ${this.entries.size} entries`);
    this.entries.clear();
    for (const watch of this.watches) watch.cleared = true;
  }

  findByChannel(channelId: Snowflake): WebhookRecord[] {
    return this.values().filter((w) => w.channelId === channelId);
  }

  /** First cached webhook of the channel that can be executed */
  findUsable(channelId: Snowflake): WebhookRecord | undefined {
    return this.values().find((w) => w.channelId === channelId && w.token !== null);
  }

  /** Drop webhooks of a deleted or inaccessible channel */
  removeByChannel(channelId: Snowflake): WebhookRecord[] {
    const removed = this.findByChannel(channelId);
    for (const w of removed) this.remove(w.id);
    return removed;
  }

  /** Drop webhooks of a deleted or departed guild */
  removeByGuild(guildId: Snowflake): WebhookRecord[] {
    const removed = this.values().filter((w) => w.guildId === guildId);
    for (const w of removed) this.remove(w.id);
    return removed;
  }

  apply(event: WebhookEvent): void {
    switch (event.type) {
      case 'webhook.created':
        this.insert(event.webhook);
        break;
      case 'webhook.updated':
        this.update(event.id, event.patch);
        break;
      case 'webhook.deleted':
        this.remove(event.id);
        break;
      case 'channel.deleted':
        this.removeByChannel(event.channelId);
        break;
      case 'guild.deleted':
        this.removeByGuild(event.guildId);
        break;
    }
  }

  /**
   * Reconcile one channel against the platform: cache what exists, drop what
   * no longer does. The platform's own "webhooks changed" notice only names
   * the channel, so this is the way to pick up edits and manual deletions.
   */
  async syncChannel(channelId: Snowflake, list: ChannelWebhookLister): Promise<WebhookRecord[]> {
    const watch = this.watch();
    try {
      let webhooks: WebhookRecord[];
      try {
        webhooks = (await list(channelId)).map(freezeRecord);
      } catch (err) {
        throw new WebhookFetchError(channelId, err, `webhooks of channel ${channelId}`);
      }

      const live = new Set(webhooks.map((w) => w.id));
      for (const cached of this.findByChannel(channelId)) {
        if (!live.has(cached.id) && !this.isStale(watch, cached.id)) this.remove(cached.id);
      }
      for (const w of webhooks) {
        if (!this.isStale(watch, w.id)) this.write(w);
      }

      log.debug(`synced channel ${channelId}: ${webhooks.length} webhooks`);
      return webhooks;
    } finally {
      this.watches.delete(watch);
    }
  }

  /**
   * A webhook the caller can execute in `channelId`: cached, else the first
   * listed one with a token, else a newly created one. Concurrent calls for
   * the same channel share one lookup.
   */
  async getOrCreateForChannel(channelId: Snowflake, opts: GetOrCreateOptions): Promise<WebhookRecord> {
    const cached = this.findUsable(channelId);
    if (cached) return cached;
    if (opts.signal?.aborted) {
      throw new WebhookFetchError(channelId, opts.signal.reason, `webhooks of channel ${channelId}`);
    }

    const shared = this.channelLookups.run(channelId, () => this.lookupOrCreate(channelId, opts));
    return awaitWithSignal(shared, opts.signal).catch((err: unknown) => {
      if (err instanceof WebhookFetchError) throw err;
      throw new WebhookFetchError(channelId, err, `webhooks of channel ${channelId}`);
    });
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private async fill(id: Snowflake, fetcher: WebhookFetcher): Promise<WebhookRecord> {
    // Filled between the miss and the start of this task
    const cached = this.entries.get(id);
    if (cached) return cached;

    const watch = this.watch();
    try {
      log.debug(`miss: ${id}, fetching`);
      let fetched: WebhookRecord;
      try {
        fetched = freezeRecord(await fetcher(id));
      } catch (err) {
        throw new WebhookFetchError(id, err);
      }

      if (fetched.id !== id) {
        throw new WebhookFetchError(id, new Error(`fetcher returned webhook ${fetched.id}`));
      }

      if (this.isStale(watch, id)) {
        log.debug(`fill for ${id} superseded while in flight`);
        return this.entries.get(id) ?? fetched;
      }

      this.write(fetched);
      return fetched;
    } finally {
      this.watches.delete(watch);
    }
  }

  private async lookupOrCreate(channelId: Snowflake, opts: GetOrCreateOptions): Promise<WebhookRecord> {
    const cached = this.findUsable(channelId);
    if (cached) return cached;

    const listed = await log.child(() => this.syncChannel(channelId, opts.list));
    const usable = listed.find((w) => w.token !== null);
    if (usable) return this.entries.get(usable.id) ?? usable;

    let created: WebhookRecord;
    try {
      created = freezeRecord(await opts.create(channelId, opts.name));
    } catch (err) {
      throw new WebhookFetchError(channelId, err, `new webhook for channel ${channelId}`);
    }
    log.debug(`created webhook ${created.id} in channel ${channelId}`);
    this.write(created);
    return created;
  }

  private write(record: WebhookRecord): void {
    this.entries.set(record.id, record);
    this.touch(record.id);
  }

  private watch(): MutationWatch {
    const watch: MutationWatch = { touched: new Set(), cleared: false };
    this.watches.add(watch);
    return watch;
  }

  private touch(id: Snowflake): void {
    for (const watch of this.watches) watch.touched.add(id);
  }

  private isStale(watch: MutationWatch, id: Snowflake): boolean {
    return watch.cleared || watch.touched.has(id);
  }
}
