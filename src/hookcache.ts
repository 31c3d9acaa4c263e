/**
 * Wires config, REST client, store and executor together
 * Each call builds a fresh, independent set; the store is owned by the caller
 */

import { loadConfig, validateConfig } from './config/config.js';
import type { HookcacheConfig } from './config/config.js';
import { createLogger } from './lib/logger.js';
import { RestClient } from './rest/client.js';
import type { ExecutedMessage } from './rest/client.js';
import { WebhookStore } from './webhooks/store.js';
import { WebhookExecutor } from './webhooks/executor.js';
import { handleDispatch } from './webhooks/events.js';
import { fromMember, fromPartialMember, fromUser, minimalMember } from './webhooks/member.js';
import type { Member, MinimalMember, PartialMember, User } from './webhooks/member.js';
import type { Snowflake, WebhookEvent, WebhookRecord } from './webhooks/types.js';

const log = createLogger('hookcache');

export interface Hookcache {
  config: HookcacheConfig;
  store: WebhookStore;
  rest: RestClient;
  executor: WebhookExecutor<ExecutedMessage | null>;
  /** Feed a raw gateway dispatch into the store */
  dispatch(type: string, data: unknown): WebhookEvent | null;
  /** Usable webhook for a channel, creating one under the configured name if needed */
  channelWebhook(channelId: Snowflake): Promise<WebhookRecord>;
  /** Member views whose avatar URLs point at the configured CDN */
  members: MemberViews;
}

export interface MemberViews {
  minimalMember(name: string, avatar?: { hash: string; userId: Snowflake }, guildId?: Snowflake): MinimalMember;
  fromUser(user: User): MinimalMember;
  fromMember(member: Member): MinimalMember;
  fromPartialMember(member: PartialMember, guildId: Snowflake | null, user: User): MinimalMember;
}

export function createHookcache(config: HookcacheConfig = loadConfig()): Hookcache {
  const rest = RestClient.fromConfig(config);
  const store = new WebhookStore();
  const executor = new WebhookExecutor({ store, fetch: rest.fetcher(), send: rest.sender() });

  for (const warning of validateConfig(config).warnings) log.warn(warning);
  log.debug(`ready (api: ${config.apiBase})`);

  return {
    config,
    store,
    rest,
    executor,
    dispatch: (type, data) => handleDispatch(store, type, data),
    channelWebhook: (channelId) => store.getOrCreateForChannel(channelId, {
      list: (id) => rest.listChannelWebhooks(id),
      create: (id, name) => rest.createWebhook(id, name),
      name: config.defaultWebhookName,
    }),
    members: {
      minimalMember: (name, avatar, guildId) => minimalMember(name, avatar, guildId, config.cdnBase),
      fromUser: (user) => fromUser(user, config.cdnBase),
      fromMember: (member) => fromMember(member, config.cdnBase),
      fromPartialMember: (member, guildId, user) => fromPartialMember(member, guildId, user, config.cdnBase),
    },
  };
}
