/**
 * Gateway dispatch → WebhookEvent
 *
 * Handles: WEBHOOK_CREATE, WEBHOOK_UPDATE, WEBHOOK_DELETE,
 *          CHANNEL_DELETE, GUILD_DELETE
 * Anything else maps to null.
 */

import { z } from 'zod';
import { createLogger } from '../lib/logger.js';
import { EventParseError } from '../lib/errors.js';
import {
  SnowflakeSchema,
  WebhookPatchPayloadSchema,
  WebhookPayloadSchema,
  toPatch,
  toRecord,
} from './wire.js';
import type { WebhookStore } from './store.js';
import type { WebhookEvent } from './types.js';

const log = createLogger('events');

export const DISPATCH_TYPES = [
  'WEBHOOK_CREATE',
  'WEBHOOK_UPDATE',
  'WEBHOOK_DELETE',
  'CHANNEL_DELETE',
  'GUILD_DELETE',
] as const;

export type DispatchType = typeof DISPATCH_TYPES[number];

const IdPayloadSchema = z.object({ id: SnowflakeSchema });

const GuildDeletePayloadSchema = z.object({
  id: SnowflakeSchema,
  /** true means an outage, not a removal */
  unavailable: z.boolean().optional(),
});

export function isDispatchType(type: string): type is DispatchType {
  return DISPATCH_TYPES.some((known) => known === type);
}

function parse<T>(type: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) throw new EventParseError(type, result.error);
  return result.data;
}

/**
 * Validate a raw dispatch payload.
 * Throws EventParseError when a known event carries a malformed payload.
 */
export function parseWebhookEvent(type: string, data: unknown): WebhookEvent | null {
  if (!isDispatchType(type)) return null;

  switch (type) {
    case 'WEBHOOK_CREATE':
      return { type: 'webhook.created', webhook: toRecord(parse(type, WebhookPayloadSchema, data)) };
    case 'WEBHOOK_UPDATE': {
      const payload = parse(type, WebhookPatchPayloadSchema, data);
      return { type: 'webhook.updated', id: payload.id, patch: toPatch(payload) };
    }
    case 'WEBHOOK_DELETE':
      return { type: 'webhook.deleted', id: parse(type, IdPayloadSchema, data).id };
    case 'CHANNEL_DELETE':
      return { type: 'channel.deleted', channelId: parse(type, IdPayloadSchema, data).id };
    case 'GUILD_DELETE': {
      const payload = parse(type, GuildDeletePayloadSchema, data);
      // Outage: the guild and its webhooks come back
      if (payload.unavailable) return null;
      return { type: 'guild.deleted', guildId: payload.id };
    }
  }
}

/** Parse a dispatch and apply it to the store; returns the applied event */
export function handleDispatch(store: WebhookStore, type: string, data: unknown): WebhookEvent | null {
  const event = parseWebhookEvent(type, data);
  if (!event) return null;
  log.debug(`${type} → ${event.type}`);
  store.apply(event);
  return event;
}
