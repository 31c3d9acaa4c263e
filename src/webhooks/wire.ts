/**
 * Platform wire shapes for webhook objects
 * Validated with zod, then mapped to WebhookRecord / WebhookPatch
 */

import { z } from 'zod';
import { fromNullable, set } from './patch.js';
import type { WebhookPatch, WebhookRecord } from './types.js';

export const SnowflakeSchema = z.string().regex(/^\d+$/, 'expected a numeric id');

/** Webhook type 3 is owned by an application (interactions) */
export const APPLICATION_WEBHOOK_TYPE = 3;

export const WebhookPayloadSchema = z.object({
  id: SnowflakeSchema,
  type: z.number().int(),
  channel_id: SnowflakeSchema,
  guild_id: SnowflakeSchema.nullish(),
  name: z.string().nullish(),
  avatar: z.string().nullish(),
  token: z.string().nullish(),
  application_id: SnowflakeSchema.nullish(),
});

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

/** Every field but id may be absent (leave alone) or null (clear) */
export const WebhookPatchPayloadSchema = WebhookPayloadSchema.partial().required({ id: true });

export type WebhookPatchPayload = z.infer<typeof WebhookPatchPayloadSchema>;

export function toRecord(payload: WebhookPayload): WebhookRecord {
  return Object.freeze({
    id: payload.id,
    channelId: payload.channel_id,
    guildId: payload.guild_id ?? null,
    name: payload.name ?? null,
    avatar: payload.avatar ?? null,
    token: payload.token ?? null,
    applicationId: payload.application_id ?? null,
    applicationOwned: payload.type === APPLICATION_WEBHOOK_TYPE,
  });
}

export function toPatch(payload: WebhookPatchPayload): WebhookPatch {
  const patch: WebhookPatch = {
    guildId: fromNullable(payload.guild_id),
    name: fromNullable(payload.name),
    avatar: fromNullable(payload.avatar),
    token: fromNullable(payload.token),
    applicationId: fromNullable(payload.application_id),
  };
  if (payload.channel_id !== undefined) patch.channelId = set(payload.channel_id);
  if (payload.type !== undefined) patch.applicationOwned = set(payload.type === APPLICATION_WEBHOOK_TYPE);
  return patch;
}
