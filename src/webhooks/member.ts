/**
 * Post through a webhook as a member or user
 * Resolves display name and avatar URL, then executes with them
 */

import { DEFAULT_CDN_BASE } from '../config/config.js';
import { MissingTokenError } from '../lib/errors.js';
import type { ExecuteOptions, WebhookExecutor } from './executor.js';
import type { Snowflake, WebhookMessage, WebhookRecord } from './types.js';

export interface User {
  id: Snowflake;
  username: string;
  /** Avatar hash */
  avatar: string | null;
}

/** Guild member as delivered with the user object attached */
export interface Member {
  guildId: Snowflake;
  nick: string | null;
  /** Guild-specific avatar hash */
  avatar: string | null;
  user: User;
}

/** Member fragment that comes without its user (e.g. on message events) */
export interface PartialMember {
  nick: string | null;
  avatar: string | null;
}

export interface MinimalMember {
  name: string;
  avatarUrl: string | null;
}

export interface MinimalWebhook {
  id: Snowflake;
  token: string;
}

export function userAvatarUrl(hash: string, userId: Snowflake, cdnBase = DEFAULT_CDN_BASE): string {
  return `${cdnBase}/avatars/${userId}/${hash}.png`;
}

export function memberAvatarUrl(
  hash: string,
  userId: Snowflake,
  guildId: Snowflake,
  cdnBase = DEFAULT_CDN_BASE,
): string {
  return `${cdnBase}/guilds/${guildId}/users/${userId}/avatars/${hash}.png`;
}

/**
 * Build from raw parts. Pass `guildId` only when the avatar is a guild
 * avatar, otherwise the URL points at the wrong asset.
 */
export function minimalMember(
  name: string,
  avatar?: { hash: string; userId: Snowflake },
  guildId?: Snowflake,
  cdnBase = DEFAULT_CDN_BASE,
): MinimalMember {
  if (!avatar) return { name, avatarUrl: null };
  return {
    name,
    avatarUrl: guildId
      ? memberAvatarUrl(avatar.hash, avatar.userId, guildId, cdnBase)
      : userAvatarUrl(avatar.hash, avatar.userId, cdnBase),
  };
}

export function fromUser(user: User, cdnBase = DEFAULT_CDN_BASE): MinimalMember {
  return {
    name: user.username,
    avatarUrl: user.avatar ? userAvatarUrl(user.avatar, user.id, cdnBase) : null,
  };
}

/** Nick over username, guild avatar over user avatar */
export function fromMember(member: Member, cdnBase = DEFAULT_CDN_BASE): MinimalMember {
  return fromPartialMember(member, member.guildId, member.user, cdnBase);
}

/**
 * Same fallbacks as fromMember. Without a `guildId` the guild avatar can't
 * be addressed, so only the user avatar is used.
 */
export function fromPartialMember(
  member: PartialMember,
  guildId: Snowflake | null,
  user: User,
  cdnBase = DEFAULT_CDN_BASE,
): MinimalMember {
  let avatarUrl: string | null = null;
  if (member.avatar && guildId) {
    avatarUrl = memberAvatarUrl(member.avatar, user.id, guildId, cdnBase);
  } else if (user.avatar) {
    avatarUrl = userAvatarUrl(user.avatar, user.id, cdnBase);
  }
  return { name: member.nick ?? user.username, avatarUrl };
}

/** Throws MissingTokenError when the record carries no token */
export function minimalWebhook(record: WebhookRecord): MinimalWebhook {
  if (!record.token) throw new MissingTokenError(record.id);
  return { id: record.id, token: record.token };
}

export interface ExecuteAsMemberOptions extends ExecuteOptions {
  /** Thread of the webhook's channel to post into */
  threadId?: Snowflake;
}

/**
 * Execute a webhook under a member's name and avatar.
 * For a thread, pass the parent channel's webhook and the thread id.
 */
export function executeAsMember<TOutcome>(
  executor: WebhookExecutor<TOutcome>,
  id: Snowflake,
  member: MinimalMember,
  message: WebhookMessage,
  opts: ExecuteAsMemberOptions = {},
): Promise<TOutcome> {
  const { threadId, ...executeOpts } = opts;
  const outgoing: WebhookMessage = { ...message, username: member.name };
  if (member.avatarUrl) outgoing.avatarUrl = member.avatarUrl;
  if (threadId) outgoing.threadId = threadId;
  return executor.execute(id, outgoing, executeOpts);
}
