/**
 * Webhook record, patch and capability types
 */

/** Platform identifier, kept as a decimal string since it exceeds 2^53 */
export type Snowflake = string;

export interface WebhookRecord {
  readonly id: Snowflake;
  readonly channelId: Snowflake;
  /** Null for channel-only webhooks */
  readonly guildId: Snowflake | null;
  readonly name: string | null;
  /** Avatar image hash */
  readonly avatar: string | null;
  /** Only present for incoming webhooks the caller is allowed to see */
  readonly token: string | null;
  readonly applicationId: Snowflake | null;
  readonly applicationOwned: boolean;
}

/** Field patch for a non-nullable field */
export interface SetField<T> {
  op: 'set';
  value: T;
}

export interface ClearField {
  op: 'clear';
}

/** Field patch for a nullable field; an absent key means "leave alone" */
export type FieldChange<T> = SetField<T> | ClearField;

export interface WebhookPatch {
  channelId?: SetField<Snowflake>;
  guildId?: FieldChange<Snowflake>;
  name?: FieldChange<string>;
  avatar?: FieldChange<string>;
  token?: FieldChange<string>;
  applicationId?: FieldChange<Snowflake>;
  applicationOwned?: SetField<boolean>;
}

export type WebhookEvent =
  | { type: 'webhook.created'; webhook: WebhookRecord }
  | { type: 'webhook.updated'; id: Snowflake; patch: WebhookPatch }
  | { type: 'webhook.deleted'; id: Snowflake }
  | { type: 'channel.deleted'; channelId: Snowflake }
  | { type: 'guild.deleted'; guildId: Snowflake };

export type WebhookFetcher = (id: Snowflake) => Promise<WebhookRecord>;

export type ChannelWebhookLister = (channelId: Snowflake) => Promise<WebhookRecord[]>;

export type WebhookCreator = (channelId: Snowflake, name: string) => Promise<WebhookRecord>;

export interface WebhookMessage {
  content?: string;
  username?: string;
  avatarUrl?: string;
  /** Post into this thread of the webhook's channel */
  threadId?: Snowflake;
  tts?: boolean;
  embeds?: Record<string, unknown>[];
  /** Wait for the platform to return the created message */
  wait?: boolean;
}

export type WebhookSender<TOutcome> = (
  id: Snowflake,
  token: string,
  message: WebhookMessage,
) => Promise<TOutcome>;
