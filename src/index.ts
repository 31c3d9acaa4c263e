/**
 * hookcache
 * In-memory webhook cache with coalesced fetches, event-driven updates
 * and an execution helper
 */

export { WebhookStore } from './webhooks/store.js';
export type { GetOrFetchOptions, GetOrCreateOptions } from './webhooks/store.js';
export { WebhookExecutor } from './webhooks/executor.js';
export type { ExecuteOptions, WebhookExecutorConfig } from './webhooks/executor.js';
export { InflightRegistry } from './webhooks/inflight.js';
export { applyPatch, clear, fromNullable, isEmptyPatch, set } from './webhooks/patch.js';
export { parseWebhookEvent, handleDispatch, isDispatchType, DISPATCH_TYPES } from './webhooks/events.js';
export type { DispatchType } from './webhooks/events.js';
export { WebhookPayloadSchema, WebhookPatchPayloadSchema, toPatch, toRecord } from './webhooks/wire.js';
export {
  executeAsMember,
  fromMember,
  fromPartialMember,
  fromUser,
  memberAvatarUrl,
  minimalMember,
  minimalWebhook,
  userAvatarUrl,
} from './webhooks/member.js';
export type {
  ExecuteAsMemberOptions,
  Member,
  MinimalMember,
  MinimalWebhook,
  PartialMember,
  User,
} from './webhooks/member.js';
export type {
  ChannelWebhookLister,
  ClearField,
  FieldChange,
  SetField,
  Snowflake,
  WebhookCreator,
  WebhookEvent,
  WebhookFetcher,
  WebhookMessage,
  WebhookPatch,
  WebhookRecord,
  WebhookSender,
} from './webhooks/types.js';
export { RestClient } from './rest/client.js';
export type { ExecutedMessage, RestClientConfig } from './rest/client.js';
export { loadConfig, validateConfig, DEFAULT_API_BASE, DEFAULT_CDN_BASE } from './config/config.js';
export type { HookcacheConfig, LoadConfigOptions, ValidationResult } from './config/config.js';
export { createHookcache } from './hookcache.js';
export type { Hookcache, MemberViews } from './hookcache.js';
export {
  ConfigError,
  EventParseError,
  HookcacheError,
  MissingTokenError,
  RestError,
  WebhookFetchError,
  WebhookSendError,
  errorMessage,
  isHookcacheError,
} from './lib/errors.js';
export type { ErrorCode } from './lib/errors.js';
export { createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
