import type { ClearField, FieldChange, SetField, WebhookPatch, WebhookRecord } from './types.js';

export function set<T>(value: T): SetField<T> {
  return { op: 'set', value };
}

export function clear(): ClearField {
  return { op: 'clear' };
}

/**
 * Map a wire value onto a field change: undefined leaves the field alone,
 * null clears it.
 */
export function fromNullable<T>(value: T | null | undefined): FieldChange<T> | undefined {
  if (value === undefined) return undefined;
  return value === null ? clear() : set(value);
}

function resolve<T>(current: T | null, change: FieldChange<T> | undefined): T | null {
  if (!change) return current;
  return change.op === 'set' ? change.value : null;
}

/** Returns a new frozen record; the input is never mutated */
export function applyPatch(record: WebhookRecord, patch: WebhookPatch): WebhookRecord {
  return Object.freeze({
    id: record.id,
    channelId: patch.channelId ? patch.channelId.value : record.channelId,
    guildId: resolve(record.guildId, patch.guildId),
    name: resolve(record.name, patch.name),
    avatar: resolve(record.avatar, patch.avatar),
    token: resolve(record.token, patch.token),
    applicationId: resolve(record.applicationId, patch.applicationId),
    applicationOwned: patch.applicationOwned ? patch.applicationOwned.value : record.applicationOwned,
  });
}

export function freezeRecord(record: WebhookRecord): WebhookRecord {
  return Object.isFrozen(record) ? record : Object.freeze({ ...record });
}

export function isEmptyPatch(patch: WebhookPatch): boolean {
  return Object.values(patch).every((change) => change === undefined);
}
