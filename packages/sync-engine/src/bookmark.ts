import {
  StateCorruptionError,
  type Bookmark,
  type BookmarkValue,
  type FieldType,
  type JsonValue,
} from '@tap-nomad/shared';

export type ReplicationValue = string | number;

/**
 * Reads a replication-key value stored in state or config, normalizing it to
 * the field's type. Returns undefined when the value cannot represent that type.
 */
export function toReplicationValue(value: BookmarkValue | JsonValue | undefined, type: FieldType): ReplicationValue | undefined {
  switch (type) {
    case 'integer':
    case 'number': {
      if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
      }
      return undefined;
    }
    case 'datetime': {
      if (typeof value !== 'string') return undefined;
      const time = Date.parse(value);
      return Number.isNaN(time) ? undefined : new Date(time).toISOString();
    }
    case 'string':
      return typeof value === 'string' ? value : undefined;
    default:
      return undefined;
  }
}

export function compareReplicationValues(a: ReplicationValue, b: ReplicationValue, type: FieldType): number {
  if (type === 'integer' || type === 'number') {
    return Number(a) - Number(b);
  }
  if (type === 'datetime') {
    return Date.parse(String(a)) - Date.parse(String(b));
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export function maxReplicationValue(
  current: ReplicationValue | undefined,
  candidate: ReplicationValue,
  type: FieldType,
): ReplicationValue {
  if (current === undefined) return candidate;
  return compareReplicationValues(candidate, current, type) > 0 ? candidate : current;
}

/**
 * Reads `key` from a stream's bookmark. A value that is present but cannot be
 * interpreted leaves no safe resume point.
 *
 * @throws StateCorruptionError
 */
export function readBookmarkValue(
  bookmark: Bookmark,
  key: string,
  type: FieldType,
  stream: string,
): ReplicationValue | undefined {
  const raw = bookmark[key];
  if (raw === undefined) return undefined;

  const value = toReplicationValue(raw, type);
  if (value === undefined) {
    throw new StateCorruptionError(
      `Bookmark '${key}' for stream '${stream}' is not a valid ${type}: ${JSON.stringify(raw)}`,
      { stream, key },
    );
  }
  return value;
}

export function readBookmarkToken(bookmark: Bookmark, key: string, stream: string): string | undefined {
  const raw = bookmark[key];
  if (raw === undefined) return undefined;
  if (typeof raw !== 'string' || raw === '') {
    throw new StateCorruptionError(`Bookmark '${key}' for stream '${stream}' must be a non-empty string`, { stream, key });
  }
  return raw;
}
