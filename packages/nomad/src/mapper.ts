import { isJsonObject } from '@tap-nomad/shared';

const NANOS_PER_MILLI = 1_000_000;

/**
 * Converts a Nomad PascalCase key to snake_case.
 * `JobID` → `job_id`, `HTTPAddr` → `http_addr`, `ID` → `id`.
 */
export function toSnakeCase(key: string): string {
  return key
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase();
}

/**
 * Nomad timestamps (`SubmitTime`, `CreateTime`, `ModifyTime`) are Unix epoch
 * nanoseconds; 0 means unset.
 */
export function nanosToIso(value: number): string | null {
  if (value === 0) return null;
  return new Date(Math.floor(value / NANOS_PER_MILLI)).toISOString();
}

function isTimeField(key: string): boolean {
  return key.endsWith('_time');
}

/**
 * Maps a raw Nomad list item onto the tap's field naming: top-level keys to
 * snake_case, nanosecond `*_time` values to ISO strings. Nested objects keep
 * their API casing. Non-objects are returned unchanged so the record
 * conformer can reject them.
 */
export function normalizeNomadPayload(item: unknown): unknown {
  if (!isJsonObject(item)) {
    return item;
  }

  const normalized: Record<string, unknown> = {};
  for (const [rawKey, value] of Object.entries(item)) {
    const key = toSnakeCase(rawKey);
    normalized[key] = isTimeField(key) && typeof value === 'number' ? nanosToIso(value) : value;
  }
  return normalized;
}
