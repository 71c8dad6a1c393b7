import {
  isJsonObject,
  isJsonValue,
  MalformedRecordError,
  type FieldType,
  type JsonValue,
  type StreamDefinition,
} from '@tap-nomad/shared';

export type TapRecord = Record<string, JsonValue>;

const INTEGER_PATTERN = /^-?\d+$/;

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function mismatch(stream: string, field: string, type: FieldType, value: unknown): MalformedRecordError {
  return new MalformedRecordError(
    `Field '${field}' in stream '${stream}' expected ${type}, got ${describe(value)}`,
    { stream, field, expected: type },
  );
}

/**
 * Converts one non-null payload value to the declared field type.
 * Lossless conversions (numeric strings, 'true'/'false', parseable dates)
 * are applied; anything else is a malformed record.
 */
export function coerceValue(value: unknown, type: FieldType, stream: string, field: string): JsonValue {
  switch (type) {
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' && Number.isFinite(value)) return String(value);
      if (typeof value === 'boolean') return String(value);
      throw mismatch(stream, field, type, value);

    case 'integer':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) return Number(value.trim());
      throw mismatch(stream, field, type, value);

    case 'number':
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
      throw mismatch(stream, field, type, value);

    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      throw mismatch(stream, field, type, value);

    case 'datetime': {
      if (typeof value !== 'string') throw mismatch(stream, field, type, value);
      const time = Date.parse(value);
      if (Number.isNaN(time)) throw mismatch(stream, field, type, value);
      return new Date(time).toISOString();
    }

    case 'object':
      if (isJsonObject(value) && isJsonValue(value)) return value;
      throw mismatch(stream, field, type, value);

    case 'array':
      if (Array.isArray(value) && isJsonValue(value)) return value;
      throw mismatch(stream, field, type, value);
  }
}

/**
 * Shapes a normalized payload into a schema-conformant record.
 *
 * The schema is authoritative: declared fields missing from the payload become
 * null, payload fields outside the schema are dropped, and keys come out in
 * schema order.
 *
 * @throws MalformedRecordError for a non-object payload, an unconvertible value,
 *   or a null primary key
 */
export function conformRecord(definition: StreamDefinition, payload: unknown): TapRecord {
  if (!isJsonObject(payload)) {
    throw new MalformedRecordError(
      `Expected a JSON object in stream '${definition.name}', got ${describe(payload)}`,
      { stream: definition.name },
    );
  }

  const record: TapRecord = {};
  for (const [field, type] of Object.entries(definition.schema)) {
    const value = payload[field];
    record[field] = value === undefined || value === null ? null : coerceValue(value, type, definition.name, field);
  }

  for (const key of definition.primaryKeys) {
    if (record[key] === null || record[key] === undefined) {
      throw new MalformedRecordError(
        `Primary key '${key}' is missing in stream '${definition.name}'`,
        { stream: definition.name, field: key },
      );
    }
  }

  return record;
}
