import { z } from 'zod';
import {
  CatalogError,
  isJsonObject,
  type FieldType,
  type JsonObject,
  type StreamDefinition,
  type StreamSchema,
} from '@tap-nomad/shared';
import type { SchemaRegistry } from './registry.js';
import type {
  Catalog,
  CatalogDocument,
  CatalogDocumentEntry,
  CatalogEntry,
  CatalogMetadataEntry,
  StreamSelection,
} from './types.js';

function renderFieldType(type: FieldType, nullable: boolean): JsonObject {
  const jsonType = type === 'datetime' ? 'string' : type;
  const schema: JsonObject = { type: nullable ? ['null', jsonType] : jsonType };
  if (type === 'datetime') {
    schema.format = 'date-time';
  }
  return schema;
}

/**
 * Renders a stream schema as JSON Schema. Primary keys are non-nullable; every
 * other field may be null because the source can omit it.
 */
export function renderJsonSchema(schema: StreamSchema, primaryKeys: readonly string[]): JsonObject {
  const properties: JsonObject = {};
  for (const [field, type] of Object.entries(schema)) {
    properties[field] = renderFieldType(type, !primaryKeys.includes(field));
  }
  return {
    type: 'object',
    additionalProperties: false,
    properties,
    required: [...primaryKeys],
  };
}

/** Fields that are always emitted regardless of field selection */
export function automaticFields(definition: StreamDefinition): string[] {
  const fields = [...definition.primaryKeys];
  if (definition.replicationKey !== undefined && !fields.includes(definition.replicationKey)) {
    fields.push(definition.replicationKey);
  }
  return fields;
}

function toCatalogEntry(definition: StreamDefinition): CatalogEntry {
  const entry: CatalogEntry = {
    tapStreamId: definition.name,
    stream: definition.name,
    schema: renderJsonSchema(definition.schema, definition.primaryKeys),
    keyProperties: [...definition.primaryKeys],
    replicationMethod: definition.replicationMethod,
    selected: false,
    fieldSelections: {},
  };
  if (definition.replicationKey !== undefined) {
    entry.replicationKey = definition.replicationKey;
  }
  return entry;
}

/**
 * Builds the full catalog from the registry, in registration order.
 */
export function discoverCatalog(registry: SchemaRegistry): Catalog {
  return { streams: registry.getAll().map(toCatalogEntry) };
}

function buildMetadata(entry: CatalogEntry, definition: StreamDefinition | undefined): CatalogMetadataEntry[] {
  const automatic = new Set(definition ? automaticFields(definition) : entry.keyProperties);
  const root: Record<string, unknown> = {
    selected: entry.selected,
    inclusion: 'available',
    'table-key-properties': entry.keyProperties,
    'forced-replication-method': entry.replicationMethod,
  };
  if (entry.replicationKey !== undefined) {
    root['valid-replication-keys'] = [entry.replicationKey];
  }

  const fields = isJsonObject(entry.schema.properties) ? Object.keys(entry.schema.properties) : [];
  return [
    { breadcrumb: [], metadata: root },
    ...fields.map((field) => {
      const metadata: Record<string, unknown> = { inclusion: automatic.has(field) ? 'automatic' : 'available' };
      const override = entry.fieldSelections[field];
      if (override !== undefined) {
        metadata.selected = override;
      }
      return { breadcrumb: ['properties', field], metadata };
    }),
  ];
}

/**
 * Renders a catalog in the Singer document shape (with metadata breadcrumbs)
 * so it can be edited by hand or by orchestration tools and fed back in.
 */
export function renderCatalog(catalog: Catalog, registry?: SchemaRegistry): CatalogDocument {
  return {
    streams: catalog.streams.map((entry): CatalogDocumentEntry => {
      const definition = registry?.has(entry.stream) ? registry.get(entry.stream) : undefined;
      const document: CatalogDocumentEntry = {
        tap_stream_id: entry.tapStreamId,
        stream: entry.stream,
        schema: entry.schema,
        key_properties: entry.keyProperties,
        replication_method: entry.replicationMethod,
        metadata: buildMetadata(entry, definition),
      };
      if (entry.replicationKey !== undefined) {
        document.replication_key = entry.replicationKey;
      }
      return document;
    }),
  };
}

const metadataEntrySchema = z.object({
  breadcrumb: z.array(z.string()),
  metadata: z.record(z.unknown()),
});

const catalogEntryInputSchema = z
  .object({
    tap_stream_id: z.string().min(1).optional(),
    stream: z.string().min(1).optional(),
    schema: z.record(z.unknown()).optional(),
    key_properties: z.array(z.string()).optional(),
    replication_method: z.enum(['FULL_TABLE', 'INCREMENTAL']).optional(),
    replication_key: z.string().optional(),
    selected: z.boolean().optional(),
    metadata: z.array(metadataEntrySchema).optional(),
  })
  .refine((entry) => entry.tap_stream_id !== undefined || entry.stream !== undefined, {
    message: 'catalog entry needs tap_stream_id or stream',
  });

const catalogInputSchema = z.object({
  streams: z.array(catalogEntryInputSchema),
});

type CatalogEntryInput = z.infer<typeof catalogEntryInputSchema>;

function readSelection(entry: CatalogEntryInput): { selected: boolean; fieldSelections: Record<string, boolean> } {
  let selected = entry.selected ?? false;
  const fieldSelections: Record<string, boolean> = {};

  for (const item of entry.metadata ?? []) {
    const flag = item.metadata.selected;
    if (typeof flag !== 'boolean') continue;

    if (item.breadcrumb.length === 0) {
      // Breadcrumb metadata wins over the legacy top-level flag
      selected = flag;
    } else if (item.breadcrumb.length === 2 && item.breadcrumb[0] === 'properties') {
      const field = item.breadcrumb[1];
      if (field !== undefined) fieldSelections[field] = flag;
    }
  }

  return { selected, fieldSelections };
}

/**
 * Validates a user-supplied catalog document. Accepts both the discovery output
 * shape and minimal `{ streams: [{ stream, selected }] }` documents.
 *
 * @throws CatalogError when the document cannot be interpreted
 */
export function parseCatalog(input: unknown): Catalog {
  const result = catalogInputSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new CatalogError(`Catalog is malformed${where}: ${issue?.message ?? 'invalid'}`);
  }

  const seen = new Set<string>();
  const streams = result.data.streams.map((entry): CatalogEntry => {
    const name = entry.tap_stream_id ?? entry.stream ?? '';
    if (seen.has(name)) {
      throw new CatalogError(`Catalog lists stream '${name}' more than once`, { stream: name });
    }
    seen.add(name);

    const { selected, fieldSelections } = readSelection(entry);
    const parsed: CatalogEntry = {
      tapStreamId: name,
      stream: entry.stream ?? name,
      schema: {},
      keyProperties: entry.key_properties ?? [],
      replicationMethod: entry.replication_method ?? 'FULL_TABLE',
      selected,
      fieldSelections,
    };
    if (entry.replication_key !== undefined) {
      parsed.replicationKey = entry.replication_key;
    }
    return parsed;
  });

  return { streams };
}

/** Parses the raw text of a catalog file */
export function parseCatalogText(text: string): Catalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new CatalogError(`Catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseCatalog(parsed);
}

/**
 * Narrows a definition's schema to the selected fields. Primary keys and the
 * replication key are kept even when deselected.
 */
export function applyFieldSelections(
  definition: StreamDefinition,
  fieldSelections: Record<string, boolean>,
): StreamDefinition {
  const automatic = new Set(automaticFields(definition));
  const schema: Record<string, FieldType> = {};
  let narrowed = false;

  for (const [field, type] of Object.entries(definition.schema)) {
    if (fieldSelections[field] === false && !automatic.has(field)) {
      narrowed = true;
      continue;
    }
    schema[field] = type;
  }

  return narrowed ? { ...definition, schema } : definition;
}

/**
 * Catalog Filter: the registry's streams that the user catalog marks selected.
 *
 * Output order is discovery (registration) order regardless of the order of
 * the user catalog, so runs are reproducible. Entries that are absent or have
 * `selected: false` are excluded.
 */
export function selectStreams(registry: SchemaRegistry, userCatalog: Catalog): StreamSelection {
  const byName = new Map(userCatalog.streams.map((entry) => [entry.tapStreamId, entry]));

  const streams: StreamDefinition[] = [];
  for (const definition of registry.getAll()) {
    const entry = byName.get(definition.name);
    if (!entry?.selected) continue;
    streams.push(applyFieldSelections(definition, entry.fieldSelections));
  }

  const unknown = userCatalog.streams
    .filter((entry) => entry.selected && !registry.has(entry.tapStreamId))
    .map((entry) => entry.tapStreamId);

  return { streams, unknown };
}

/** A catalog with every discovered stream selected */
export function selectAll(catalog: Catalog): Catalog {
  return { streams: catalog.streams.map((entry) => ({ ...entry, selected: true })) };
}

/** A catalog selecting exactly the named streams (unknown names are kept so they can be reported) */
export function selectByName(catalog: Catalog, names: readonly string[]): Catalog {
  const wanted = new Set(names);
  const streams = catalog.streams.map((entry) => ({ ...entry, selected: wanted.has(entry.tapStreamId) }));
  for (const name of wanted) {
    if (!streams.some((entry) => entry.tapStreamId === name)) {
      streams.push({
        tapStreamId: name,
        stream: name,
        schema: {},
        keyProperties: [],
        replicationMethod: 'FULL_TABLE',
        selected: true,
        fieldSelections: {},
      });
    }
  }
  return { streams };
}
