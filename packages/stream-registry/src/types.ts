import type { JsonObject, ReplicationMethod, StreamDefinition } from '@tap-nomad/shared';

/**
 * One stream in a catalog, as the engine sees it.
 *
 * Built at discovery time with `selected: false`; user catalog input may flip
 * `selected` and narrow fields before a run starts. Never mutated during a run.
 */
export interface CatalogEntry {
  tapStreamId: string;
  stream: string;
  /** JSON Schema rendering of the stream schema */
  schema: JsonObject;
  keyProperties: string[];
  replicationMethod: ReplicationMethod;
  replicationKey?: string;
  selected: boolean;
  /** Per-field inclusion overrides; absent fields are included */
  fieldSelections: Record<string, boolean>;
}

export interface Catalog {
  streams: CatalogEntry[];
}

/** Singer metadata entry; the empty breadcrumb addresses the stream itself */
export interface CatalogMetadataEntry {
  breadcrumb: string[];
  metadata: Record<string, unknown>;
}

/** Wire shape of a catalog entry, as written by discovery and read from --catalog */
export interface CatalogDocumentEntry {
  tap_stream_id: string;
  stream: string;
  schema: JsonObject;
  key_properties: string[];
  replication_method: ReplicationMethod;
  replication_key?: string;
  selected?: boolean;
  metadata: CatalogMetadataEntry[];
}

export interface CatalogDocument {
  streams: CatalogDocumentEntry[];
}

/** Outcome of matching a user catalog against the registry */
export interface StreamSelection {
  /** Selected streams in discovery order, field selections applied */
  streams: StreamDefinition[];
  /** Selected catalog entries the registry does not know */
  unknown: string[];
}

/** One page of raw items as returned by the source API */
export interface SourcePage {
  items: unknown[];
  /** Continuation token for the following page; absent on the last page */
  nextToken?: string;
  /**
   * Source-wide change index the page was served at. Every replication-key
   * value written before the page was read is at or below it.
   */
  index?: number;
}

/**
 * Core abstraction for the system the tap reads from.
 *
 * The engine is source-agnostic and reaches the API only through this
 * contract: paging over a stream's endpoint and reshaping raw items into the
 * stream's field naming.
 */
export interface RecordSource {
  /** Source identifier (e.g., 'nomad') */
  readonly sourceId: string;

  /**
   * Lazily pages through a stream's collection. Each call starts a fresh,
   * finite sequence; `startToken` resumes at a page boundary.
   */
  pages(definition: StreamDefinition, startToken?: string): AsyncIterable<SourcePage>;

  /** Maps a raw item's keys/values onto the schema's naming; non-objects pass through unchanged */
  normalize(item: unknown): unknown;
}
