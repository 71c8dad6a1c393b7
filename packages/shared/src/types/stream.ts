/**
 * Field types a stream schema can declare. `datetime` values are emitted as
 * ISO 8601 strings.
 */
export type FieldType = 'string' | 'integer' | 'number' | 'boolean' | 'datetime' | 'object' | 'array';

/** Ordered mapping of field name to type (insertion order is the output order) */
export type StreamSchema = Readonly<Record<string, FieldType>>;

export type ReplicationMethod = 'FULL_TABLE' | 'INCREMENTAL';

interface StreamDefinitionBase {
  /** Unique stream name (e.g., 'jobs') */
  readonly name: string;
  readonly schema: StreamSchema;
  /** Non-empty, every entry present in `schema` */
  readonly primaryKeys: readonly string[];
  /** API path, e.g. '/v1/jobs' */
  readonly path: string;
  /** Fixed query parameters sent with every request for this stream */
  readonly params?: Readonly<Record<string, string>>;
}

export interface FullTableStreamDefinition extends StreamDefinitionBase {
  readonly replicationMethod: 'FULL_TABLE';
  readonly replicationKey?: undefined;
}

export interface IncrementalStreamDefinition extends StreamDefinitionBase {
  readonly replicationMethod: 'INCREMENTAL';
  /** Field whose maximum value is bookmarked between runs */
  readonly replicationKey: string;
}

export type StreamDefinition = FullTableStreamDefinition | IncrementalStreamDefinition;
