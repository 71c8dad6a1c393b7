import { UnknownStreamError, type FieldType, type StreamDefinition } from '@tap-nomad/shared';

const REPLICATION_KEY_TYPES: ReadonlySet<FieldType> = new Set(['integer', 'number', 'datetime', 'string']);

/**
 * Checks the structural rules every stream definition must satisfy.
 * Throws a plain Error: a broken definition is a programming error, not a run failure.
 */
export function validateStreamDefinition(definition: StreamDefinition): void {
  const { name, schema, primaryKeys } = definition;

  if (!name) {
    throw new Error('Stream definition must have a name');
  }
  if (primaryKeys.length === 0) {
    throw new Error(`Stream '${name}' must declare at least one primary key`);
  }
  for (const key of primaryKeys) {
    if (!(key in schema)) {
      throw new Error(`Stream '${name}' primary key '${key}' is not in its schema`);
    }
  }
  if (new Set(primaryKeys).size !== primaryKeys.length) {
    throw new Error(`Stream '${name}' declares a primary key twice`);
  }

  if (definition.replicationMethod === 'INCREMENTAL') {
    const keyType = schema[definition.replicationKey];
    if (keyType === undefined) {
      throw new Error(`Stream '${name}' replication key '${definition.replicationKey}' is not in its schema`);
    }
    if (!REPLICATION_KEY_TYPES.has(keyType)) {
      throw new Error(`Stream '${name}' replication key '${definition.replicationKey}' has unorderable type '${keyType}'`);
    }
  } else if (definition.replicationKey !== undefined) {
    throw new Error(`Stream '${name}' is FULL_TABLE and cannot declare a replication key`);
  }
}

/**
 * Static mapping from stream name to its definition.
 *
 * Populated once at process start and then frozen; registration order is the
 * discovery order, which in turn fixes the order streams run in.
 */
export class SchemaRegistry {
  private definitions = new Map<string, StreamDefinition>();
  private frozen = false;

  register(definition: StreamDefinition): this {
    if (this.frozen) {
      throw new Error(`Schema registry is frozen; cannot register '${definition.name}'`);
    }
    if (this.definitions.has(definition.name)) {
      throw new Error(`Stream already registered: ${definition.name}`);
    }
    validateStreamDefinition(definition);
    this.definitions.set(definition.name, definition);
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get(streamName: string): StreamDefinition {
    const definition = this.definitions.get(streamName);
    if (!definition) {
      throw new UnknownStreamError(streamName, this.getStreamNames());
    }
    return definition;
  }

  has(streamName: string): boolean {
    return this.definitions.has(streamName);
  }

  getAll(): StreamDefinition[] {
    return Array.from(this.definitions.values());
  }

  getStreamNames(): string[] {
    return Array.from(this.definitions.keys());
  }
}
