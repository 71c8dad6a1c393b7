import type { StreamDefinition } from '@tap-nomad/shared';
import { SchemaRegistry, type RecordSource, type SourcePage } from '@tap-nomad/stream-registry';

export const NOW = '2024-06-01T00:00:00.000Z';
export const fixedClock = (): Date => new Date(NOW);

export const WIDGETS: StreamDefinition = {
  name: 'widgets',
  path: '/widgets',
  primaryKeys: ['id'],
  replicationMethod: 'INCREMENTAL',
  replicationKey: 'modify_index',
  schema: { id: 'string', name: 'string', modify_index: 'integer' },
};

export const GADGETS: StreamDefinition = {
  name: 'gadgets',
  path: '/gadgets',
  primaryKeys: ['id'],
  replicationMethod: 'FULL_TABLE',
  schema: { id: 'string', status: 'string' },
};

export function widget(id: string, modifyIndex: number): Record<string, unknown> {
  return { id, name: `widget ${id}`, modify_index: modifyIndex };
}

export function gadget(id: string, status = 'ready'): Record<string, unknown> {
  return { id, status };
}

export function createTestRegistry(): SchemaRegistry {
  return new SchemaRegistry().register(WIDGETS).register(GADGETS).freeze();
}

/**
 * Serves fixed pages per stream. Page tokens are `page-<n>`; a scripted
 * failure throws when page `afterPages` would be served. `withIndexes` sets
 * the source index reported on each page.
 */
export class MemorySource implements RecordSource {
  readonly sourceId = 'memory';
  readonly requests: Array<{ stream: string; startToken: string | undefined }> = [];

  private failures = new Map<string, { afterPages: number; error: Error }>();
  private indexes = new Map<string, number[]>();

  constructor(private readonly pagesByStream: Record<string, unknown[][]>) {}

  failAfter(stream: string, afterPages: number, error: Error): this {
    this.failures.set(stream, { afterPages, error });
    return this;
  }

  withIndexes(stream: string, indexes: number[]): this {
    this.indexes.set(stream, indexes);
    return this;
  }

  async *pages(definition: StreamDefinition, startToken?: string): AsyncGenerator<SourcePage> {
    this.requests.push({ stream: definition.name, startToken });
    const pages = this.pagesByStream[definition.name] ?? [[]];
    const failure = this.failures.get(definition.name);

    for (let index = startToken === undefined ? 0 : Number(startToken.slice('page-'.length)); index < pages.length; index++) {
      if (failure && index >= failure.afterPages) {
        throw failure.error;
      }
      const page: SourcePage = { items: pages[index] ?? [] };
      if (index + 1 < pages.length) page.nextToken = `page-${index + 1}`;
      const sourceIndex = this.indexes.get(definition.name)?.[index];
      if (sourceIndex !== undefined) page.index = sourceIndex;
      yield page;
    }
  }

  normalize(item: unknown): unknown {
    return item;
  }
}
