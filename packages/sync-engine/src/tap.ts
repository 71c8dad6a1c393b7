import {
  CatalogError,
  nullLogger,
  parseReplicationState,
  type Logger,
  type MessageSink,
} from '@tap-nomad/shared';
import {
  discoverCatalog,
  selectStreams,
  type Catalog,
  type RecordSource,
  type SchemaRegistry,
} from '@tap-nomad/stream-registry';
import type { ReplicationValue } from './bookmark.js';
import { SyncOrchestrator, type RunSummary } from './orchestrator.js';

export interface TapOptions {
  registry: SchemaRegistry;
  source: RecordSource;
  sink: MessageSink;
  logger?: Logger;
  now?: () => Date;
  startValues?: Readonly<Record<string, ReplicationValue>>;
}

export interface TapSyncOptions {
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Entry point for both tap modes: discovery, and sync against a user catalog
 * and persisted state.
 */
export class Tap {
  private readonly options: TapOptions;
  private readonly logger: Logger;

  constructor(options: TapOptions) {
    this.options = options;
    this.logger = options.logger ?? nullLogger;
  }

  discover(): Catalog {
    const catalog = discoverCatalog(this.options.registry);
    this.logger.info('Discovered streams', { count: catalog.streams.length });
    return catalog;
  }

  /**
   * @param stateInput parsed state document; null/undefined for a first run
   * @throws CatalogError when the catalog is empty or selects nothing
   * @throws StateCorruptionError when the state cannot be resumed from
   */
  async sync(catalog: Catalog, stateInput: unknown, options: TapSyncOptions = {}): Promise<RunSummary> {
    const state = parseReplicationState(stateInput);

    if (catalog.streams.length === 0) {
      throw new CatalogError('Catalog is empty');
    }
    const selection = selectStreams(this.options.registry, catalog);

    const orchestrator = new SyncOrchestrator({
      source: this.options.source,
      sink: this.options.sink,
      logger: this.logger,
      now: this.options.now,
      startValues: this.options.startValues,
      signal: options.signal,
      runId: options.runId,
    });
    return orchestrator.run(selection, state);
  }
}
