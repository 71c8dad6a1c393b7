import {
  CatalogError,
  capErrorMessage,
  errorMessage,
  generateRunId,
  getBookmark,
  isFatalError,
  nullLogger,
  UnknownStreamError,
  type Bookmark,
  type Logger,
  type MessageSink,
  type ReplicationState,
} from '@tap-nomad/shared';
import { renderJsonSchema, type RecordSource, type StreamSelection } from '@tap-nomad/stream-registry';
import type { ReplicationValue } from './bookmark.js';
import { assertNever, createStream, type Stream } from './stream.js';

export type RunStatus = 'DONE' | 'CANCELLED';

export type StreamRunStatus = 'succeeded' | 'failed' | 'skipped';

export interface StreamRunError {
  type: string;
  message: string;
}

export interface StreamRunResult {
  stream: string;
  status: StreamRunStatus;
  recordsEmitted: number;
  batchesCommitted: number;
  /** Last committed bookmark; for a failed stream, the point the next run resumes from */
  bookmark?: Bookmark;
  error?: StreamRunError;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  /** Final state, also emitted as the last STATE message */
  state: ReplicationState;
  streams: StreamRunResult[];
}

export interface SyncOrchestratorOptions {
  source: RecordSource;
  sink: MessageSink;
  logger?: Logger;
  now?: () => Date;
  /** Cancellation is checked between streams; a running stream finishes its pass */
  signal?: AbortSignal;
  /** Inclusive start values for incremental streams without a bookmark, by stream name */
  startValues?: Readonly<Record<string, ReplicationValue>>;
  runId?: string;
}

/**
 * Runs the selected streams one at a time, in discovery order.
 *
 * Run lifecycle: preflight (validate every selected stream's bookmark) →
 * one pass per stream → final STATE. A stream failure is recorded and the run
 * moves on; only preflight errors abort the run.
 */
export class SyncOrchestrator {
  private readonly source: RecordSource;
  private readonly sink: MessageSink;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly signal?: AbortSignal;
  private readonly startValues: Readonly<Record<string, ReplicationValue>>;
  private readonly runId: string;

  constructor(options: SyncOrchestratorOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.now = options.now ?? (() => new Date());
    this.signal = options.signal;
    this.startValues = options.startValues ?? {};
    this.runId = options.runId ?? generateRunId();
    this.logger = (options.logger ?? nullLogger).child({ runId: this.runId, component: 'orchestrator' });
  }

  /**
   * @throws CatalogError when nothing is selected
   * @throws StateCorruptionError when a selected stream's bookmark is unusable
   */
  async run(selection: StreamSelection, initialState: ReplicationState): Promise<RunSummary> {
    const startedAt = this.now().toISOString();

    if (selection.streams.length === 0 && selection.unknown.length === 0) {
      throw new CatalogError('No streams selected');
    }

    const streams = selection.streams.map((definition) =>
      createStream(definition, {
        source: this.source,
        logger: this.logger,
        now: this.now,
        startValue: this.startValues[definition.name],
      }),
    );
    for (const stream of streams) {
      stream.resumePoint(initialState);
    }

    this.logger.info('Sync started', {
      streams: streams.map((stream) => stream.name),
      unknown: selection.unknown,
    });

    const results: StreamRunResult[] = [];
    let state = initialState;
    let status: RunStatus = 'DONE';

    for (const stream of streams) {
      if (this.signal?.aborted) {
        status = 'CANCELLED';
        results.push(this.skipped(stream.name, state));
        continue;
      }
      const outcome = await this.runStream(stream, state);
      state = outcome.state;
      results.push(outcome.result);
    }

    for (const name of selection.unknown) {
      const error = new UnknownStreamError(name);
      this.logger.warn('Selected stream is not known to this tap', { stream: name });
      results.push({
        stream: name,
        status: 'failed',
        recordsEmitted: 0,
        batchesCommitted: 0,
        error: { type: error.name, message: error.message },
      });
    }

    this.sink.write({ type: 'STATE', value: state });

    const summary: RunSummary = {
      runId: this.runId,
      status,
      startedAt,
      finishedAt: this.now().toISOString(),
      state,
      streams: results,
    };

    this.logger.info(status === 'CANCELLED' ? 'Sync cancelled' : 'Sync finished', {
      succeeded: results.filter((r) => r.status === 'succeeded').length,
      failed: results.filter((r) => r.status === 'failed').length,
      skipped: results.filter((r) => r.status === 'skipped').length,
    });

    return summary;
  }

  private async runStream(
    stream: Stream,
    state: ReplicationState,
  ): Promise<{ state: ReplicationState; result: StreamRunResult }> {
    const log = this.logger.child({ stream: stream.name });
    const { definition } = stream;
    let committed = state;
    let recordsEmitted = 0;
    let batchesCommitted = 0;

    this.sink.write({
      type: 'SCHEMA',
      stream: definition.name,
      schema: renderJsonSchema(definition.schema, definition.primaryKeys),
      key_properties: [...definition.primaryKeys],
      ...(definition.replicationKey !== undefined ? { bookmark_properties: [definition.replicationKey] } : {}),
    });

    log.info(this.describeStart(stream, state));

    try {
      const finalState = await stream.sync(
        state,
        (record, timeExtracted) => {
          this.sink.write({ type: 'RECORD', stream: stream.name, record, time_extracted: timeExtracted });
          recordsEmitted++;
        },
        (next) => {
          committed = next;
          this.sink.write({ type: 'STATE', value: next });
          batchesCommitted++;
        },
      );

      const bookmark = getBookmark(finalState, stream.name);
      log.info('Stream completed', { records: recordsEmitted, batches: batchesCommitted, bookmark });
      return {
        state: finalState,
        result: this.result(stream.name, 'succeeded', recordsEmitted, batchesCommitted, bookmark),
      };
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }

      const bookmark = getBookmark(committed, stream.name);
      log.error('Stream failed', error, { records: recordsEmitted, batches: batchesCommitted, bookmark });
      const result = this.result(stream.name, 'failed', recordsEmitted, batchesCommitted, bookmark);
      result.error = {
        type: error instanceof Error ? error.name : 'Error',
        message: capErrorMessage(errorMessage(error)),
      };
      return { state: committed, result };
    }
  }

  private describeStart(stream: Stream, state: ReplicationState): string {
    switch (stream.kind) {
      case 'FULL_TABLE': {
        const point = stream.resumePoint(state);
        return point.nextToken !== undefined
          ? `Resuming full-table pass at page token ${point.nextToken}`
          : 'Starting full-table pass';
      }
      case 'INCREMENTAL': {
        const point = stream.resumePoint(state);
        const floor = point.floor
          ? `${stream.replicationKey} ${point.floor.inclusive ? '>=' : '>'} ${point.floor.value}`
          : `all values of ${stream.replicationKey}`;
        return point.nextToken !== undefined
          ? `Resuming incremental pass at page token ${point.nextToken} (${floor})`
          : `Starting incremental pass (${floor})`;
      }
      default:
        return assertNever(stream);
    }
  }

  private skipped(name: string, state: ReplicationState): StreamRunResult {
    this.logger.info('Stream skipped after cancellation', { stream: name });
    return this.result(name, 'skipped', 0, 0, getBookmark(state, name));
  }

  private result(
    stream: string,
    status: StreamRunStatus,
    recordsEmitted: number,
    batchesCommitted: number,
    bookmark: Bookmark | undefined,
  ): StreamRunResult {
    const result: StreamRunResult = { stream, status, recordsEmitted, batchesCommitted };
    if (bookmark !== undefined) result.bookmark = bookmark;
    return result;
  }
}
