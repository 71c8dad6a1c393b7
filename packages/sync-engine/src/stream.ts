import {
  getBookmark,
  LAST_COMPLETED_KEY,
  MalformedRecordError,
  NEXT_TOKEN_KEY,
  nullLogger,
  PROGRESS_MAX_KEY,
  SNAPSHOT_INDEX_KEY,
  withBookmark,
  type Bookmark,
  type BookmarkValue,
  type FieldType,
  type FullTableStreamDefinition,
  type IncrementalStreamDefinition,
  type Logger,
  type ReplicationState,
  type StreamDefinition,
} from '@tap-nomad/shared';
import type { RecordSource, SourcePage } from '@tap-nomad/stream-registry';
import {
  compareReplicationValues,
  maxReplicationValue,
  readBookmarkToken,
  readBookmarkValue,
  type ReplicationValue,
} from './bookmark.js';
import { conformRecord, type TapRecord } from './transform.js';

export type RecordEmitter = (record: TapRecord, timeExtracted: string) => void;
export type StateEmitter = (state: ReplicationState) => void;

export interface StreamContext {
  source: RecordSource;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Where an incremental run starts. `inclusive` is true only for the configured
 * start value; a committed bookmark has already been emitted.
 */
export interface IncrementalFloor {
  value: ReplicationValue;
  inclusive: boolean;
}

export interface IncrementalResumePoint {
  floor?: IncrementalFloor;
  nextToken?: string;
  progressMax?: ReplicationValue;
  /** Source index at the first page of the interrupted pass */
  snapshotIndex?: number;
}

export interface FullTableResumePoint {
  nextToken?: string;
  lastCompletedAt?: string;
}

abstract class BaseStream<TDefinition extends StreamDefinition> {
  protected readonly source: RecordSource;
  protected readonly logger: Logger;
  protected readonly now: () => Date;

  constructor(
    readonly definition: TDefinition,
    context: StreamContext,
  ) {
    this.source = context.source;
    this.logger = (context.logger ?? nullLogger).child({ stream: definition.name });
    this.now = context.now ?? (() => new Date());
  }

  get name(): string {
    return this.definition.name;
  }

  protected bookmarkOf(state: ReplicationState): Bookmark {
    return getBookmark(state, this.name) ?? {};
  }

  /**
   * Conforms a whole page before any of it is emitted, so a malformed item
   * fails the batch without a partial write.
   */
  protected conformPage(page: SourcePage): TapRecord[] {
    return page.items.map((item) => conformRecord(this.definition, this.source.normalize(item)));
  }
}

/**
 * Re-reads the whole collection on every run. The bookmark only carries the
 * page to resume from after an interruption and when the last pass finished.
 */
export class FullTableStream extends BaseStream<FullTableStreamDefinition> {
  readonly kind = 'FULL_TABLE' as const;

  /** @throws StateCorruptionError */
  resumePoint(state: ReplicationState): FullTableResumePoint {
    const bookmark = this.bookmarkOf(state);
    const point: FullTableResumePoint = {};
    const nextToken = readBookmarkToken(bookmark, NEXT_TOKEN_KEY, this.name);
    if (nextToken !== undefined) point.nextToken = nextToken;
    const lastCompletedAt = bookmark[LAST_COMPLETED_KEY];
    if (typeof lastCompletedAt === 'string') point.lastCompletedAt = lastCompletedAt;
    return point;
  }

  async sync(state: ReplicationState, emitRecord: RecordEmitter, emitState: StateEmitter): Promise<ReplicationState> {
    const start = this.resumePoint(state);
    let current = state;

    for await (const page of this.source.pages(this.definition, start.nextToken)) {
      const timeExtracted = this.now().toISOString();
      const records = this.conformPage(page);
      for (const record of records) {
        emitRecord(record, timeExtracted);
      }

      const bookmark: Record<string, BookmarkValue> = {};
      if (page.nextToken !== undefined) {
        if (start.lastCompletedAt !== undefined) bookmark[LAST_COMPLETED_KEY] = start.lastCompletedAt;
        bookmark[NEXT_TOKEN_KEY] = page.nextToken;
      } else {
        bookmark[LAST_COMPLETED_KEY] = this.now().toISOString();
      }

      current = withBookmark(current, this.name, bookmark);
      emitState(current);
      this.logger.debug('Page committed', { records: records.length, hasMore: page.nextToken !== undefined });
    }

    return current;
  }
}

/**
 * Emits only records past the bookmark and advances the bookmark to the
 * highest replication-key value seen, capped at the source index the pass
 * started at when the source reports one.
 *
 * The committed replication-key value is an exclusive floor and stays fixed
 * until the pass completes. Mid-pass STATE messages add the next page token
 * and the running maximum, so an interrupted pass resumes at the first
 * uncommitted page against the same floor. Records are never assumed to
 * arrive sorted.
 */
export class IncrementalStream extends BaseStream<IncrementalStreamDefinition> {
  readonly kind = 'INCREMENTAL' as const;

  private readonly startValue: ReplicationValue | undefined;

  constructor(definition: IncrementalStreamDefinition, context: StreamContext, startValue?: ReplicationValue) {
    super(definition, context);
    this.startValue = startValue;
  }

  get replicationKey(): string {
    return this.definition.replicationKey;
  }

  get keyType(): FieldType {
    // Registry validation guarantees the key is in the schema
    return this.definition.schema[this.replicationKey] ?? 'string';
  }

  /** @throws StateCorruptionError */
  resumePoint(state: ReplicationState): IncrementalResumePoint {
    const bookmark = this.bookmarkOf(state);
    const point: IncrementalResumePoint = {};

    const committed = readBookmarkValue(bookmark, this.replicationKey, this.keyType, this.name);
    if (committed !== undefined) {
      point.floor = { value: committed, inclusive: false };
    } else if (this.startValue !== undefined) {
      point.floor = { value: this.startValue, inclusive: true };
    }

    const nextToken = readBookmarkToken(bookmark, NEXT_TOKEN_KEY, this.name);
    if (nextToken !== undefined) {
      point.nextToken = nextToken;
      const progressMax = readBookmarkValue(bookmark, PROGRESS_MAX_KEY, this.keyType, this.name);
      if (progressMax !== undefined) point.progressMax = progressMax;
      const snapshotIndex = readBookmarkValue(bookmark, SNAPSHOT_INDEX_KEY, 'integer', this.name);
      if (typeof snapshotIndex === 'number') point.snapshotIndex = snapshotIndex;
    }
    return point;
  }

  isPastFloor(value: ReplicationValue, floor: IncrementalFloor | undefined): boolean {
    if (floor === undefined) return true;
    const order = compareReplicationValues(value, floor.value, this.keyType);
    return floor.inclusive ? order >= 0 : order > 0;
  }

  async sync(state: ReplicationState, emitRecord: RecordEmitter, emitState: StateEmitter): Promise<ReplicationState> {
    const start = this.resumePoint(state);
    const committed = start.floor !== undefined && !start.floor.inclusive ? start.floor.value : undefined;
    let progressMax = start.progressMax;
    let snapshotIndex = start.snapshotIndex;
    let current = state;

    for await (const page of this.source.pages(this.definition, start.nextToken)) {
      snapshotIndex ??= page.index;
      const timeExtracted = this.now().toISOString();
      const records = this.conformPage(page);
      const values = records.map((record) => this.replicationValueOf(record));

      let emitted = 0;
      records.forEach((record, i) => {
        const value = values[i];
        if (value === undefined || !this.isPastFloor(value, start.floor)) return;
        emitRecord(record, timeExtracted);
        progressMax = maxReplicationValue(progressMax, value, this.keyType);
        emitted++;
      });

      const bookmark: Record<string, BookmarkValue> = {};
      if (page.nextToken !== undefined) {
        if (committed !== undefined) bookmark[this.replicationKey] = committed;
        if (progressMax !== undefined) bookmark[PROGRESS_MAX_KEY] = progressMax;
        if (snapshotIndex !== undefined) bookmark[SNAPSHOT_INDEX_KEY] = snapshotIndex;
        bookmark[NEXT_TOKEN_KEY] = page.nextToken;
      } else {
        const high = this.completedMark(committed, progressMax, snapshotIndex);
        if (high !== undefined) bookmark[this.replicationKey] = high;
        bookmark[LAST_COMPLETED_KEY] = this.now().toISOString();
      }

      current = withBookmark(current, this.name, bookmark);
      emitState(current);
      this.logger.debug('Page committed', {
        records: emitted,
        filtered: records.length - emitted,
        hasMore: page.nextToken !== undefined,
      });
    }

    return current;
  }

  /**
   * Highest value seen, capped at the source index of the pass's first page.
   * An item on an already-read page can be rewritten mid-pass with a value
   * below one seen later; the cap leaves it above the next run's floor.
   */
  private completedMark(
    committed: ReplicationValue | undefined,
    progressMax: ReplicationValue | undefined,
    snapshotIndex: number | undefined,
  ): ReplicationValue | undefined {
    let seen = progressMax;
    if (
      seen !== undefined &&
      snapshotIndex !== undefined &&
      (this.keyType === 'integer' || this.keyType === 'number') &&
      compareReplicationValues(seen, snapshotIndex, this.keyType) > 0
    ) {
      seen = snapshotIndex;
    }
    return seen === undefined ? committed : maxReplicationValue(committed, seen, this.keyType);
  }

  private replicationValueOf(record: TapRecord): ReplicationValue {
    const value = record[this.replicationKey];
    if (typeof value === 'number' || typeof value === 'string') {
      return value;
    }
    throw new MalformedRecordError(
      `Replication key '${this.replicationKey}' is missing in stream '${this.name}'`,
      { stream: this.name, field: this.replicationKey },
    );
  }
}

/** Closed set of extraction strategies */
export type Stream = FullTableStream | IncrementalStream;

export interface CreateStreamOptions extends StreamContext {
  /** Inclusive floor for incremental streams that have no bookmark yet */
  startValue?: ReplicationValue;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function createStream(definition: StreamDefinition, options: CreateStreamOptions): Stream {
  switch (definition.replicationMethod) {
    case 'FULL_TABLE':
      return new FullTableStream(definition, options);
    case 'INCREMENTAL':
      return new IncrementalStream(definition, options, options.startValue);
    default:
      return assertNever(definition);
  }
}
