export type BookmarkValue = string | number | boolean;

/**
 * Progress marker for one stream. Keys written by the engine:
 * - the stream's replication key: committed high-water mark
 * - `next_token`: resume token of the first uncommitted page (mid-run only)
 * - `progress_max`: highest replication-key value on committed pages (mid-run only)
 * - `snapshot_index`: source index when the pass began; caps the completed mark (mid-run only)
 * - `last_completed_at`: ISO time the last full pass over the stream finished
 */
export type Bookmark = Readonly<Record<string, BookmarkValue>>;

export interface ReplicationState {
  readonly bookmarks: Readonly<Record<string, Bookmark>>;
}

export const NEXT_TOKEN_KEY = 'next_token';
export const PROGRESS_MAX_KEY = 'progress_max';
export const SNAPSHOT_INDEX_KEY = 'snapshot_index';
export const LAST_COMPLETED_KEY = 'last_completed_at';

export function emptyState(): ReplicationState {
  return { bookmarks: {} };
}

export function getBookmark(state: ReplicationState, stream: string): Bookmark | undefined {
  return state.bookmarks[stream];
}

/** Returns a new state with the stream's bookmark replaced; the input is untouched */
export function withBookmark(state: ReplicationState, stream: string, bookmark: Bookmark): ReplicationState {
  return { bookmarks: { ...state.bookmarks, [stream]: bookmark } };
}
