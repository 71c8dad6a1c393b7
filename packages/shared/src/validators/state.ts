import { z } from 'zod';
import { StateCorruptionError } from '../errors.js';
import { isJsonObject } from '../types/json.js';
import { emptyState, type ReplicationState } from '../types/state.js';

const bookmarkSchema = z.record(z.union([z.string(), z.number().finite(), z.boolean()]));

export const replicationStateSchema = z.object({
  bookmarks: z.record(bookmarkSchema).default({}),
});

/**
 * Validates a persisted state document.
 *
 * `null`/`undefined` and `{}` mean "first run". Anything else that does not
 * match `{ bookmarks: { <stream>: { <key>: string | number | boolean } } }` is
 * unrecoverable: there is no safe point to resume from.
 */
export function parseReplicationState(input: unknown): ReplicationState {
  if (input === undefined || input === null) {
    return emptyState();
  }
  if (!isJsonObject(input)) {
    throw new StateCorruptionError('State document must be a JSON object');
  }

  const result = replicationStateSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new StateCorruptionError(`State document is malformed${where}: ${issue?.message ?? 'invalid'}`, {
      issues: result.error.errors.length,
    });
  }

  return { bookmarks: result.data.bookmarks };
}

/** Parses the raw text of a state file; empty text is a first run */
export function parseReplicationStateText(text: string): ReplicationState {
  if (text.trim() === '') {
    return emptyState();
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StateCorruptionError(`State document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseReplicationState(parsed);
}
