import type { JsonObject, JsonValue } from './json.js';
import type { ReplicationState } from './state.js';

export interface SchemaMessage {
  type: 'SCHEMA';
  stream: string;
  schema: JsonObject;
  key_properties: string[];
  bookmark_properties?: string[];
}

export interface RecordMessage {
  type: 'RECORD';
  stream: string;
  record: Record<string, JsonValue>;
  time_extracted: string;
}

export interface StateMessage {
  type: 'STATE';
  value: ReplicationState;
}

export type TapMessage = SchemaMessage | RecordMessage | StateMessage;

/**
 * Destination of the message stream. Writes are synchronous from the
 * engine's point of view: a message is considered emitted once write returns.
 */
export interface MessageSink {
  write(message: TapMessage): void;
}
