import { type RuntimeResource } from '../lifecycle';
import { type JsonValue } from '../utils/json';

/**
 * Durable key → JSON record storage. Sessions are kept under their session id,
 * execution records under their execution id. The format is opaque to callers
 * but must round-trip losslessly.
 */
export interface RecordStore extends RuntimeResource {
  get(key: string): Promise<JsonValue | null>;
  put(key: string, record: JsonValue): Promise<void>;
  delete(key: string): Promise<void>;
  /** Snapshot of the keys present when the call started. */
  list(): Promise<string[]>;
}
