/**
 * @cqlgen/runtime
 * Support code imported by generated DAO modules
 */

export { BoundedChannel, ChannelClosedError } from './bounded-channel.js';
export { withSession, toError } from './session.js';
export type { SessionProvider, Closable } from './session.js';
export {
  encodeElement,
  decodeElement,
  toTimestamp,
  ElementSerializationError,
} from './serialization.js';

/**
 * Record emitted by a generated `stream()` method: either a row or a
 * terminal error entry.
 */
export interface StreamRecord<T> {
  dto: T | null;
  err: Error | null;
}
