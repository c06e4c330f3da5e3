import type { JsonObject, JsonValue } from '../protocol/json';

/**
 * Frames and deframes one protocol message at a time over the adapter's
 * output stream.
 */
export interface MessageTransport {
  /**
   * Resolves true once a message can be read without blocking, or once the
   * stream has ended (so that {@link readMessage} can report it). Resolves
   * false when `timeoutMs` elapses first.
   */
  messageExists(timeoutMs: number): Promise<boolean>;

  /**
   * Returns the next parsed message.
   * @throws EndOfStreamError when the stream ended and nothing is buffered.
   */
  readMessage(): JsonValue;

  /** Serializes `object` with its framing header. */
  createMessage(object: JsonObject): Buffer;
}
