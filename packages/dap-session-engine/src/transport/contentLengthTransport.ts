import type { Readable } from 'stream';
import { ContractViolationError, EndOfStreamError, SessionError } from '../errors';
import { LoggerInterface, childLogger } from '../logging';
import { JsonObject, JsonValue, toJsonValue } from '../protocol/json';
import type { MessageTransport } from './messageTransport';

const TWO_CRLF = '\r\n\r\n';
const CONTENT_LENGTH = 'Content-Length';

type Frame =
  | { kind: 'message'; value: JsonValue }
  | { kind: 'error'; error: Error };

/**
 * Deframes `Content-Length: N\r\n\r\n<body>` messages from a readable stream.
 * Chunks are buffered as they arrive; complete messages are parsed eagerly and
 * queued until {@link readMessage} takes them.
 */
export class ContentLengthTransport implements MessageTransport {
  public static readonly MAX_CONTENT_LENGTH = 50 * 1024 * 1024; // 50 MB

  private readonly logger: LoggerInterface;
  private buffer: Buffer = Buffer.alloc(0);
  private readonly frames: Frame[] = [];
  private readonly waiters = new Set<() => void>();
  private ended = false;
  private failure: Error | undefined;

  constructor(
    readable: Readable,
    logger: LoggerInterface,
    private readonly maxContentLength: number = ContentLengthTransport.MAX_CONTENT_LENGTH,
  ) {
    this.logger = childLogger(logger, { component: 'ContentLengthTransport' });

    readable.on('data', (data: Buffer | string) => {
      this.handleData(typeof data === 'string' ? Buffer.from(data, 'utf8') : data);
    });
    readable.on('end', () => this.handleEnd('Readable stream ended'));
    readable.on('close', () => this.handleEnd('Readable stream closed'));
    readable.on('error', (error: Error) => {
      this.logger.error({ err: error }, 'Readable stream error.');
      this.fail(
        new EndOfStreamError(`Adapter output stream failed: ${error.message}`, {
          cause: error,
        }),
      );
    });
  }

  public messageExists(timeoutMs: number): Promise<boolean> {
    if (this.readable()) return Promise.resolve(true);

    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(this.readable());
      }, timeoutMs);
      this.waiters.add(wake);
    });
  }

  public readMessage(): JsonValue {
    const frame = this.frames.shift();
    if (frame) {
      if (frame.kind === 'error') throw frame.error;
      return frame.value;
    }
    if (this.failure) throw this.failure;
    if (this.ended) throw new EndOfStreamError();
    throw new ContractViolationError(
      'readMessage called with no message available',
    );
  }

  public createMessage(object: JsonObject): Buffer {
    const body = Buffer.from(JSON.stringify(object), 'utf8');
    const header = Buffer.from(
      `${CONTENT_LENGTH}: ${body.length}${TWO_CRLF}`,
      'ascii',
    );
    return Buffer.concat([header, body]);
  }

  /** Number of parsed messages not yet read. */
  public get bufferedMessageCount(): number {
    return this.frames.length;
  }

  private readable(): boolean {
    return this.frames.length > 0 || this.ended || this.failure !== undefined;
  }

  private wakeAll(): void {
    for (const wake of [...this.waiters]) wake();
  }

  private handleEnd(reason: string): void {
    if (this.ended) return;
    this.logger.info(reason);
    this.ended = true;
    this.wakeAll();
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.wakeAll();
  }

  private handleData(data: Buffer): void {
    if (this.failure) return;
    this.buffer = Buffer.concat([this.buffer, data]);
    this.logger.trace(
      `Received data chunk, new buffer length: ${this.buffer.length}`,
    );

    const before = this.frames.length;
    while (this.processBufferOnce()) {
      // keep deframing until the buffer holds no complete message
    }
    if (this.frames.length > before) this.wakeAll();
  }

  /**
   * Takes at most one message off the front of the buffer.
   * @returns false when more data is needed or the stream has failed.
   */
  private processBufferOnce(): boolean {
    if (this.failure) return false;

    const headerIndex = this.buffer.indexOf(TWO_CRLF);
    if (headerIndex === -1) return false;

    const headers = this.parseHeaders(
      this.buffer.toString('utf8', 0, headerIndex),
    );
    const contentLength = headers[CONTENT_LENGTH];
    const messageStartIndex = headerIndex + TWO_CRLF.length;

    if (contentLength === undefined) {
      this.logger.error('Missing Content-Length header.');
      this.buffer = this.buffer.subarray(messageStartIndex);
      this.frames.push({
        kind: 'error',
        error: new SessionError('InvalidMessage', 'Missing Content-Length header'),
      });
      return true;
    }

    const messageLength = Number(contentLength);
    if (!Number.isInteger(messageLength) || messageLength < 0) {
      this.logger.error(`Invalid Content-Length: ${contentLength}`);
      this.buffer = this.buffer.subarray(messageStartIndex);
      this.frames.push({
        kind: 'error',
        error: new SessionError(
          'InvalidMessage',
          `Invalid Content-Length: ${contentLength}`,
        ),
      });
      return true;
    }

    if (messageLength > this.maxContentLength) {
      this.logger.error(
        `Content-Length ${messageLength} exceeds maximum ${this.maxContentLength}.`,
      );
      this.fail(
        new SessionError(
          'InvalidMessage',
          `Content-Length ${messageLength} exceeds maximum ${this.maxContentLength}`,
        ),
      );
      return false;
    }

    if (this.buffer.length < messageStartIndex + messageLength) {
      this.logger.trace(
        `Buffer does not contain full message body yet. Need ${messageLength}, have ${this.buffer.length - messageStartIndex}`,
      );
      return false;
    }

    const body = this.buffer.toString(
      'utf8',
      messageStartIndex,
      messageStartIndex + messageLength,
    );
    this.buffer = this.buffer.subarray(messageStartIndex + messageLength);

    try {
      const parsed: unknown = JSON.parse(body);
      this.frames.push({ kind: 'message', value: toJsonValue(parsed) });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.error(
        { rawMessage: body },
        `Error parsing message JSON: ${reason}`,
      );
      this.frames.push({
        kind: 'error',
        error: new SessionError(
          'InvalidMessage',
          `Error parsing message JSON: ${reason}`,
        ),
      });
    }
    return true;
  }

  private parseHeaders(headerString: string): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const line of headerString.split('\r\n')) {
      const separator = line.indexOf(':');
      if (separator === -1) continue;
      const name = line.slice(0, separator).trim();
      const value = line.slice(separator + 1).trim();
      if (name && value) headers[name] = value;
    }
    return headers;
  }
}
