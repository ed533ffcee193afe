/**
 * Content-Length Wire Codec
 *
 * @module server/codec
 * @license BSD-3-Clause
 */

import type { Readable, Writable } from 'node:stream';
import {
  AbstractMessageReader,
  AbstractMessageWriter,
  DataCallback,
  Disposable,
  Message
} from 'vscode-jsonrpc/node.js';

const HEADER_DELIMITER = Buffer.from('\r\n\r\n', 'ascii');
const MAX_HEADER_BYTES = 8192;

/**
 * Raised once the inbound byte stream can no longer be trusted
 *
 * @export
 * @class FramingFault
 */
export class FramingFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FramingFault';
  }
}

/**
 * Checks that a parsed body is a JSON-RPC message object
 *
 * @param value - Parsed JSON body
 */
export function isMessage(value: unknown): value is Message {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && 'jsonrpc' in value
    && typeof value.jsonrpc === 'string';
}

/**
 * Encodes one message as a `Content-Length` frame
 *
 * The body is compact JSON and the length counts its UTF-8 bytes.
 *
 * @param message - Request, response or notification object
 * @returns Frame bytes, header and body, nothing after the body
 */
export function encode(message: object): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, body]);
}

/**
 * Incremental frame decoder
 *
 * Chunks are buffered across deliveries and complete frames are yielded
 * lazily. After the first fault the decoder stays faulted.
 *
 * @export
 * @class FrameDecoder
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private contentLength: number | null = null;
  private fault: FramingFault | null = null;

  /**
   * Fault that stopped the decoder, if any
   */
  get faulted(): FramingFault | null {
    return this.fault;
  }

  /**
   * Bytes buffered and not yet part of a yielded message
   */
  get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Appends a chunk read from the stream
   *
   * @param chunk - Bytes or text as delivered by the stream
   */
  push(chunk: Uint8Array | string): void {
    if (this.fault) {
      return;
    }
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk);
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, bytes]) : bytes;
  }

  /**
   * Yields every complete message buffered so far
   *
   * Can be iterated again after more chunks are pushed.
   *
   * @throws {FramingFault} When a header or body is malformed
   */
  *messages(): Generator<Message, void, undefined> {
    if (this.fault) {
      throw this.fault;
    }
    for (;;) {
      if (this.contentLength === null) {
        const end = this.buffer.indexOf(HEADER_DELIMITER);
        if (end === -1) {
          if (this.buffer.length > MAX_HEADER_BYTES) {
            throw this.fail(`header block exceeds ${MAX_HEADER_BYTES} bytes`);
          }
          return;
        }
        this.contentLength = this.parseHeaders(this.buffer.subarray(0, end).toString('ascii'));
        this.buffer = this.buffer.subarray(end + HEADER_DELIMITER.length);
      }
      if (this.buffer.length < this.contentLength) {
        return;
      }
      const body = this.buffer.subarray(0, this.contentLength).toString('utf8');
      this.buffer = this.buffer.subarray(this.contentLength);
      this.contentLength = null;
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (error) {
        throw this.fail(`body is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
      }
      if (!isMessage(parsed)) {
        throw this.fail('body is not a JSON-RPC message');
      }
      yield parsed;
    }
  }

  private fail(reason: string): FramingFault {
    this.fault = new FramingFault(reason);
    this.buffer = Buffer.alloc(0);
    return this.fault;
  }

  private parseHeaders(block: string): number {
    let length: number | null = null;
    for (const line of block.split('\r\n')) {
      const separator = line.indexOf(':');
      if (separator === -1) {
        throw this.fail(`malformed header line '${line}'`);
      }
      const name = line.slice(0, separator).trim().toLowerCase();
      const value = line.slice(separator + 1).trim();
      if (name === 'content-length') {
        if (!/^\d+$/.test(value)) {
          throw this.fail(`invalid Content-Length '${value}'`);
        }
        length = Number.parseInt(value, 10);
        if (!Number.isSafeInteger(length)) {
          throw this.fail(`invalid Content-Length '${value}'`);
        }
      }
    }
    if (length === null) {
      throw this.fail('missing Content-Length header');
    }
    return length;
  }
}

/**
 * Decodes an async byte source into messages
 *
 * @param source - Any async iterable of chunks, such as a readable stream
 * @throws {FramingFault} When the stream breaks framing
 */
export async function* decode(source: AsyncIterable<Uint8Array | string>): AsyncGenerator<Message, void, undefined> {
  const decoder = new FrameDecoder();
  for await (const chunk of source) {
    decoder.push(chunk);
    yield* decoder.messages();
  }
}

/**
 * vscode-jsonrpc reader backed by the frame decoder
 *
 * A framing fault fires the error event and detaches from the stream; no
 * resynchronization is attempted.
 *
 * @export
 * @class CodecMessageReader
 */
export class CodecMessageReader extends AbstractMessageReader {
  private readonly decoder = new FrameDecoder();
  private detach: (() => void) | undefined;

  constructor(private readonly readable: Readable) {
    super();
  }

  listen(callback: DataCallback): Disposable {
    const onData = (chunk: Buffer | string) => {
      this.decoder.push(chunk);
      try {
        for (const message of this.decoder.messages()) {
          callback(message);
        }
      } catch (error) {
        this.detach?.();
        this.fireError(error);
      }
    };
    const onError = (error: Error) => this.fireError(error);
    const onClose = () => this.fireClose();
    this.readable.on('data', onData);
    this.readable.on('error', onError);
    this.readable.on('close', onClose);
    this.detach = () => {
      this.readable.off('data', onData);
      this.readable.off('error', onError);
      this.readable.off('close', onClose);
      this.detach = undefined;
    };
    return Disposable.create(() => this.detach?.());
  }

  override dispose(): void {
    this.detach?.();
    super.dispose();
  }
}

/**
 * vscode-jsonrpc writer producing `Content-Length` frames
 *
 * @export
 * @class CodecMessageWriter
 */
export class CodecMessageWriter extends AbstractMessageWriter {
  private errorCount = 0;
  private readonly onStreamError = (error: Error) => this.fireError(error);
  private readonly onStreamClose = () => this.fireClose();

  constructor(private readonly writable: Writable) {
    super();
    this.writable.on('error', this.onStreamError);
    this.writable.on('close', this.onStreamClose);
  }

  write(message: Message): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.writable.destroyed || this.writable.writableEnded) {
        const error = new Error('Language server input stream is closed.');
        this.errorCount++;
        this.fireError(error, message, this.errorCount);
        reject(error);
        return;
      }
      this.writable.write(encode(message), (error) => {
        if (error) {
          this.errorCount++;
          this.fireError(error, message, this.errorCount);
          reject(error);
          return;
        }
        this.errorCount = 0;
        resolve();
      });
    });
  }

  end(): void {
    this.writable.end();
  }

  override dispose(): void {
    this.writable.off('error', this.onStreamError);
    this.writable.off('close', this.onStreamClose);
    super.dispose();
  }
}
