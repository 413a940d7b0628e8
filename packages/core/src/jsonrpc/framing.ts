/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable, Writable } from 'node:stream';
import { setImmediate as nextTurn } from 'node:timers/promises';

import {
  Disposable,
  StreamMessageReader,
  StreamMessageWriter,
  type Message as WireMessage,
} from 'vscode-jsonrpc/node.js';

import { ProtocolDecodeError, TransportError } from './errors.js';

export type Framing = 'content-length' | 'newline';

const NEWLINE = 0x0a;

/** Receives decoded payloads. After `error` or `end` nothing more arrives. */
export interface FrameSink {
  payload(value: unknown): void;
  error(error: Error): void;
  end(): void;
}

export interface FrameReader {
  listen(sink: FrameSink): Disposable;
}

export interface FrameWriter {
  /** Resolves once the frame is handed to the stream. */
  write(payload: unknown): Promise<void>;
  end(): void;
  dispose(): void;
}

export function createFrameReader(
  framing: Framing,
  input: Readable,
): FrameReader {
  return framing === 'newline'
    ? new LineFrameReader(input)
    : new ContentLengthFrameReader(input);
}

export function createFrameWriter(
  framing: Framing,
  output: Writable,
): FrameWriter {
  return framing === 'newline'
    ? new LineFrameWriter(output)
    : new ContentLengthFrameWriter(output);
}

/**
 * Parses one frame body. Invalid JSON means the peer is broken, so this is
 * a decode error rather than an invalid message.
 */
export function parseFrameBody(body: string): unknown {
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (error) {
    throw new ProtocolDecodeError('Frame body is not valid JSON', {
      cause: error,
    });
  }
}

function readFailure(error: Error): TransportError {
  return new TransportError(`Read failed: ${error.message}`, { cause: error });
}

class ContentLengthFrameReader implements FrameReader {
  constructor(private readonly input: Readable) {}

  listen(sink: FrameSink): Disposable {
    const reader = new StreamMessageReader(this.input);
    let streamError: Error | undefined;
    let arrivals = 0;
    let done = false;
    const finish = (report: () => void) => {
      if (!done) {
        done = true;
        report();
      }
    };

    // Registered before the reader's own listener, so a stream failure is
    // known by the time the reader reports it.
    this.input.on('error', (error: Error) => {
      streamError = error;
    });

    const subscriptions = [
      reader.onError((error) =>
        finish(() =>
          sink.error(
            error === streamError
              ? readFailure(error)
              : new ProtocolDecodeError(error.message, { cause: error }),
          ),
        ),
      ),
      reader.onClose(() => {
        void settle(() => arrivals).then(() => finish(() => sink.end()));
      }),
      reader.listen((message) => {
        arrivals++;
        if (!done) {
          sink.payload(message);
        }
      }),
    ];

    return Disposable.create(() => {
      for (const subscription of subscriptions) {
        subscription.dispose();
      }
      reader.dispose();
    });
  }
}

/**
 * The reader decodes on a queue of its own that advances one turn per
 * message, so bodies can still be delivered after the stream closed. Two
 * turns without a delivery mean the queue is empty.
 */
async function settle(arrivals: () => number): Promise<void> {
  let quietTurns = 0;
  while (quietTurns < 2) {
    const before = arrivals();
    await nextTurn();
    quietTurns = arrivals() === before ? quietTurns + 1 : 0;
  }
}

/** What the writer serializes: JSON.stringify defers to `toJSON`. */
interface WirePayload extends WireMessage {
  toJSON(): unknown;
}

class ContentLengthFrameWriter implements FrameWriter {
  private readonly writer: StreamMessageWriter;

  constructor(output: Writable) {
    this.writer = new StreamMessageWriter(output);
  }

  async write(payload: unknown): Promise<void> {
    // DAP payloads carry no `jsonrpc` member; the envelope stands in for
    // the message type and serializes to the payload alone.
    const envelope: WirePayload = { jsonrpc: '2.0', toJSON: () => payload };
    await this.writer.write(envelope);
  }

  end(): void {
    this.writer.end();
  }

  dispose(): void {
    this.writer.dispose();
  }
}

/** Splits a byte stream on `\n`; blank lines are skipped. */
export class LineDelimitedDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): string[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const bodies: string[] = [];

    let newlineIndex = this.buffer.indexOf(NEWLINE);
    while (newlineIndex >= 0) {
      const line = this.buffer.subarray(0, newlineIndex).toString('utf8').trim();
      this.buffer = this.buffer.subarray(newlineIndex + 1);
      if (line.length > 0) {
        bodies.push(line);
      }
      newlineIndex = this.buffer.indexOf(NEWLINE);
    }
    return bodies;
  }

  /** Throws when the stream stopped in the middle of a line. */
  end(): void {
    if (this.buffer.toString('utf8').trim().length > 0) {
      throw new ProtocolDecodeError(
        'Stream ended in the middle of a line-delimited message',
      );
    }
  }
}

class LineFrameReader implements FrameReader {
  constructor(private readonly input: Readable) {}

  listen(sink: FrameSink): Disposable {
    const decoder = new LineDelimitedDecoder();
    let done = false;
    const finish = (report: () => void) => {
      if (!done) {
        done = true;
        report();
      }
    };
    const fail = (error: unknown) =>
      finish(() =>
        sink.error(
          error instanceof Error
            ? error
            : new ProtocolDecodeError(String(error)),
        ),
      );

    const onData = (chunk: Buffer | string) => {
      if (done) {
        return;
      }
      try {
        const bytes =
          typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
        for (const line of decoder.push(bytes)) {
          sink.payload(parseFrameBody(line));
        }
      } catch (error) {
        fail(error);
      }
    };
    const onEnd = () => {
      try {
        decoder.end();
        finish(() => sink.end());
      } catch (error) {
        fail(error);
      }
    };
    const onError = (error: Error) => fail(readFailure(error));
    const onClose = () => finish(() => sink.end());

    this.input.on('data', onData);
    this.input.on('end', onEnd);
    this.input.on('error', onError);
    this.input.on('close', onClose);

    return Disposable.create(() => {
      this.input.off('data', onData);
      this.input.off('end', onEnd);
      this.input.off('close', onClose);
    });
  }
}

class LineFrameWriter implements FrameWriter {
  constructor(private readonly output: Writable) {}

  write(payload: unknown): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.output.write(
        `${JSON.stringify(payload)}\n`,
        'utf8',
        (error?: Error | null) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        },
      );
    });
  }

  end(): void {
    this.output.end();
  }

  dispose(): void {}
}
