/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';

import { TransportError } from './errors.js';
import {
  createFrameReader,
  createFrameWriter,
  type FrameReader,
  type FrameWriter,
  type Framing,
} from './framing.js';
import type { MessageTransport } from './transport.js';

export interface StreamTransportOptions {
  framing?: Framing;
  /** End the output stream on close. Off for process stdout. */
  endOutputOnClose?: boolean;
  /** Destroy the input stream on close. Off for process stdin. */
  destroyInputOnClose?: boolean;
}

export class StreamTransport implements MessageTransport {
  private readonly reader: FrameReader;
  private readonly writer: FrameWriter;
  private readonly endOutputOnClose: boolean;
  private readonly destroyInputOnClose: boolean;
  private closed = false;
  private receiving = false;
  private wakeReceiver: () => void = () => {};

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: StreamTransportOptions = {},
  ) {
    const framing = options.framing ?? 'content-length';
    this.reader = createFrameReader(framing, input);
    this.writer = createFrameWriter(framing, output);
    this.endOutputOnClose = options.endOutputOnClose ?? true;
    this.destroyInputOnClose = options.destroyInputOnClose ?? true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(payload: unknown): Promise<void> {
    if (this.closed || this.output.destroyed || this.output.writableEnded) {
      throw new TransportError('Cannot write to a closed transport');
    }
    try {
      await this.writer.write(payload);
    } catch (error) {
      throw new TransportError(
        `Write failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  receive(): AsyncIterable<unknown> {
    if (this.receiving) {
      throw new TransportError('Transport is already being received from');
    }
    this.receiving = true;
    return this.readPayloads();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.wakeReceiver();

    try {
      // A destroyed stream never reports the end, so there is nothing to
      // wait for.
      if (
        this.endOutputOnClose &&
        !this.output.destroyed &&
        !this.output.writableEnded
      ) {
        this.writer.end();
        await finished(this.output, { readable: false });
      }
    } finally {
      this.writer.dispose();
      if (this.destroyInputOnClose && !this.input.destroyed) {
        this.input.destroy();
      }
    }
  }

  private async *readPayloads(): AsyncGenerator<unknown> {
    const queue: unknown[] = [];
    const status: { failure?: Error; ended: boolean } = { ended: false };
    const wake = () => {
      const resume = this.wakeReceiver;
      this.wakeReceiver = () => {};
      resume();
    };
    const subscription = this.reader.listen({
      payload: (value) => {
        queue.push(value);
        wake();
      },
      error: (error) => {
        status.failure = error;
        wake();
      },
      end: () => {
        status.ended = true;
        wake();
      },
    });

    try {
      while (!this.closed) {
        if (queue.length > 0) {
          yield queue.shift();
          continue;
        }
        if (status.failure) {
          throw status.failure;
        }
        if (status.ended) {
          return;
        }
        await new Promise<void>((resolve) => {
          this.wakeReceiver = resolve;
        });
      }
    } finally {
      subscription.dispose();
    }
  }
}

/**
 * Binds the process standard streams. Neither stream is ended or destroyed
 * on close; the process owns them.
 */
export function createStdioTransport(framing?: Framing): StreamTransport {
  return new StreamTransport(process.stdin, process.stdout, {
    framing,
    endOutputOnClose: false,
    destroyInputOnClose: false,
  });
}
