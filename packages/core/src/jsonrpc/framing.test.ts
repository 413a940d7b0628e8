/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough } from 'node:stream';

import { describe, expect, it, vi } from 'vitest';
import * as fc from 'fast-check';

import { ProtocolDecodeError, TransportError } from './errors.js';
import {
  createFrameReader,
  createFrameWriter,
  LineDelimitedDecoder,
  parseFrameBody,
  type FrameReader,
} from './framing.js';

interface Collected {
  payloads: unknown[];
  error?: Error;
}

function collect(reader: FrameReader): Promise<Collected> {
  return new Promise((resolve) => {
    const payloads: unknown[] = [];
    reader.listen({
      payload: (value) => payloads.push(value),
      error: (error) => resolve({ payloads, error }),
      end: () => resolve({ payloads }),
    });
  });
}

function captureText(stream: PassThrough): () => string {
  let text = '';
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    text += chunk;
  });
  return () => text;
}

function splitAt(buffer: Buffer, cuts: number[]): Buffer[] {
  const points = [...new Set(cuts.map((c) => c % (buffer.length + 1)))].sort(
    (a, b) => a - b,
  );
  const chunks: Buffer[] = [];
  let start = 0;
  for (const point of points) {
    chunks.push(buffer.subarray(start, point));
    start = point;
  }
  chunks.push(buffer.subarray(start));
  return chunks.filter((chunk) => chunk.length > 0);
}

describe('parseFrameBody', () => {
  it('parses JSON', () => {
    expect(parseFrameBody('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it('raises a decode error for invalid JSON', () => {
    expect(() => parseFrameBody('{not json')).toThrow(ProtocolDecodeError);
  });
});

describe('content-length framing', () => {
  it('prefixes each payload with its byte length', async () => {
    const output = new PassThrough();
    const text = captureText(output);
    const writer = createFrameWriter('content-length', output);

    await writer.write({ a: 1 });
    await writer.write('é');

    await vi.waitFor(() =>
      expect(text()).toBe(
        'Content-Length: 7\r\n\r\n{"a":1}Content-Length: 4\r\n\r\n"é"',
      ),
    );
  });

  it('writes payloads that are not JSON-RPC messages unchanged', async () => {
    const output = new PassThrough();
    const text = captureText(output);
    const writer = createFrameWriter('content-length', output);

    await writer.write({ seq: 1, type: 'event', event: 'initialized' });

    await vi.waitFor(() =>
      expect(text()).toBe(
        'Content-Length: 46\r\n\r\n{"seq":1,"type":"event","event":"initialized"}',
      ),
    );
  });

  it('decodes frames split across chunks, then ends', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('content-length', input));

    input.write('Content-Length: 17\r\n\r\n{"metho');
    input.write('d":"ping"}Content-Length: 8\r\n');
    input.end('\r\n{"id":2}');

    await expect(result).resolves.toEqual({
      payloads: [{ method: 'ping' }, { id: 2 }],
    });
  });

  it('fails with a decode error when Content-Length is missing', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('content-length', input));

    input.write('Content-Type: text/plain\r\n\r\n{}');

    const { error } = await result;
    expect(error).toBeInstanceOf(ProtocolDecodeError);
  });

  it('fails with a decode error when a body is not JSON', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('content-length', input));

    input.write('Content-Length: 3\r\n\r\n{x}');

    const { error } = await result;
    expect(error).toBeInstanceOf(ProtocolDecodeError);
  });

  it('reports a failing stream as a transport error', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('content-length', input));

    input.destroy(new Error('connection reset'));

    const { error } = await result;
    expect(error).toBeInstanceOf(TransportError);
    expect(error?.message).toBe('Read failed: connection reset');
  });

  it('drops a trailing partial frame when the stream ends', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('content-length', input));

    input.end('Content-Length: 7\r\n\r\n{"a":1}Content-Length: 10\r\n\r\n{"b"');

    await expect(result).resolves.toEqual({ payloads: [{ a: 1 }] });
  });
});

describe('newline framing', () => {
  it('terminates each payload with a single newline', async () => {
    const output = new PassThrough();
    const text = captureText(output);
    const writer = createFrameWriter('newline', output);

    await writer.write({ a: 1 });

    await vi.waitFor(() => expect(text()).toBe('{"a":1}\n'));
  });

  it('reads one payload per line', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('newline', input));

    input.end('{"a":1}\r\n\n{"b":2}\n');

    await expect(result).resolves.toEqual({ payloads: [{ a: 1 }, { b: 2 }] });
  });

  it('fails when the stream ends in the middle of a line', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('newline', input));

    input.end('{"a":1}\n{"b"');

    await expect(result).resolves.toEqual({
      payloads: [{ a: 1 }],
      error: expect.any(ProtocolDecodeError),
    });
  });

  it('fails with a decode error when a line is not JSON', async () => {
    const input = new PassThrough();
    const result = collect(createFrameReader('newline', input));

    input.write('{"a":1}\nnot json\n{"b":2}\n');

    await expect(result).resolves.toEqual({
      payloads: [{ a: 1 }],
      error: expect.any(ProtocolDecodeError),
    });
  });
});

describe('LineDelimitedDecoder', () => {
  it('skips blank lines and trims carriage returns', () => {
    const decoder = new LineDelimitedDecoder();

    expect(decoder.push(Buffer.from('{"a":1}\r\n\n{"b":2}\n', 'utf8'))).toEqual(
      ['{"a":1}', '{"b":2}'],
    );
  });

  it('fails on end with an unterminated line', () => {
    const decoder = new LineDelimitedDecoder();
    decoder.push(Buffer.from('{"a":', 'utf8'));

    expect(() => decoder.end()).toThrow(ProtocolDecodeError);
  });

  it('reproduces every line however the stream is chunked', () => {
    fc.assert(
      fc.property(
        fc.array(fc.jsonValue(), { minLength: 1, maxLength: 5 }),
        fc.array(fc.nat(), { maxLength: 8 }),
        (payloads, cuts) => {
          const bodies = payloads.map((payload) => JSON.stringify(payload));
          const stream = Buffer.from(
            bodies.map((body) => `${body}\n`).join(''),
            'utf8',
          );
          const decoder = new LineDelimitedDecoder();
          const decoded = splitAt(stream, cuts).flatMap((chunk) =>
            decoder.push(chunk),
          );
          decoder.end();

          expect(decoded).toEqual(bodies);
        },
      ),
    );
  });
});
