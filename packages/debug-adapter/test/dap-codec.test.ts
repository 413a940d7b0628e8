/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  createNotification,
  createRequest,
  errorResponse,
  InvalidMessageError,
  successResponse,
} from '@keywright/core';

import { DapCodec } from '../src/dap-codec.js';

describe('DapCodec.decode', () => {
  const codec = new DapCodec();

  it('maps a request onto id and method', () => {
    expect(
      codec.decode({
        seq: 1,
        type: 'request',
        command: 'initialize',
        arguments: { adapterID: 'keywright' },
      }),
    ).toEqual({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { adapterID: 'keywright' },
    });
  });

  it('maps an event onto a notification', () => {
    expect(
      codec.decode({
        seq: 4,
        type: 'event',
        event: 'stopped',
        body: { reason: 'breakpoint', threadId: 1 },
      }),
    ).toEqual({
      jsonrpc: '2.0',
      method: 'stopped',
      params: { reason: 'breakpoint', threadId: 1 },
    });
  });

  it('correlates a successful response by request_seq', () => {
    expect(
      codec.decode({
        seq: 5,
        type: 'response',
        request_seq: 2,
        success: true,
        command: 'threads',
        body: { threads: [] },
      }),
    ).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { threads: [] },
      method: 'threads',
    });
  });

  it('takes the error id and format from a failed response', () => {
    const body = { error: { id: 1104, format: 'Breakpoint rejected' } };

    expect(
      codec.decode({
        seq: 6,
        type: 'response',
        request_seq: 3,
        success: false,
        command: 'setBreakpoints',
        message: 'failed',
        body,
      }),
    ).toMatchObject({
      id: 3,
      error: { code: 1104, message: 'Breakpoint rejected', data: body },
    });
  });

  it('falls back to the response message', () => {
    expect(
      codec.decode({
        seq: 7,
        type: 'response',
        request_seq: 4,
        success: false,
        command: 'launch',
        message: 'launcher missing',
      }),
    ).toMatchObject({ error: { code: -32603, message: 'launcher missing' } });
  });

  it('recognises a cancelled response', () => {
    expect(
      codec.decode({
        seq: 8,
        type: 'response',
        request_seq: 5,
        success: false,
        command: 'launch',
        message: 'cancelled',
      }),
    ).toMatchObject({ error: { code: -32800, message: 'cancelled' } });
  });

  it('reports the seq of a malformed message', () => {
    let caught: unknown;
    try {
      codec.decode({ seq: 9, type: 'request' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidMessageError);
    expect(caught instanceof InvalidMessageError && caught.id).toBe(9);
  });
});

describe('DapCodec.encode', () => {
  it('numbers every outbound message from one counter', () => {
    const codec = new DapCodec();
    const requestId = codec.nextSeq();

    expect(
      codec.encode(createRequest(requestId, 'runInTerminal', { cwd: '.' })),
    ).toEqual({
      seq: 1,
      type: 'request',
      command: 'runInTerminal',
      arguments: { cwd: '.' },
    });
    expect(codec.encode(createNotification('output', { output: 'x' }))).toEqual(
      { seq: 2, type: 'event', event: 'output', body: { output: 'x' } },
    );
    expect(codec.encode(successResponse(7, null, 'threads'))).toEqual({
      seq: 3,
      type: 'response',
      request_seq: 7,
      success: true,
      command: 'threads',
    });
  });

  it('writes failures with an error body', () => {
    const codec = new DapCodec();

    expect(
      codec.encode(
        errorResponse(
          2,
          { code: -32602, message: 'Unknown console type "tmux".' },
          'launch',
        ),
      ),
    ).toEqual({
      seq: 1,
      type: 'response',
      request_seq: 2,
      success: false,
      command: 'launch',
      message: 'Unknown console type "tmux".',
      body: { error: { id: -32602, format: 'Unknown console type "tmux".' } },
    });
  });

  it('writes cancelled failures with the cancelled message', () => {
    const codec = new DapCodec();

    expect(
      codec.encode(
        errorResponse(3, { code: -32800, message: 'Request cancelled' }, 'launch'),
      ),
    ).toMatchObject({ success: false, message: 'cancelled' });
  });
});
