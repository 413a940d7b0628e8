/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import {
  InvalidMessageError,
  isNotificationMessage,
  isRequestMessage,
  RpcErrorCodes,
  type Message,
  type MessageCodec,
  type RpcErrorObject,
} from '@keywright/core';

/** DAP response message for a request that was cancelled. */
export const CANCELLED_MESSAGE = 'cancelled';

const seqSchema = z.number().int().nonnegative();

const requestSchema = z.object({
  seq: seqSchema,
  type: z.literal('request'),
  command: z.string(),
  arguments: z.unknown().optional(),
});

const responseSchema = z.object({
  seq: seqSchema,
  type: z.literal('response'),
  request_seq: seqSchema,
  success: z.boolean(),
  command: z.string(),
  message: z.string().optional(),
  body: z.unknown().optional(),
});

const eventSchema = z.object({
  seq: seqSchema,
  type: z.literal('event'),
  event: z.string(),
  body: z.unknown().optional(),
});

const errorBodySchema = z.object({
  error: z
    .object({
      id: z.number().int().optional(),
      format: z.string().optional(),
    })
    .passthrough(),
});

const dapMessageSchema = z.discriminatedUnion('type', [
  requestSchema,
  responseSchema,
  eventSchema,
]);

function failureFromResponse(
  response: z.infer<typeof responseSchema>,
): RpcErrorObject {
  if (response.message === CANCELLED_MESSAGE) {
    return { code: RpcErrorCodes.RequestCancelled, message: CANCELLED_MESSAGE };
  }
  const body = errorBodySchema.safeParse(response.body);
  const error = body.success ? body.data.error : undefined;
  return {
    code: error?.id ?? RpcErrorCodes.InternalError,
    message: error?.format ?? response.message ?? `'${response.command}' failed`,
    ...(response.body !== undefined ? { data: response.body } : {}),
  };
}

/**
 * Debug Adapter Protocol wire format. Every outbound message takes the next
 * value of one `seq` counter; hand {@link DapCodec.nextSeq} to the
 * connection as its id allocator so requests draw from the same counter.
 */
export class DapCodec implements MessageCodec {
  private seq = 0;

  readonly nextSeq = (): number => ++this.seq;

  decode(payload: unknown): Message {
    const parsed = dapMessageSchema.safeParse(payload);
    if (!parsed.success) {
      const seq = z.object({ seq: seqSchema }).safeParse(payload);
      throw new InvalidMessageError(
        'Malformed debug adapter message',
        seq.success ? seq.data.seq : undefined,
      );
    }

    const message = parsed.data;
    switch (message.type) {
      case 'request':
        return {
          jsonrpc: '2.0',
          id: message.seq,
          method: message.command,
          ...(message.arguments !== undefined
            ? { params: message.arguments }
            : {}),
        };
      case 'event':
        return {
          jsonrpc: '2.0',
          method: message.event,
          ...(message.body !== undefined ? { params: message.body } : {}),
        };
      case 'response':
        return message.success
          ? {
              jsonrpc: '2.0',
              id: message.request_seq,
              result: message.body ?? null,
              method: message.command,
            }
          : {
              jsonrpc: '2.0',
              id: message.request_seq,
              error: failureFromResponse(message),
              method: message.command,
            };
      default:
        throw new InvalidMessageError('Unknown message type', undefined);
    }
  }

  encode(message: Message): unknown {
    if (isRequestMessage(message)) {
      return {
        seq: typeof message.id === 'number' ? message.id : this.nextSeq(),
        type: 'request',
        command: message.method,
        ...(message.params !== undefined ? { arguments: message.params } : {}),
      };
    }
    if (isNotificationMessage(message)) {
      return {
        seq: this.nextSeq(),
        type: 'event',
        event: message.method,
        ...(message.params !== undefined ? { body: message.params } : {}),
      };
    }

    const requestSeq = typeof message.id === 'number' ? message.id : 0;
    const command = message.method ?? '';
    if (message.error) {
      const cancelled = message.error.code === RpcErrorCodes.RequestCancelled;
      return {
        seq: this.nextSeq(),
        type: 'response',
        request_seq: requestSeq,
        success: false,
        command,
        message: cancelled ? CANCELLED_MESSAGE : message.error.message,
        body: {
          error: { id: message.error.code, format: message.error.message },
        },
      };
    }
    return {
      seq: this.nextSeq(),
      type: 'response',
      request_seq: requestSeq,
      success: true,
      command,
      ...(message.result !== undefined && message.result !== null
        ? { body: message.result }
        : {}),
    };
  }
}
