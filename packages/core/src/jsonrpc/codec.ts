/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { isResponseMessage, type Message, type RequestId } from './messages.js';

/**
 * Maps a wire payload (already JSON-parsed) to the message model and back.
 * The dispatcher only ever sees {@link Message}.
 */
export interface MessageCodec {
  decode(payload: unknown): Message;
  encode(message: Message): unknown;
}

/**
 * Raised by a codec when a well-formed JSON document is not a valid message.
 * Unlike a ProtocolDecodeError the stream is still in sync.
 */
export class InvalidMessageError extends Error {
  constructor(
    message: string,
    readonly id: RequestId | undefined,
  ) {
    super(message);
    this.name = 'InvalidMessageError';
  }
}

const requestIdSchema = z.union([z.string(), z.number().int()]);

const errorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: requestIdSchema,
  method: z.string(),
  params: z.unknown().optional(),
});

const notificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
});

const responseSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: requestIdSchema.nullable(),
    result: z.unknown().optional(),
    error: errorObjectSchema.optional(),
  })
  .refine((value) => 'result' in value || value.error !== undefined, {
    message: 'Response must carry either result or error',
  });

function peekId(payload: unknown): RequestId | undefined {
  if (typeof payload !== 'object' || payload === null || !('id' in payload)) {
    return undefined;
  }
  const parsed = requestIdSchema.safeParse(payload.id);
  return parsed.success ? parsed.data : undefined;
}

export const jsonRpcCodec: MessageCodec = {
  decode(payload: unknown): Message {
    if (typeof payload !== 'object' || payload === null) {
      throw new InvalidMessageError('Message must be a JSON object', undefined);
    }

    if ('method' in payload) {
      if ('id' in payload) {
        const request = requestSchema.safeParse(payload);
        if (request.success) {
          return request.data;
        }
      } else {
        const notification = notificationSchema.safeParse(payload);
        if (notification.success) {
          return notification.data;
        }
      }
      throw new InvalidMessageError(
        'Malformed request or notification',
        peekId(payload),
      );
    }

    const response = responseSchema.safeParse(payload);
    if (response.success) {
      return response.data;
    }
    throw new InvalidMessageError('Malformed response', undefined);
  },

  encode(message: Message): unknown {
    if (isResponseMessage(message)) {
      const { method: _method, ...wire } = message;
      return wire;
    }
    return message;
  },
};
