/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type RequestId = string | number;

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface RequestMessage {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params?: unknown;
}

export interface ResponseMessage {
  jsonrpc: '2.0';
  id: RequestId | null;
  result?: unknown;
  error?: RpcErrorObject;
  /**
   * Method of the request being answered. Never written by the JSON-RPC
   * codec; wire formats that echo the command (DAP) read it.
   */
  method?: string;
}

export interface NotificationMessage {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export type Message = RequestMessage | ResponseMessage | NotificationMessage;

export const isRequestMessage = (msg: Message): msg is RequestMessage =>
  'id' in msg &&
  typeof msg.method === 'string' &&
  !('result' in msg) &&
  !('error' in msg);

export const isResponseMessage = (msg: Message): msg is ResponseMessage =>
  'id' in msg && !isRequestMessage(msg);

export const isNotificationMessage = (
  msg: Message,
): msg is NotificationMessage => !('id' in msg) && 'method' in msg;

export const createRequest = (
  id: RequestId,
  method: string,
  params?: unknown,
): RequestMessage => ({
  jsonrpc: '2.0',
  id,
  method,
  ...(params !== undefined ? { params } : {}),
});

export const createNotification = (
  method: string,
  params?: unknown,
): NotificationMessage => ({
  jsonrpc: '2.0',
  method,
  ...(params !== undefined ? { params } : {}),
});

export const successResponse = (
  id: RequestId,
  result: unknown,
  method?: string,
): ResponseMessage => ({
  jsonrpc: '2.0',
  id,
  result: result === undefined ? null : result,
  ...(method !== undefined ? { method } : {}),
});

export const errorResponse = (
  id: RequestId | null,
  error: RpcErrorObject,
  method?: string,
): ResponseMessage => ({
  jsonrpc: '2.0',
  id,
  error,
  ...(method !== undefined ? { method } : {}),
});
