/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ErrorCodes, ResponseError } from 'vscode-jsonrpc';
import { ZodError } from 'zod';

import type { RpcErrorObject } from './messages.js';

export { ResponseError };

export const RpcErrorCodes = {
  ParseError: ErrorCodes.ParseError,
  InvalidRequest: ErrorCodes.InvalidRequest,
  MethodNotFound: ErrorCodes.MethodNotFound,
  InvalidParams: ErrorCodes.InvalidParams,
  InternalError: ErrorCodes.InternalError,
  ServerNotInitialized: -32002,
  RequestCancelled: -32800,
} as const;

/**
 * The byte stream failed or ended. Fatal for the connection.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * A frame could not be decoded. Framing is stateful, so this is fatal too.
 */
export class ProtocolDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolDecodeError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Request cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class ConnectionClosedError extends Error {
  constructor(message = 'Connection closed') {
    super(message);
    this.name = 'ConnectionClosedError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(
    readonly method: string,
    readonly timeoutMs: number,
  ) {
    super(`Request '${method}' timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/** Failures of the stream itself; the connection cannot continue. */
export function isFatalError(
  error: unknown,
): error is TransportError | ProtocolDecodeError {
  return error instanceof TransportError || error instanceof ProtocolDecodeError;
}

/**
 * Classifies a handler failure into the error object sent to the peer.
 * Internal failures get a generic message; details stay in the local log.
 */
export function toRpcErrorObject(
  error: unknown,
  method: string,
): RpcErrorObject {
  if (error instanceof ResponseError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.data !== undefined ? { data: error.data } : {}),
    };
  }
  if (error instanceof CancelledError) {
    return { code: RpcErrorCodes.RequestCancelled, message: error.message };
  }
  if (error instanceof ZodError) {
    return {
      code: RpcErrorCodes.InvalidParams,
      message: `Invalid params for '${method}': ${error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
    };
  }
  return {
    code: RpcErrorCodes.InternalError,
    message: `Internal error while handling '${method}'`,
  };
}

/**
 * Turns an error object received from the peer into the rejection of the
 * matching pending call.
 */
export function fromRpcErrorObject(error: RpcErrorObject): Error {
  if (error.code === RpcErrorCodes.RequestCancelled) {
    return new CancelledError(error.message);
  }
  return new ResponseError(error.code, error.message, error.data);
}
