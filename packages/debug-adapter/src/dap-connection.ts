/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  JsonRpcConnection,
  type ConnectionOptions,
  type MessageTransport,
} from '@keywright/core';

import { DapCodec } from './dap-codec.js';

export type DapConnectionOptions = Omit<
  ConnectionOptions,
  'codec' | 'nextId' | 'cancelMethod'
>;

/**
 * A connection speaking DAP. Cancellation is a request in DAP (`cancel`),
 * so the JSON-RPC cancel notification is off.
 */
export function createDapConnection(
  transport: MessageTransport,
  options: DapConnectionOptions = {},
): JsonRpcConnection {
  const codec = new DapCodec();
  return new JsonRpcConnection(transport, {
    loggerNamespace: 'keywright:debug-adapter',
    ...options,
    codec,
    nextId: codec.nextSeq,
    cancelMethod: null,
  });
}
