/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough } from 'node:stream';
import {
  createMessageConnection,
  NullLogger,
  StreamMessageReader,
  StreamMessageWriter,
  type MessageConnection,
} from 'vscode-jsonrpc/node.js';
import type { PublishDiagnosticsParams } from 'vscode-languageserver-protocol';
import { JsonRpcConnection, StreamTransport } from '@keywright/core';

import { LanguageServerProtocol } from '../src/protocol.js';
import { registerBuiltinProviders } from '../src/providers/index.js';

export interface LanguageServerPair {
  connection: JsonRpcConnection;
  protocol: LanguageServerProtocol;
  client: MessageConnection;
  published: PublishDiagnosticsParams[];
  initialize(initializationOptions?: unknown): Promise<unknown>;
  open(uri: string, text: string, languageId?: string): Promise<void>;
  dispose(): Promise<void>;
}

/**
 * A language server on one end of a stream pair and a vscode-jsonrpc client
 * on the other.
 */
export function createLanguageServerPair(
  options: { builtins?: boolean } = {},
): LanguageServerPair {
  const toServer = new PassThrough();
  const toClient = new PassThrough();
  const connection = new JsonRpcConnection(
    new StreamTransport(toServer, toClient),
    { drainTimeoutMs: 50 },
  );
  const protocol = new LanguageServerProtocol(connection);
  if (options.builtins ?? true) {
    registerBuiltinProviders(protocol);
  }
  connection.listen();

  const client = createMessageConnection(
    new StreamMessageReader(toClient),
    new StreamMessageWriter(toServer),
    NullLogger,
  );
  const published: PublishDiagnosticsParams[] = [];
  client.onNotification(
    'textDocument/publishDiagnostics',
    (params: PublishDiagnosticsParams) => {
      published.push(params);
    },
  );
  client.listen();

  return {
    connection,
    protocol,
    client,
    published,
    initialize: (initializationOptions) =>
      client.sendRequest('initialize', {
        processId: null,
        rootUri: null,
        capabilities: {},
        initializationOptions,
      }),
    open: (uri, text, languageId = 'robotframework') =>
      client.sendNotification('textDocument/didOpen', {
        textDocument: { uri, languageId, version: 1, text },
      }),
    async dispose() {
      client.dispose();
      await connection.shutdown();
    },
  };
}
