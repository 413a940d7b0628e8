/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/DebugLogger.js';
import type { JsonRpcConnection } from './connection.js';
import type { Framing } from './framing.js';
import { listenTcp, type TcpListener, type TcpParams } from './socket-transport.js';
import { createStdioTransport } from './stream-transport.js';
import type { MessageTransport } from './transport.js';

export type ServerMode = 'stdio' | 'tcp';

export const DEFAULT_LANGUAGE_SERVER_PORT = 6610;
export const DEFAULT_DEBUG_ADAPTER_PORT = 6611;

export interface JsonRpcServerOptions {
  mode: ServerMode;
  /** Required in tcp mode. */
  tcp?: TcpParams;
  framing?: Framing;
  createConnection: (transport: MessageTransport) => JsonRpcConnection;
  /** Registers the façade's methods before the connection starts listening. */
  setup: (connection: JsonRpcConnection) => void;
}

const logger = DebugLogger.getLogger('keywright:jsonrpc');

/**
 * Serves one connection over stdio, or one per accepted socket in tcp mode.
 */
export class JsonRpcServer {
  private readonly connections = new Set<JsonRpcConnection>();
  private listener: TcpListener | undefined;
  private started = false;

  constructor(private readonly options: JsonRpcServerOptions) {
    if (options.mode === 'tcp' && !options.tcp) {
      throw new Error('tcp mode needs a port');
    }
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** Bound address in tcp mode. */
  address(): TcpParams | undefined {
    return this.listener?.address();
  }

  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Server already started');
    }
    this.started = true;

    if (this.options.mode === 'stdio') {
      this.accept(createStdioTransport(this.options.framing));
      return;
    }

    const params = this.options.tcp ?? { port: 0 };
    this.listener = await listenTcp(
      params,
      (transport) => this.accept(transport),
      this.options.framing,
    );
    const bound = this.listener.address();
    logger.info(`listening on ${bound.host ?? '127.0.0.1'}:${bound.port}`);
  }

  /** Resolves once every current connection has closed. */
  async waitForConnections(): Promise<void> {
    await Promise.all([...this.connections].map((c) => c.closed));
  }

  async close(): Promise<void> {
    await Promise.all([...this.connections].map((c) => c.shutdown()));
    if (this.listener) {
      await this.listener.close();
      this.listener = undefined;
    }
  }

  private accept(transport: MessageTransport): void {
    const connection = this.options.createConnection(transport);
    this.options.setup(connection);
    this.connections.add(connection);
    void connection.closed.then(() => {
      this.connections.delete(connection);
      logger.debug('connection closed');
    });
    connection.listen();
    logger.debug(`connection accepted (${this.options.mode})`);
  }
}
