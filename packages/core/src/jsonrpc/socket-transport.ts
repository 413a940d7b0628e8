/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createConnection, createServer, type Server, type Socket } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';

import { DebugLogger } from '../debug/DebugLogger.js';
import { TransportError } from './errors.js';
import type { Framing } from './framing.js';
import { StreamTransport } from './stream-transport.js';

export interface TcpParams {
  host?: string;
  port: number;
}

export interface ConnectOptions {
  framing?: Framing;
  /** Keep retrying refused connections until this deadline. */
  timeoutMs?: number;
  retryIntervalMs?: number;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_RETRY_INTERVAL_MS = 100;

const logger = DebugLogger.getLogger('keywright:jsonrpc');

export class SocketTransport extends StreamTransport {
  constructor(
    readonly socket: Socket,
    framing?: Framing,
  ) {
    super(socket, socket, { framing });
    socket.setNoDelay(true);
  }
}

function openSocket(params: TcpParams, timeoutMs: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({
      host: params.host ?? '127.0.0.1',
      port: params.port,
    });
    // An unanswered SYN can outlive the whole connect deadline.
    const timer = setTimeout(() => {
      socket.destroy();
      reject(
        new TransportError(`Connection attempt timed out after ${timeoutMs}ms`),
      );
    }, timeoutMs);
    const onError = (error: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Connect mode. The peer may still be starting (a freshly spawned launcher),
 * so refused connections are retried until the deadline.
 */
export async function connectTcp(
  params: TcpParams,
  options: ConnectOptions = {},
): Promise<SocketTransport> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  const deadline = Date.now() + timeoutMs;
  let lastError: unknown;

  do {
    try {
      const socket = await openSocket(
        params,
        Math.max(deadline - Date.now(), 1),
      );
      return new SocketTransport(socket, options.framing);
    } catch (error) {
      lastError = error;
    }
    await delay(retryIntervalMs);
  } while (Date.now() < deadline);

  throw new TransportError(
    `Could not connect to ${params.host ?? '127.0.0.1'}:${params.port} within ${timeoutMs}ms`,
    { cause: lastError },
  );
}

export interface TcpListener {
  address(): TcpParams;
  close(): Promise<void>;
}

/**
 * Listen mode. Every accepted socket becomes its own transport.
 */
export async function listenTcp(
  params: TcpParams,
  onTransport: (transport: SocketTransport) => void,
  framing?: Framing,
): Promise<TcpListener> {
  const sockets = new Set<Socket>();
  const server: Server = createServer((socket) => {
    sockets.add(socket);
    socket.once('close', () => sockets.delete(socket));
    onTransport(new SocketTransport(socket, framing));
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(params.port, params.host ?? '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });
  server.on('error', (error) => {
    logger.error(`listener on port ${params.port} failed: ${error.message}`);
  });

  return {
    address(): TcpParams {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        return params;
      }
      return { host: address.address, port: address.port };
    },
    close(): Promise<void> {
      for (const socket of sockets) {
        socket.destroy();
      }
      return new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}
