/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DEFAULT_DEBUG_ADAPTER_PORT,
  DEFAULT_LANGUAGE_SERVER_PORT,
  DebugLogger,
  JsonRpcConnection,
  JsonRpcServer,
  type TcpParams,
} from '@keywright/core';
import {
  createDapConnection,
  DebugAdapterServerProtocol,
} from '@keywright/debug-adapter';
import {
  LanguageServerProtocol,
  registerBuiltinProviders,
} from '@keywright/language-server';

import type { CliArgs } from './config/args.js';
import { getCliVersion } from './utils/version.js';

const logger = DebugLogger.getLogger('keywright:cli');

type ServerArgs = Pick<CliArgs, 'command' | 'mode' | 'host' | 'port' | 'launcherPath'>;

function tcpParams(args: ServerArgs, defaultPort: number): TcpParams | undefined {
  if (args.mode !== 'tcp') {
    return undefined;
  }
  return { host: args.host, port: args.port ?? defaultPort };
}

export function createServer(args: ServerArgs): JsonRpcServer {
  if (args.command === 'language-server') {
    const version = getCliVersion();
    return new JsonRpcServer({
      mode: args.mode,
      tcp: tcpParams(args, DEFAULT_LANGUAGE_SERVER_PORT),
      createConnection: (transport) => new JsonRpcConnection(transport),
      setup: (connection) => {
        registerBuiltinProviders(
          new LanguageServerProtocol(connection, { version }),
        );
      },
    });
  }

  return new JsonRpcServer({
    mode: args.mode,
    tcp: tcpParams(args, DEFAULT_DEBUG_ADAPTER_PORT),
    createConnection: (transport) => createDapConnection(transport),
    setup: (connection) => {
      new DebugAdapterServerProtocol(connection, {
        launcherPath: args.launcherPath,
      });
    },
  });
}

function aborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Serves until `signal` aborts. In stdio mode the server also stops once
 * the client closes its connection.
 */
export async function run(
  args: ServerArgs,
  signal: AbortSignal,
): Promise<void> {
  const server = createServer(args);
  await server.start();
  logger.info(`${args.command} started in ${args.mode} mode`);

  const stopped =
    args.mode === 'stdio'
      ? Promise.race([aborted(signal), server.waitForConnections()])
      : aborted(signal);
  await stopped;

  logger.info(`${args.command} stopping`);
  await server.close();
}
