/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { z } from 'zod';
import {
  connectTcp,
  DebugLogger,
  ResponseError,
  RpcErrorCodes,
  throwIfCancelled,
  type CancellationToken,
  type JsonRpcConnection,
} from '@keywright/core';

import { createDapConnection } from './dap-connection.js';
import {
  buildLauncherCommand,
  DEFAULT_LAUNCHER_TIMEOUT_SECONDS,
  launchArgumentsSchema,
  stringifyEnv,
  type LaunchArguments,
} from './launch-arguments.js';
import { findFreePort } from './ports.js';

const logger = DebugLogger.getLogger('keywright:debug-adapter');

export const CONNECT_FAILED_MESSAGE = "Can't connect to debug launcher.";

export interface DebuggeeProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  on(event: 'exit', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnDebuggee = (
  command: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv },
) => DebuggeeProcess;

export interface DebugAdapterOptions {
  /** Launcher script handed to the runtime; `launch` fails without one. */
  launcherPath?: string;
  /** Used when the launch configuration sets no `launcherTimeout`. */
  connectTimeoutMs?: number;
  spawnDebuggee?: SpawnDebuggee;
  findFreePort?: () => Promise<number>;
}

export const adapterCapabilities = {
  supportsConfigurationDoneRequest: true,
  supportTerminateDebuggee: true,
  supportSuspendDebuggee: true,
  supportsTerminateRequest: true,
  supportsCancelRequest: true,
} as const;

const optionalArguments = z.record(z.unknown()).optional();

const cancelArgumentsSchema = z
  .object({
    requestId: z.number().int().optional(),
    progressId: z.string().optional(),
  })
  .optional();

const defaultSpawn: SpawnDebuggee = (command, args, options) =>
  spawn(command, args, { ...options, stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * The client-facing side of a debug session. `launch` starts the launcher
 * and connects back to it; from then on the session's requests go to the
 * debuggee and its events come back to the client.
 */
export class DebugAdapterServerProtocol {
  private debuggee: JsonRpcConnection | undefined;
  private debuggeeTerminated = false;
  private readonly connectTimeoutMs: number;
  private readonly spawnDebuggee: SpawnDebuggee;
  private readonly findFreePort: () => Promise<number>;

  constructor(
    readonly connection: JsonRpcConnection,
    private readonly options: DebugAdapterOptions = {},
  ) {
    this.connectTimeoutMs =
      options.connectTimeoutMs ?? DEFAULT_LAUNCHER_TIMEOUT_SECONDS * 1000;
    this.spawnDebuggee = options.spawnDebuggee ?? defaultSpawn;
    this.findFreePort = options.findFreePort ?? (() => findFreePort());
    this.register();
    void connection.closed.then(() => this.debuggee?.shutdown());
  }

  get debuggeeConnection(): JsonRpcConnection | undefined {
    return this.debuggee;
  }

  private register(): void {
    const connection = this.connection;

    connection.onRequest('initialize', () => adapterCapabilities);

    connection.onRequest('cancel', cancelArgumentsSchema, (args) => {
      if (args?.requestId !== undefined) {
        connection.cancelIncoming(args.requestId);
      }
      return null;
    });

    connection.onRequest('launch', launchArgumentsSchema, (args, token) =>
      this.launch(args, token),
    );

    connection.onRequest('configurationDone', (args) =>
      this.requireDebuggee().sendRequest('configurationDone', args),
    );

    connection.onRequest(
      'setBreakpoints',
      z.record(z.unknown()),
      (args) => this.requireDebuggee().sendRequest('setBreakpoints', args),
    );

    connection.onRequest('threads', () => ({ threads: [] }));

    connection.onRequest('terminate', optionalArguments, async (args) => {
      if (this.isDebuggeeRunning()) {
        return await this.requireDebuggee().sendRequest('terminate', args);
      }
      await this.sendTerminated();
      return null;
    });

    connection.onRequest('disconnect', optionalArguments, async (args) => {
      if (!this.debuggee) {
        await this.sendTerminated();
        return null;
      }
      if (this.isDebuggeeRunning() && !this.debuggeeTerminated) {
        return await this.debuggee.sendRequest('disconnect', args);
      }
      return null;
    });
  }

  private async launch(
    args: LaunchArguments,
    token: CancellationToken,
  ): Promise<null> {
    const launcherPath = this.options.launcherPath;
    if (!launcherPath) {
      throw new ResponseError(
        RpcErrorCodes.InternalError,
        'No debug launcher configured.',
      );
    }

    const timeoutSeconds =
      args.launcherTimeout ?? Math.ceil(this.connectTimeoutMs / 1000);
    const port = await this.findFreePort();
    const command = buildLauncherCommand(args, {
      launcherPath,
      port,
      timeoutSeconds,
    });
    const env = stringifyEnv(args.env);
    logger.debug(() => `Launching ${command.join(' ')}`);

    switch (args.console) {
      case 'integrated':
      case 'external':
        await this.connection.sendRequest(
          'runInTerminal',
          {
            kind: args.console,
            title: args.name,
            cwd: args.cwd,
            args: command,
            env,
          },
          { token },
        );
        break;
      case 'none':
        this.startProcess(command, args.cwd, env);
        break;
      default:
        throw new ResponseError(
          RpcErrorCodes.InvalidParams,
          `Unknown console type "${args.console}".`,
        );
    }

    throwIfCancelled(token);
    await this.connectDebuggee(port, timeoutSeconds * 1000);
    return null;
  }

  private startProcess(
    command: string[],
    cwd: string,
    env: Record<string, string>,
  ): void {
    const [executable, ...rest] = command;
    if (executable === undefined) {
      throw new Error('Empty launcher command');
    }
    const child = this.spawnDebuggee(executable, rest, {
      cwd,
      env: { ...process.env, ...env },
    });
    const forward = (category: 'stdout' | 'stderr', stream: Readable | null) => {
      stream?.on('data', (chunk: Buffer | string) => {
        const output =
          typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        this.connection
          .sendNotification('output', { category, output })
          .catch((error: unknown) =>
            logger.warn('Could not forward debuggee output', error),
          );
      });
    };
    forward('stdout', child.stdout);
    forward('stderr', child.stderr);
    child.on('exit', (code) => {
      logger.debug(() => `Launcher exited with code ${String(code)}`);
    });
    child.on('error', (error) => {
      logger.error('Launcher failed to start', error);
    });
  }

  private async connectDebuggee(port: number, timeoutMs: number): Promise<void> {
    let debuggee: JsonRpcConnection;
    try {
      debuggee = createDapConnection(
        await connectTcp({ host: '127.0.0.1', port }, { timeoutMs }),
      );
    } catch (error) {
      logger.error(`Could not reach the launcher on port ${port}`, error);
      throw new ResponseError(RpcErrorCodes.InternalError, CONNECT_FAILED_MESSAGE);
    }

    debuggee.onUnhandledNotification(async ({ method, params }) => {
      if (method === 'terminated') {
        this.debuggeeTerminated = true;
      }
      await this.connection.sendNotification(method, params);
    });
    void debuggee.closed.then(() => this.onDebuggeeClosed());

    this.debuggee = debuggee;
    this.debuggeeTerminated = false;
    debuggee.listen();
    logger.info(`Connected to debuggee on port ${port}`);
  }

  private async onDebuggeeClosed(): Promise<void> {
    logger.debug('Debuggee connection closed');
    if (this.debuggeeTerminated || this.connection.state !== 'running') {
      return;
    }
    try {
      await this.sendTerminated();
    } catch (error) {
      logger.warn('Could not report the end of the session', error);
    }
  }

  private isDebuggeeRunning(): boolean {
    return this.debuggee?.state === 'running';
  }

  private requireDebuggee(): JsonRpcConnection {
    if (!this.debuggee) {
      throw new ResponseError(
        RpcErrorCodes.InternalError,
        'Debuggee not connected.',
      );
    }
    return this.debuggee;
  }

  private async sendTerminated(): Promise<void> {
    this.debuggeeTerminated = true;
    await this.connection.sendNotification('terminated');
  }
}
