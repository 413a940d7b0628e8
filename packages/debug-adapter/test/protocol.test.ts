/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CancelledError,
  JsonRpcConnection,
  listenTcp,
  StreamTransport,
  type TcpListener,
} from '@keywright/core';

import { createDapConnection } from '../src/dap-connection.js';
import { findFreePort } from '../src/ports.js';
import {
  DebugAdapterServerProtocol,
  type DebugAdapterOptions,
  type SpawnDebuggee,
} from '../src/protocol.js';

const LAUNCHER = '/opt/keywright/launcher';

interface Session {
  adapter: DebugAdapterServerProtocol;
  client: JsonRpcConnection;
  events: Array<[string, unknown]>;
  terminalRequests: unknown[];
}

class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
}

describe('DebugAdapterServerProtocol', () => {
  const cleanup: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const dispose of cleanup.splice(0).reverse()) {
      await dispose();
    }
  });

  function openSession(
    options: DebugAdapterOptions = {},
    onRunInTerminal: (args: unknown) => unknown = () => ({ processId: 4242 }),
  ): Session {
    const toAdapter = new PassThrough();
    const toClient = new PassThrough();
    const connection = createDapConnection(
      new StreamTransport(toAdapter, toClient),
      { drainTimeoutMs: 50 },
    );
    const adapter = new DebugAdapterServerProtocol(connection, {
      launcherPath: LAUNCHER,
      ...options,
    });
    connection.listen();

    const client = createDapConnection(new StreamTransport(toClient, toAdapter), {
      drainTimeoutMs: 50,
    });
    const events: Array<[string, unknown]> = [];
    const terminalRequests: unknown[] = [];
    client.onRequest('runInTerminal', (args) => {
      terminalRequests.push(args);
      return onRunInTerminal(args);
    });
    client.onUnhandledNotification(({ method, params }) => {
      events.push([method, params]);
    });
    client.listen();

    cleanup.push(async () => {
      await client.shutdown();
      await connection.shutdown();
    });
    return { adapter, client, events, terminalRequests };
  }

  /** A launcher stand-in that accepts the adapter's debuggee connection. */
  async function startDebuggee(): Promise<{
    listener: TcpListener;
    port: number;
    connected: Promise<JsonRpcConnection>;
  }> {
    let accept: (connection: JsonRpcConnection) => void = () => {};
    const connected = new Promise<JsonRpcConnection>((resolve) => {
      accept = resolve;
    });
    const listener = await listenTcp({ port: 0 }, (transport) => {
      const debuggee = createDapConnection(transport, { drainTimeoutMs: 50 });
      debuggee.onRequest('configurationDone', () => null);
      debuggee.onRequest('setBreakpoints', () => ({
        breakpoints: [{ verified: true, line: 3 }],
      }));
      debuggee.onRequest('disconnect', () => null);
      debuggee.listen();
      cleanup.push(() => debuggee.shutdown());
      accept(debuggee);
    });
    cleanup.push(() => listener.close());
    return { listener, port: listener.address().port, connected };
  }

  it('answers initialize with the adapter capabilities', async () => {
    const { client } = openSession();

    await expect(
      client.sendRequest('initialize', { adapterID: 'keywright' }),
    ).resolves.toEqual({
      supportsConfigurationDoneRequest: true,
      supportTerminateDebuggee: true,
      supportSuspendDebuggee: true,
      supportsTerminateRequest: true,
      supportsCancelRequest: true,
    });
  });

  it('reports no threads', async () => {
    const { client } = openSession();

    await expect(client.sendRequest('threads')).resolves.toEqual({
      threads: [],
    });
  });

  it('launches in the terminal, then relays requests and events', async () => {
    const debuggee = await startDebuggee();
    const session = openSession({ findFreePort: async () => debuggee.port });

    await expect(
      session.client.sendRequest('launch', {
        request: 'launch',
        name: 'Run suite',
        python: 'python3',
        target: 'suite.robot',
        env: { ROBOT_ENV: 'dev', UNSET: null },
        launcherTimeout: 2,
      }),
    ).resolves.toBeNull();

    expect(session.terminalRequests).toEqual([
      {
        kind: 'integrated',
        title: 'Run suite',
        cwd: '.',
        args: [
          'python3',
          '-u',
          LAUNCHER,
          '-p',
          String(debuggee.port),
          '--wait-for-client',
          '-t',
          '2',
          '--debugpy',
          '--',
          'suite.robot',
        ],
        env: { ROBOT_ENV: 'dev', UNSET: '' },
      },
    ]);

    await expect(
      session.client.sendRequest('setBreakpoints', {
        source: { path: 'suite.robot' },
        breakpoints: [{ line: 3 }],
      }),
    ).resolves.toEqual({ breakpoints: [{ verified: true, line: 3 }] });
    await expect(
      session.client.sendRequest('configurationDone'),
    ).resolves.toBeNull();

    const remote = await debuggee.connected;
    await remote.sendNotification('stopped', {
      reason: 'breakpoint',
      threadId: 1,
    });
    await vi.waitFor(() =>
      expect(session.events).toEqual([
        ['stopped', { reason: 'breakpoint', threadId: 1 }],
      ]),
    );
  });

  it('spawns the launcher itself when there is no console', async () => {
    const debuggee = await startDebuggee();
    const child = new FakeProcess();
    const spawnDebuggee = vi.fn<SpawnDebuggee>(() => child);
    const session = openSession({
      findFreePort: async () => debuggee.port,
      spawnDebuggee,
    });

    await session.client.sendRequest('launch', {
      python: 'python3',
      console: 'none',
      cwd: '/work',
      env: { ROBOT_ENV: 'ci' },
    });
    child.stdout.write('Suite started\n');
    child.stderr.write('warning\n');

    expect(session.terminalRequests).toEqual([]);
    expect(spawnDebuggee).toHaveBeenCalledTimes(1);
    expect(spawnDebuggee).toHaveBeenCalledWith(
      'python3',
      expect.arrayContaining(['-u', LAUNCHER]),
      expect.objectContaining({
        cwd: '/work',
        env: expect.objectContaining({ ROBOT_ENV: 'ci' }),
      }),
    );
    await vi.waitFor(() => expect(session.events).toHaveLength(2));
    expect(session.events).toEqual(
      expect.arrayContaining([
        ['output', { category: 'stdout', output: 'Suite started\n' }],
        ['output', { category: 'stderr', output: 'warning\n' }],
      ]),
    );
  });

  it('rejects an unknown console type', async () => {
    const { client } = openSession({ findFreePort: async () => 1 });

    await expect(
      client.sendRequest('launch', { python: 'python3', console: 'tmux' }),
    ).rejects.toThrow('Unknown console type "tmux".');
  });

  it('refuses to launch without a launcher', async () => {
    const { client } = openSession({ launcherPath: undefined });

    await expect(
      client.sendRequest('launch', { python: 'python3' }),
    ).rejects.toThrow('No debug launcher configured.');
  });

  it('gives up when the launcher never listens', async () => {
    const port = await findFreePort();
    const { client } = openSession({ findFreePort: async () => port });

    await expect(
      client.sendRequest('launch', { python: 'python3', launcherTimeout: 1 }),
    ).rejects.toThrow("Can't connect to debug launcher.");
  });

  it('cancels a launch through the cancel request', async () => {
    const { client, terminalRequests } = openSession(
      { findFreePort: async () => 1 },
      () => new Promise(() => {}),
    );

    const launching = client.sendRequest('launch', { python: 'python3' });
    await vi.waitFor(() => expect(terminalRequests).toHaveLength(1));
    await expect(
      client.sendRequest('cancel', { requestId: 1 }),
    ).resolves.toBeNull();

    await expect(launching).rejects.toBeInstanceOf(CancelledError);
  });

  it('reports termination when disconnecting before launch', async () => {
    const { client, events } = openSession();

    await expect(client.sendRequest('disconnect', {})).resolves.toBeNull();
    await vi.waitFor(() => expect(events).toEqual([['terminated', undefined]]));
  });

  it('reports termination when the debuggee goes away', async () => {
    const debuggee = await startDebuggee();
    const session = openSession({ findFreePort: async () => debuggee.port });
    await session.client.sendRequest('launch', {
      python: 'python3',
      launcherTimeout: 2,
    });

    const remote = await debuggee.connected;
    await remote.shutdown();

    await vi.waitFor(() =>
      expect(session.events).toEqual([['terminated', undefined]]),
    );
    expect(session.adapter.debuggeeConnection?.state).toBe('closed');
  });
});
