/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';

import { buildDebugSettings } from '../src/config/debug-settings.js';

const quiet = {
  log: false,
  logLevel: undefined,
  logFile: undefined,
  logJsonRpc: false,
  logJsonRpcData: false,
  logLanguageServer: false,
  logLanguageServerParts: false,
  logColored: undefined,
};

describe('buildDebugSettings', () => {
  it('leaves every setting to the other layers without flags', () => {
    expect(buildDebugSettings(quiet)).toEqual({});
  });

  it('enables every namespace for --log', () => {
    expect(buildDebugSettings({ ...quiet, log: true })).toEqual({
      enabled: true,
      namespaces: ['keywright:*'],
    });
  });

  it('narrows logging to the requested parts', () => {
    expect(
      buildDebugSettings({
        ...quiet,
        log: true,
        logLanguageServer: true,
        logLanguageServerParts: true,
      }),
    ).toEqual({
      enabled: true,
      namespaces: [
        'keywright:cli',
        'keywright:language-server',
        'keywright:language-server:parts',
      ],
    });
  });

  it('logs message bodies at trace unless a level is given', () => {
    expect(buildDebugSettings({ ...quiet, logJsonRpcData: true })).toEqual({
      enabled: true,
      namespaces: [
        'keywright:cli',
        'keywright:jsonrpc:message',
        'keywright:debug-adapter:message',
      ],
      level: 'trace',
    });
    expect(
      buildDebugSettings({ ...quiet, logJsonRpcData: true, logLevel: 'info' })
        .level,
    ).toBe('info');
  });

  it('writes to the log file and honours --log-colored', () => {
    expect(
      buildDebugSettings({
        ...quiet,
        logFile: '/tmp/keywright.log',
        logColored: false,
      }),
    ).toEqual({
      output: { target: 'file', file: '/tmp/keywright.log' },
      colors: false,
    });
  });
});
