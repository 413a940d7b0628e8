/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugSettings } from '@keywright/core';

import type { CliArgs } from './args.js';

type LoggingFlags = Pick<
  CliArgs,
  | 'log'
  | 'logLevel'
  | 'logFile'
  | 'logJsonRpc'
  | 'logJsonRpcData'
  | 'logLanguageServer'
  | 'logLanguageServerParts'
  | 'logColored'
>;

/**
 * Maps the logging flags onto debug settings for the CLI layer of the
 * configuration. Flags that were not given leave their setting out, so
 * settings files and the environment still apply.
 */
export function buildDebugSettings(args: LoggingFlags): Partial<DebugSettings> {
  const namespaces: string[] = [];
  if (args.logJsonRpc) {
    namespaces.push('keywright:jsonrpc', 'keywright:debug-adapter');
  }
  if (args.logJsonRpcData) {
    namespaces.push('keywright:jsonrpc:message', 'keywright:debug-adapter:message');
  }
  if (args.logLanguageServer) {
    namespaces.push('keywright:language-server');
  }
  if (args.logLanguageServerParts) {
    namespaces.push('keywright:language-server:parts');
  }
  if (args.log && namespaces.length === 0) {
    namespaces.push('keywright:*');
  }

  const settings: Partial<DebugSettings> = {};
  if (namespaces.length > 0) {
    settings.enabled = true;
    settings.namespaces = namespaces.includes('keywright:*')
      ? namespaces
      : ['keywright:cli', ...namespaces];
  }
  if (args.logLevel) {
    settings.level = args.logLevel;
  } else if (args.logJsonRpcData) {
    // message bodies are logged at trace
    settings.level = 'trace';
  }
  if (args.logFile) {
    settings.output = { target: 'file', file: args.logFile };
  }
  if (args.logColored !== undefined) {
    settings.colors = args.logColored;
  }
  return settings;
}
