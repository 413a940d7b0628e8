/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { LOG_LEVELS, type LogLevel, type ServerMode } from '@keywright/core';

import { FatalError } from '../utils/errors.js';
import { getCliVersion } from '../utils/version.js';

export const USAGE_EXIT_CODE = 2;

export type ServerCommand = 'language-server' | 'debug-adapter';

export interface CliArgs {
  command: ServerCommand;
  mode: ServerMode;
  host: string | undefined;
  port: number | undefined;
  launcherPath: string | undefined;
  log: boolean;
  logLevel: LogLevel | undefined;
  logFile: string | undefined;
  logJsonRpc: boolean;
  logJsonRpcData: boolean;
  logLanguageServer: boolean;
  logLanguageServerParts: boolean;
  logColored: boolean | undefined;
}

const COMMANDS: readonly ServerCommand[] = ['language-server', 'debug-adapter'];

function isServerCommand(value: unknown): value is ServerCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parses `argv` (without the node executable and script). Usage errors
 * reject with a {@link FatalError}; `--help` and `--version` print and exit
 * through yargs.
 */
export async function parseArguments(argv: string[]): Promise<CliArgs> {
  const parsed = await yargs(argv)
    .locale('en')
    .scriptName('keywright')
    .usage('$0 <command> [options]')
    .command('language-server', 'Start the language server')
    .command('debug-adapter', 'Start the debug adapter')
    .demandCommand(1, 'Choose a server to start')
    .option('mode', {
      type: 'string',
      choices: ['stdio', 'tcp'] as const,
      default: 'stdio' as const,
      description: 'Serve over stdio or listen on a TCP port',
    })
    .option('host', {
      type: 'string',
      description: 'Address to listen on in tcp mode',
    })
    .option('port', {
      type: 'number',
      description: 'Port to listen on in tcp mode',
    })
    .option('launcher-path', {
      type: 'string',
      description: 'Debug launcher script started by the debug adapter',
    })
    .option('log', {
      type: 'boolean',
      default: false,
      description: 'Enable logging',
    })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVELS,
      description: 'Lowest level that gets logged',
    })
    .option('log-file', {
      type: 'string',
      description: 'Write log entries to this file instead of stderr',
    })
    .option('log-json-rpc', {
      type: 'boolean',
      default: false,
      description: 'Log JSON-RPC connection events',
    })
    .option('log-json-rpc-data', {
      type: 'boolean',
      default: false,
      description: 'Log every message sent and received',
    })
    .option('log-language-server', {
      type: 'boolean',
      default: false,
      description: 'Log language server events',
    })
    .option('log-language-server-parts', {
      type: 'boolean',
      default: false,
      description: 'Log language server feature events',
    })
    .option('log-colored', {
      type: 'boolean',
      description: 'Colorize stderr log output',
    })
    .check((argv) => {
      if (argv.port !== undefined && !Number.isInteger(argv.port)) {
        throw new Error('--port must be an integer');
      }
      if (argv.port !== undefined && (argv.port < 0 || argv.port > 65535)) {
        throw new Error('--port must be between 0 and 65535');
      }
      return true;
    })
    .version(getCliVersion())
    .strict()
    .help()
    .fail((message, error) => {
      // yargs passes no error for its own usage failures
      throw new FatalError(
        error instanceof Error ? error.message : message,
        USAGE_EXIT_CODE,
      );
    })
    .parseAsync();

  const command = parsed._[0];
  if (!isServerCommand(command)) {
    throw new FatalError(`Unknown command: ${String(command)}`, USAGE_EXIT_CODE);
  }

  return {
    command,
    mode: parsed.mode,
    host: parsed.host,
    port: parsed.port,
    launcherPath: parsed.launcherPath,
    log: parsed.log,
    logLevel: parsed.logLevel,
    logFile: parsed.logFile,
    logJsonRpc: parsed.logJsonRpc,
    logJsonRpcData: parsed.logJsonRpcData,
    logLanguageServer: parsed.logLanguageServer,
    logLanguageServerParts: parsed.logLanguageServerParts,
    logColored: parsed.logColored,
  };
}
