/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const DEFAULT_LAUNCHER_TIMEOUT_SECONDS = 5;

/**
 * `launch` arguments as written in a launch configuration. Unknown keys
 * are kept so configurations for newer clients still validate.
 */
export const launchArgumentsSchema = z
  .object({
    request: z.string().optional(),
    name: z.string().optional(),
    python: z.string().min(1),
    cwd: z.string().default('.'),
    target: z.string().optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.unknown()).optional(),
    console: z.string().default('integrated'),
    noDebug: z.boolean().optional(),
    pythonPath: z.array(z.string()).default([]),
    launcherArgs: z.array(z.string()).default([]),
    launcherTimeout: z.number().int().positive().optional(),
    variables: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type LaunchArguments = z.output<typeof launchArgumentsSchema>;

export interface LauncherCommandOptions {
  launcherPath: string;
  port: number;
  timeoutSeconds: number;
}

function display(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Command line of the launcher that runs the tests and accepts the debuggee
 * connection on `port`.
 */
export function buildLauncherCommand(
  launch: LaunchArguments,
  { launcherPath, port, timeoutSeconds }: LauncherCommandOptions,
): string[] {
  return [
    launch.python,
    '-u',
    launcherPath,
    '-p',
    String(port),
    '--wait-for-client',
    '-t',
    String(timeoutSeconds),
    '--debugpy',
    ...launch.launcherArgs,
    '--',
    ...launch.args,
    ...launch.pythonPath.flatMap((entry) => ['-P', entry]),
    ...Object.entries(launch.variables ?? {}).flatMap(([key, value]) => [
      '-v',
      `${key}:${display(value)}`,
    ]),
    ...(launch.target ? [launch.target] : []),
  ];
}

/** Environment values as strings; null becomes the empty string. */
export function stringifyEnv(
  env: Record<string, unknown> | undefined,
): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env ?? {}).map(([key, value]) => [key, display(value)]),
  );
}
