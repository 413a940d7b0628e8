/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface DebugOutputConfig {
  /** Comma separated list of `stderr` and `file`. */
  target: string;
  directory?: string;
  /** Explicit log file; overrides `directory`. */
  file?: string;
}

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[];
  level: LogLevel;
  output: DebugOutputConfig | string;
  colors: boolean;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
