/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';

import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import { LOG_LEVELS, type LogEntry, type LogLevel } from './types.js';

type LogMessage = string | (() => string);

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _fileOutput: FileOutput;
  private _enabled: boolean;
  private _level: LogLevel;
  private readonly boundOnConfigChange: () => void;

  /**
   * Returns the logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    this._fileOutput = FileOutput.getInstance();
    this._enabled = this.checkEnabled();
    this._level = this._configManager.getEffectiveConfig().level;
    this.applyOutputSettings();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return (
      this._enabled &&
      LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this._level)
    );
  }

  trace(message: LogMessage, ...args: unknown[]): void {
    this.write('trace', message, args);
  }

  debug(message: LogMessage, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: LogMessage, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: LogMessage, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: LogMessage, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, messageOrFn: LogMessage, args: unknown[]) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }
    message = this.redactSensitive(message);

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        namespace: this._namespace,
        level,
        message,
        args: args.length > 0 ? args.map(serializeArg) : undefined,
        runId: this._fileOutput.runId,
        pid: process.pid,
      };
      void this._fileOutput.write(entry);
    }

    if (target.includes('stderr')) {
      this.debugInstance('[%s] %s', level.toUpperCase(), message, ...args);
    }
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }
    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }
    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private applyOutputSettings(): void {
    const config = this._configManager.getEffectiveConfig();
    // `debug` has its own DEBUG-based switch; ours decides instead.
    this.debugInstance.enabled = true;
    this.debugInstance.useColors = config.colors;
    const logFile = this._configManager.getLogFile();
    if (logFile) {
      this._fileOutput.setLogFile(logFile);
    } else if (typeof config.output !== 'string' && config.output.directory) {
      this._fileOutput.setLogDirectory(config.output.directory);
    }
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
    this._level = this._configManager.getEffectiveConfig().level;
    this.applyOutputSettings();
  }

  async dispose(): Promise<void> {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
    await this._fileOutput.flush();
  }
}

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message, stack: arg.stack };
  }
  return arg;
}
