/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { dirname, join } from 'node:path';

import { getDefaultLogDirectory } from '../utils/paths.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;

export class FileOutput {
  private static instance: FileOutput | undefined;
  private logDirectory: string;
  private currentLogFile: string;
  private explicitFile = false;
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;
  private readonly maxFileSize = 10 * 1024 * 1024;
  private readonly maxQueueSize = 1000;
  private readonly batchSize = 50;
  private readonly flushInterval = 1000;
  private readonly debugRunId: string;

  private constructor() {
    this.logDirectory = getDefaultLogDirectory();
    this.debugRunId = process.env.KEYWRIGHT_RUN_ID || String(process.pid);
    this.currentLogFile = this.generateLogFileName();
  }

  static getInstance(): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput();
    }
    return FileOutput.instance;
  }

  static resetForTesting(): void {
    if (FileOutput.instance?.flushTimeout) {
      clearTimeout(FileOutput.instance.flushTimeout);
    }
    FileOutput.instance = undefined;
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string {
    return this.currentLogFile;
  }

  /** Writes go to this exact file from now on, without rotation. */
  setLogFile(file: string): void {
    this.currentLogFile = file;
    this.logDirectory = dirname(file);
    this.explicitFile = true;
  }

  setLogDirectory(directory: string): void {
    if (this.explicitFile || directory === this.logDirectory) {
      return;
    }
    this.logDirectory = directory;
    this.currentLogFile = this.generateLogFileName();
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.writeQueue.push(entry);
    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }

    if (this.writeQueue.length >= this.batchSize || !this.isWriting) {
      await this.flushQueue();
    } else {
      this.startFlushTimer();
    }
  }

  async flush(): Promise<void> {
    let batches = Math.ceil(this.writeQueue.length / this.batchSize);
    while (batches > 0 && this.writeQueue.length > 0 && !this.isWriting) {
      batches -= 1;
      await this.flushQueue();
    }
  }

  async dispose(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    await this.flush();
    this.disposed = true;
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => {
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, this.flushInterval);
    this.flushTimeout.unref();
  }

  private async flushQueue(): Promise<void> {
    if (this.isWriting || this.writeQueue.length === 0 || this.disposed) {
      return;
    }

    this.isWriting = true;
    const entries = this.writeQueue.splice(0, this.batchSize);

    try {
      await fs.mkdir(this.logDirectory, { recursive: true, mode: 0o700 });
      await this.checkFileRotation();

      const jsonl =
        entries.map((entry) => JSON.stringify(entry)).join('\n') + '\n';
      await fs.appendFile(this.currentLogFile, jsonl, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      // The logger must never take the server down; report on stderr only.
      process.stderr.write(
        `FileOutput: failed to write log entries: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...entries);
      }
    } finally {
      this.isWriting = false;
    }
  }

  private async checkFileRotation(): Promise<void> {
    if (this.explicitFile) {
      return;
    }
    try {
      const stats = await fs.stat(this.currentLogFile);
      if (stats.size >= this.maxFileSize) {
        this.currentLogFile = this.generateLogFileName();
      }
    } catch {
      // not created yet
    }
  }

  private generateLogFileName(): string {
    const now = new Date();
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    return join(
      this.logDirectory,
      `keywright-${this.debugRunId}-${datePart}-${timePart}.jsonl`,
    );
  }
}
