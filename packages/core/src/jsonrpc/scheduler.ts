/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { setImmediate as yieldImmediate } from 'node:timers/promises';
import pLimit, { type LimitFunction } from 'p-limit';

/**
 * Runs handler bodies away from the routing loop. Tasks always start on a
 * later turn of the event loop than the one that scheduled them, and at most
 * `concurrency` run at once; the rest queue without bound.
 */
export class TaskScheduler {
  private readonly limit: LimitFunction;

  constructor(readonly concurrency: number = Number.POSITIVE_INFINITY) {
    this.limit = pLimit(concurrency);
  }

  schedule<T>(task: () => Promise<T> | T): Promise<T> {
    return this.limit(async () => {
      await yieldImmediate();
      return await task();
    });
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
