/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';

import { TaskScheduler } from './scheduler.js';

describe('TaskScheduler', () => {
  it('never starts a task on the turn that scheduled it', async () => {
    const scheduler = new TaskScheduler();
    let started = false;

    const done = scheduler.schedule(() => {
      started = true;
      return 'ok';
    });

    expect(started).toBe(false);
    await expect(done).resolves.toBe('ok');
    expect(started).toBe(true);
  });

  it('propagates task failures to the caller', async () => {
    const scheduler = new TaskScheduler();

    await expect(
      scheduler.schedule(async () => {
        throw new Error('handler failed');
      }),
    ).rejects.toThrow('handler failed');
  });

  it('bounds how many tasks run at once', async () => {
    const scheduler = new TaskScheduler(2);
    let running = 0;
    let peak = 0;
    let finished = 0;
    const release: Array<() => void> = [];

    const tasks = Array.from({ length: 5 }, () =>
      scheduler.schedule(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await new Promise<void>((resolve) => release.push(resolve));
        running -= 1;
        finished += 1;
      }),
    );

    while (release.length < 2) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    expect(scheduler.activeCount).toBe(2);
    expect(scheduler.pendingCount).toBe(3);

    while (finished < 5) {
      release.shift()?.();
      await new Promise((resolve) => setImmediate(resolve));
    }
    await Promise.all(tasks);

    expect(peak).toBe(2);
  });
});
