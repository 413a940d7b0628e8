/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { setImmediate as yieldImmediate } from 'node:timers/promises';
import {
  CancellationTokenSource,
  type CancellationToken,
  type Disposable,
} from 'vscode-jsonrpc';

import { CancelledError } from './errors.js';
import type { RequestId } from './messages.js';

export type { CancellationToken };

/**
 * Tokens of inbound requests that are currently executing, keyed by id.
 */
export class CancellationRegistry {
  private readonly sources = new Map<RequestId, CancellationTokenSource>();

  create(id: RequestId): CancellationToken {
    const previous = this.sources.get(id);
    if (previous) {
      previous.cancel();
      previous.dispose();
    }
    const source = new CancellationTokenSource();
    this.sources.set(id, source);
    return source.token;
  }

  /** Returns false when no execution with that id is in flight. */
  cancel(id: RequestId): boolean {
    const source = this.sources.get(id);
    if (!source) {
      return false;
    }
    source.cancel();
    return true;
  }

  has(id: RequestId): boolean {
    return this.sources.has(id);
  }

  delete(id: RequestId): void {
    const source = this.sources.get(id);
    if (!source) {
      return;
    }
    this.sources.delete(id);
    source.dispose();
  }

  cancelAll(): void {
    for (const source of this.sources.values()) {
      source.cancel();
    }
  }

  get size(): number {
    return this.sources.size;
  }
}

export function throwIfCancelled(token: CancellationToken | undefined): void {
  if (token?.isCancellationRequested) {
    throw new CancelledError();
  }
}

/**
 * Cancellable suspension point: lets other work run, then polls the token.
 */
export async function checkpoint(
  token: CancellationToken | undefined,
): Promise<void> {
  await yieldImmediate();
  throwIfCancelled(token);
}

/**
 * Cancelled when any parent token is, or on demand. Dispose it when done so
 * the listeners on the parents are released.
 */
export class LinkedCancellationSource {
  private readonly source = new CancellationTokenSource();
  private readonly listeners: Disposable[] = [];

  constructor(...parents: Array<CancellationToken | undefined>) {
    for (const parent of parents) {
      if (!parent) {
        continue;
      }
      if (parent.isCancellationRequested) {
        this.source.cancel();
        continue;
      }
      this.listeners.push(
        parent.onCancellationRequested(() => this.source.cancel()),
      );
    }
  }

  get token(): CancellationToken {
    return this.source.token;
  }

  cancel(): void {
    this.source.cancel();
  }

  dispose(): void {
    for (const listener of this.listeners) {
      listener.dispose();
    }
    this.listeners.length = 0;
    this.source.dispose();
  }
}
