/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CancellationToken, type Disposable } from 'vscode-jsonrpc';

import { DebugLogger } from '../debug/DebugLogger.js';
import { LinkedCancellationSource } from '../jsonrpc/cancellation.js';
import { isCancelledError } from '../jsonrpc/errors.js';

export type CollectHandler<TParams, TResult> = (
  params: TParams,
  token: CancellationToken,
) => TResult | Promise<TResult>;

export type CollectPredicate<TParams> = (params: TParams) => boolean;

export type CollectOutcome<TResult> =
  | { status: 'fulfilled'; value: TResult }
  | { status: 'rejected'; reason: unknown }
  | { status: 'cancelled'; reason: unknown };

export interface AsyncCollectorOptions {
  logger?: DebugLogger;
}

interface Subscription<TParams, TResult> {
  handler: CollectHandler<TParams, TResult>;
  accepts?: CollectPredicate<TParams>;
}

/**
 * Fans one call out to every subscriber and gathers one outcome per
 * subscriber. A subscriber that throws never affects the others, and
 * neither `collect` nor `fanOut` rejects, even when `onOutcome` throws.
 */
export class AsyncCollector<TParams, TResult> {
  private subscriptions: Array<Subscription<TParams, TResult>> = [];
  private readonly logger: DebugLogger;

  constructor(
    readonly name: string,
    options: AsyncCollectorOptions = {},
  ) {
    this.logger = options.logger ?? DebugLogger.getLogger('keywright:jsonrpc');
  }

  get size(): number {
    return this.subscriptions.length;
  }

  subscribe(
    handler: CollectHandler<TParams, TResult>,
    accepts?: CollectPredicate<TParams>,
  ): Disposable {
    const subscription: Subscription<TParams, TResult> = { handler, accepts };
    this.subscriptions = [...this.subscriptions, subscription];
    return {
      dispose: () => {
        this.subscriptions = this.subscriptions.filter(
          (s) => s !== subscription,
        );
      },
    };
  }

  /**
   * Outcome order is not part of the contract.
   */
  async collect(
    params: TParams,
    token: CancellationToken = CancellationToken.None,
  ): Promise<Array<CollectOutcome<TResult>>> {
    return await this.fanOut(params, token);
  }

  /**
   * Like {@link collect}, reporting each outcome as soon as it settles.
   */
  async fanOut(
    params: TParams,
    token: CancellationToken,
    onOutcome?: (outcome: CollectOutcome<TResult>) => void,
  ): Promise<Array<CollectOutcome<TResult>>> {
    // Subscribing mid-collect replaces the array, so this is a snapshot.
    const snapshot = this.subscriptions;
    const runs: Array<Promise<CollectOutcome<TResult>>> = [];

    for (const subscription of snapshot) {
      let accepted: boolean;
      try {
        accepted = subscription.accepts?.(params) ?? true;
      } catch (error) {
        this.logFailure(error);
        const outcome: CollectOutcome<TResult> = {
          status: 'rejected',
          reason: error,
        };
        this.report(onOutcome, outcome);
        runs.push(Promise.resolve(outcome));
        continue;
      }
      if (accepted) {
        runs.push(
          this.run(subscription, params, token).then((outcome) => {
            this.report(onOutcome, outcome);
            return outcome;
          }),
        );
      }
    }

    return await Promise.all(runs);
  }

  private async run(
    subscription: Subscription<TParams, TResult>,
    params: TParams,
    token: CancellationToken,
  ): Promise<CollectOutcome<TResult>> {
    try {
      const value = await subscription.handler(params, token);
      return { status: 'fulfilled', value };
    } catch (error) {
      if (isCancelledError(error)) {
        return { status: 'cancelled', reason: error };
      }
      this.logFailure(error);
      return { status: 'rejected', reason: error };
    }
  }

  private report(
    onOutcome: ((outcome: CollectOutcome<TResult>) => void) | undefined,
    outcome: CollectOutcome<TResult>,
  ): void {
    try {
      onOutcome?.(outcome);
    } catch (error) {
      this.logFailure(error, 'outcome callback');
    }
  }

  private logFailure(error: unknown, source = 'subscriber'): void {
    this.logger.error(
      () =>
        `${this.name} ${source} failed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`,
    );
  }
}

/**
 * First value that satisfies `accept` wins; the other subscribers see their
 * token set once it arrives. Resolves undefined when nothing qualifies.
 */
export async function collectFirst<TParams, TResult>(
  collector: AsyncCollector<TParams, TResult>,
  params: TParams,
  accept: (value: TResult) => boolean,
  token?: CancellationToken,
): Promise<TResult | undefined> {
  const source = new LinkedCancellationSource(token);
  const race: { winner?: { value: TResult } } = {};
  try {
    await collector.fanOut(params, source.token, (outcome) => {
      if (
        !race.winner &&
        outcome.status === 'fulfilled' &&
        accept(outcome.value)
      ) {
        race.winner = { value: outcome.value };
        source.cancel();
      }
    });
    return race.winner?.value;
  } finally {
    source.dispose();
  }
}
