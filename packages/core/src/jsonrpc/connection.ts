/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { setTimeout as delay } from 'node:timers/promises';
import { CancellationTokenSource, type CancellationToken } from 'vscode-jsonrpc';
import { z, ZodType, type ZodTypeDef } from 'zod';

import { DebugLogger } from '../debug/DebugLogger.js';
import { CancellationRegistry } from './cancellation.js';
import { InvalidMessageError, jsonRpcCodec, type MessageCodec } from './codec.js';
import {
  CancelledError,
  ConnectionClosedError,
  fromRpcErrorObject,
  isFatalError,
  RequestTimeoutError,
  ResponseError,
  RpcErrorCodes,
  toRpcErrorObject,
  TransportError,
} from './errors.js';
import {
  createNotification,
  createRequest,
  errorResponse,
  isNotificationMessage,
  isRequestMessage,
  successResponse,
  type Message,
  type NotificationMessage,
  type RequestId,
  type RequestMessage,
  type ResponseMessage,
} from './messages.js';
import { TaskScheduler } from './scheduler.js';
import type { MessageTransport } from './transport.js';

export type ConnectionState = 'created' | 'running' | 'shuttingDown' | 'closed';

export const CANCEL_REQUEST_METHOD = '$/cancelRequest';

export interface HandlerContext {
  connection: JsonRpcConnection;
  method: string;
  /** Undefined for notifications. */
  id?: RequestId;
}

/**
 * `token` is the request's own token for requests and the connection's
 * lifetime token for notifications; both are set on shutdown.
 */
export type RequestHandler<P, R> = (
  params: P,
  token: CancellationToken,
  context: HandlerContext,
) => R | Promise<R>;

export type NotificationHandler<P> = (
  params: P,
  token: CancellationToken,
  context: HandlerContext,
) => void | Promise<void>;

export type ParamsSchema<P> = ZodType<P, ZodTypeDef, unknown>;

export type MethodRegistration<P = unknown, R = unknown> =
  | {
      kind: 'request';
      method: string;
      params: ParamsSchema<P>;
      handler: RequestHandler<P, R>;
    }
  | {
      kind: 'request';
      method: string;
      params?: undefined;
      handler: RequestHandler<unknown, R>;
    }
  | {
      kind: 'notification';
      method: string;
      params: ParamsSchema<P>;
      handler: NotificationHandler<P>;
    }
  | {
      kind: 'notification';
      method: string;
      params?: undefined;
      handler: NotificationHandler<unknown>;
    };

interface HandlerEntry {
  kind: 'request' | 'notification';
  method: string;
  invoke: (
    params: unknown,
    token: CancellationToken,
    context: HandlerContext,
  ) => Promise<unknown>;
}

interface PendingCall {
  id: RequestId;
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

export interface RequestOptions {
  timeoutMs?: number;
  token?: CancellationToken;
}

export interface ConnectionOptions {
  codec?: MessageCodec;
  scheduler?: TaskScheduler;
  /** Notification that cancels an inbound request; null disables it. */
  cancelMethod?: string | null;
  /** Allocates ids for outbound requests. Must never repeat. */
  nextId?: () => RequestId;
  /** Applied to every outbound request without its own timeout. */
  defaultRequestTimeoutMs?: number;
  /** Upper bound on waiting for in-flight handlers during shutdown. */
  drainTimeoutMs?: number;
  loggerNamespace?: string;
}

const DEFAULT_DRAIN_TIMEOUT_MS = 2_000;

const cancelParamsSchema = z.object({
  id: z.union([z.string(), z.number()]),
});

function sequentialIds(): () => RequestId {
  let next = 1;
  return () => next++;
}

/**
 * One JSON-RPC peer over one transport. Requests flow in both directions:
 * inbound ones are routed to registered handlers, outbound ones wait in the
 * pending table until the peer answers.
 */
export class JsonRpcConnection {
  private readonly logger: DebugLogger;
  private readonly messageLogger: DebugLogger;
  private readonly codec: MessageCodec;
  private readonly scheduler: TaskScheduler;
  private readonly cancelMethod: string | null;
  private readonly nextId: () => RequestId;
  private readonly defaultRequestTimeoutMs: number | undefined;
  private readonly drainTimeoutMs: number;

  private readonly handlers = new Map<string, HandlerEntry>();
  private unhandledNotification:
    | NotificationHandler<NotificationMessage>
    | undefined;
  private readonly pending = new Map<RequestId, PendingCall>();
  private readonly cancellations = new CancellationRegistry();
  private readonly inflight = new Set<Promise<void>>();
  private readonly lifetime = new CancellationTokenSource();

  private _state: ConnectionState = 'created';
  private _closeReason: Error | undefined;
  private shutdownPromise: Promise<void> | undefined;
  private resolveClosed: () => void = () => {};

  readonly closed: Promise<void>;

  constructor(
    private readonly transport: MessageTransport,
    options: ConnectionOptions = {},
  ) {
    const namespace = options.loggerNamespace ?? 'keywright:jsonrpc';
    this.logger = DebugLogger.getLogger(namespace);
    this.messageLogger = DebugLogger.getLogger(`${namespace}:message`);
    this.codec = options.codec ?? jsonRpcCodec;
    this.scheduler = options.scheduler ?? new TaskScheduler();
    this.cancelMethod =
      options.cancelMethod === undefined
        ? CANCEL_REQUEST_METHOD
        : options.cancelMethod;
    this.nextId = options.nextId ?? sequentialIds();
    this.defaultRequestTimeoutMs = options.defaultRequestTimeoutMs;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** The fatal error that closed the connection, if any. */
  get closeReason(): Error | undefined {
    return this._closeReason;
  }

  get pendingRequestCount(): number {
    return this.pending.size;
  }

  get inflightHandlerCount(): number {
    return this.inflight.size;
  }

  registerMethod<P, R>(registration: MethodRegistration<P, R>): void {
    if (this._state === 'shuttingDown' || this._state === 'closed') {
      throw new ConnectionClosedError(
        `Cannot register '${registration.method}' on a closed connection`,
      );
    }
    if (this.handlers.has(registration.method)) {
      throw new Error(
        `A handler for '${registration.method}' is already registered`,
      );
    }
    this.handlers.set(registration.method, {
      kind: registration.kind,
      method: registration.method,
      invoke: toInvoker(registration),
    });
  }

  onRequest<R>(method: string, handler: RequestHandler<unknown, R>): void;
  onRequest<P, R>(
    method: string,
    params: ParamsSchema<P>,
    handler: RequestHandler<P, R>,
  ): void;
  onRequest<P, R>(
    method: string,
    paramsOrHandler: ParamsSchema<P> | RequestHandler<unknown, R>,
    handler?: RequestHandler<P, R>,
  ): void {
    if (paramsOrHandler instanceof ZodType) {
      if (!handler) {
        throw new Error(`Missing handler for '${method}'`);
      }
      this.registerMethod({
        kind: 'request',
        method,
        params: paramsOrHandler,
        handler,
      });
      return;
    }
    this.registerMethod({ kind: 'request', method, handler: paramsOrHandler });
  }

  onNotification(method: string, handler: NotificationHandler<unknown>): void;
  onNotification<P>(
    method: string,
    params: ParamsSchema<P>,
    handler: NotificationHandler<P>,
  ): void;
  onNotification<P>(
    method: string,
    paramsOrHandler: ParamsSchema<P> | NotificationHandler<unknown>,
    handler?: NotificationHandler<P>,
  ): void {
    if (paramsOrHandler instanceof ZodType) {
      if (!handler) {
        throw new Error(`Missing handler for '${method}'`);
      }
      this.registerMethod({
        kind: 'notification',
        method,
        params: paramsOrHandler,
        handler,
      });
      return;
    }
    this.registerMethod({
      kind: 'notification',
      method,
      handler: paramsOrHandler,
    });
  }

  /**
   * Receives every notification that has no handler of its own, except
   * `$/` protocol notifications. Replaces any earlier fallback.
   */
  onUnhandledNotification(
    handler: NotificationHandler<NotificationMessage>,
  ): void {
    this.unhandledNotification = handler;
  }

  /**
   * Starts the receive loop. Messages are routed one at a time in arrival
   * order; handler bodies run on the scheduler.
   */
  listen(): void {
    if (this._state !== 'created') {
      throw new Error(`Cannot listen on a connection in state '${this._state}'`);
    }
    this._state = 'running';
    void this.receiveLoop();
  }

  /** Resolves with the peer's result, validated against `result`. */
  async request<R>(
    method: string,
    result: ParamsSchema<R>,
    params?: unknown,
    options?: RequestOptions,
  ): Promise<R> {
    const raw = await this.sendRequest(method, params, options);
    const parsed = result.safeParse(raw);
    if (!parsed.success) {
      throw new ResponseError(
        RpcErrorCodes.InternalError,
        `Unexpected result for '${method}': ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  sendRequest(
    method: string,
    params?: unknown,
    options: RequestOptions = {},
  ): Promise<unknown> {
    if (this._state === 'shuttingDown' || this._state === 'closed') {
      return Promise.reject(
        new ConnectionClosedError(
          `Cannot send '${method}': connection is ${this._state}`,
        ),
      );
    }
    if (options.token?.isCancellationRequested) {
      return Promise.reject(new CancelledError());
    }

    const id = this.nextId();
    const timeoutMs = options.timeoutMs ?? this.defaultRequestTimeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      let tokenListener: { dispose(): void } | undefined;

      const call: PendingCall = {
        id,
        method,
        resolve,
        reject,
        cleanup: () => {
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          tokenListener?.dispose();
        },
      };
      this.pending.set(id, call);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (this.settlePending(id, new RequestTimeoutError(method, timeoutMs))) {
            this.sendCancelNotification(id);
          }
        }, timeoutMs);
      }

      if (options.token) {
        tokenListener = options.token.onCancellationRequested(() => {
          if (this.settlePending(id, new CancelledError())) {
            this.sendCancelNotification(id);
          }
        });
      }

      this.write(createRequest(id, method, params)).catch((error: unknown) => {
        this.settlePending(
          id,
          error instanceof Error ? error : new TransportError(String(error)),
        );
      });
    });
  }

  async sendNotification(method: string, params?: unknown): Promise<void> {
    if (this._state === 'closed') {
      throw new ConnectionClosedError(
        `Cannot send '${method}': connection is closed`,
      );
    }
    await this.write(createNotification(method, params));
  }

  /**
   * Sets the token of an inbound request that is still executing. Returns
   * false (and does nothing) when there is none.
   */
  cancelIncoming(id: RequestId): boolean {
    const cancelled = this.cancellations.cancel(id);
    this.logger.debug(() =>
      cancelled
        ? `cancellation requested for request ${String(id)}`
        : `cancellation for unknown or finished request ${String(id)} ignored`,
    );
    return cancelled;
  }

  /**
   * Rejects outstanding calls, cancels running handlers, waits briefly for
   * them and closes the transport. Safe to call more than once.
   */
  shutdown(reason?: Error): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown(reason);
    }
    return this.shutdownPromise;
  }

  private async doShutdown(reason: Error | undefined): Promise<void> {
    this._state = 'shuttingDown';
    this._closeReason = reason;
    if (reason) {
      this.logger.error(`connection closing: ${reason.message}`);
    } else {
      this.logger.debug('connection closing');
    }

    for (const id of [...this.pending.keys()]) {
      this.settlePending(
        id,
        new ConnectionClosedError(
          reason ? `Connection closed: ${reason.message}` : 'Connection closed',
        ),
      );
    }

    this.cancellations.cancelAll();
    this.lifetime.cancel();

    if (this.inflight.size > 0) {
      const drained = Promise.allSettled([...this.inflight]).then(() => true);
      const timedOut = delay(this.drainTimeoutMs, false, { ref: false });
      if (!(await Promise.race([drained, timedOut]))) {
        this.logger.warn(
          `${this.inflight.size} handler(s) still running after ${this.drainTimeoutMs}ms`,
        );
      }
    }

    try {
      await this.transport.close();
    } catch (error) {
      this.logger.warn(`error while closing transport: ${String(error)}`);
    }

    this._state = 'closed';
    this.lifetime.dispose();
    this.resolveClosed();
  }

  private async receiveLoop(): Promise<void> {
    try {
      for await (const payload of this.transport.receive()) {
        if (this._state === 'closed') {
          break;
        }
        this.messageLogger.trace(() => `<-- ${JSON.stringify(payload)}`);
        this.route(payload);
      }
      await this.shutdown();
    } catch (error) {
      if (!isFatalError(error)) {
        this.logger.error(
          () =>
            `receive loop failed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`,
        );
      }
      await this.shutdown(
        error instanceof Error ? error : new TransportError(String(error)),
      );
    }
  }

  private route(payload: unknown): void {
    let message: Message;
    try {
      message = this.codec.decode(payload);
    } catch (error) {
      if (error instanceof InvalidMessageError) {
        this.handleInvalidMessage(error);
        return;
      }
      throw error;
    }

    if (isRequestMessage(message)) {
      this.handleRequest(message);
    } else if (isNotificationMessage(message)) {
      this.handleNotification(message);
    } else {
      this.handleResponse(message);
    }
  }

  private handleInvalidMessage(error: InvalidMessageError): void {
    this.logger.warn(`discarding invalid message: ${error.message}`);
    if (error.id === undefined) {
      return;
    }
    this.track(
      this.write(
        errorResponse(error.id, {
          code: RpcErrorCodes.InvalidRequest,
          message: error.message,
        }),
      ).catch((writeError: unknown) => this.logWriteFailure(writeError)),
    );
  }

  private handleRequest(request: RequestMessage): void {
    if (this._state === 'shuttingDown') {
      this.track(
        this.write(
          errorResponse(
            request.id,
            {
              code: RpcErrorCodes.RequestCancelled,
              message: 'Connection is shutting down',
            },
            request.method,
          ),
        ).catch((error: unknown) => this.logWriteFailure(error)),
      );
      return;
    }
    if (this._state !== 'running') {
      return;
    }

    const entry = this.handlers.get(request.method);
    if (!entry || entry.kind !== 'request') {
      this.logger.debug(`no handler for request '${request.method}'`);
      this.track(
        this.write(
          errorResponse(
            request.id,
            {
              code: RpcErrorCodes.MethodNotFound,
              message: `Unhandled method ${request.method}`,
            },
            request.method,
          ),
        ).catch((error: unknown) => this.logWriteFailure(error)),
      );
      return;
    }

    const token = this.cancellations.create(request.id);
    const context: HandlerContext = {
      connection: this,
      method: request.method,
      id: request.id,
    };

    this.track(
      this.scheduler
        .schedule(() => this.executeRequest(entry, request, token, context))
        .finally(() => this.cancellations.delete(request.id)),
    );
  }

  private async executeRequest(
    entry: HandlerEntry,
    request: RequestMessage,
    token: CancellationToken,
    context: HandlerContext,
  ): Promise<void> {
    let response: ResponseMessage;
    try {
      if (token.isCancellationRequested) {
        throw new CancelledError();
      }
      const result = await entry.invoke(request.params, token, context);
      if (token.isCancellationRequested) {
        throw new CancelledError();
      }
      response = successResponse(request.id, result, request.method);
    } catch (error) {
      this.logHandlerFailure(request.method, error);
      response = errorResponse(
        request.id,
        toRpcErrorObject(error, request.method),
        request.method,
      );
    }

    if (this._state === 'closed') {
      return;
    }
    try {
      await this.write(response);
    } catch (error) {
      this.logWriteFailure(error);
    }
  }

  private handleNotification(notification: NotificationMessage): void {
    if (this.cancelMethod !== null && notification.method === this.cancelMethod) {
      const parsed = cancelParamsSchema.safeParse(notification.params);
      if (parsed.success) {
        this.cancelIncoming(parsed.data.id);
      } else {
        this.logger.warn(`malformed ${this.cancelMethod} notification`);
      }
      return;
    }

    if (this._state !== 'running') {
      return;
    }

    const context: HandlerContext = {
      connection: this,
      method: notification.method,
    };
    const token = this.lifetime.token;
    const entry = this.handlers.get(notification.method);
    const fallback = notification.method.startsWith('$/')
      ? undefined
      : this.unhandledNotification;
    let invoke: () => Promise<unknown>;
    if (entry && entry.kind === 'notification') {
      invoke = () => entry.invoke(notification.params, token, context);
    } else if (fallback) {
      invoke = async () => fallback(notification, token, context);
    } else {
      if (!notification.method.startsWith('$/')) {
        this.logger.debug(
          `no handler for notification '${notification.method}'`,
        );
      }
      return;
    }

    this.track(
      this.scheduler
        .schedule(async () => {
          if (token.isCancellationRequested) {
            return;
          }
          await invoke();
        })
        .then(
          () => undefined,
          (error: unknown) =>
            this.logHandlerFailure(notification.method, error),
        ),
    );
  }

  private handleResponse(response: ResponseMessage): void {
    if (response.id === null) {
      this.logger.warn(
        `peer reported an error without an id: ${response.error?.message ?? 'unknown'}`,
      );
      return;
    }

    const call = this.pending.get(response.id);
    if (!call) {
      this.logger.warn(
        `discarding response for unknown request ${String(response.id)}`,
      );
      return;
    }

    if (response.error) {
      this.settlePending(response.id, fromRpcErrorObject(response.error));
    } else {
      this.pending.delete(response.id);
      call.cleanup();
      call.resolve(response.result);
    }
  }

  /** Rejects a pending call once; false when it already settled. */
  private settlePending(id: RequestId, error: Error): boolean {
    const call = this.pending.get(id);
    if (!call) {
      return false;
    }
    this.pending.delete(id);
    call.cleanup();
    call.reject(error);
    return true;
  }

  private sendCancelNotification(id: RequestId): void {
    if (this.cancelMethod === null || this._state !== 'running') {
      return;
    }
    this.write(createNotification(this.cancelMethod, { id })).catch(
      (error: unknown) => this.logWriteFailure(error),
    );
  }

  private async write(message: Message): Promise<void> {
    const payload = this.codec.encode(message);
    this.messageLogger.trace(() => `--> ${JSON.stringify(payload)}`);
    await this.transport.send(payload);
  }

  private track(work: Promise<void>): void {
    this.inflight.add(work);
    void work.finally(() => this.inflight.delete(work));
  }

  private logHandlerFailure(method: string, error: unknown): void {
    if (error instanceof CancelledError) {
      this.logger.debug(`'${method}' was cancelled`);
    } else if (error instanceof ResponseError) {
      this.logger.debug(`'${method}' failed: ${error.message}`);
    } else {
      this.logger.error(
        `'${method}' failed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`,
      );
    }
  }

  private logWriteFailure(error: unknown): void {
    this.logger.warn(
      `failed to write message: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function toInvoker<P, R>(
  registration: MethodRegistration<P, R>,
): HandlerEntry['invoke'] {
  if (registration.kind === 'request') {
    if (registration.params !== undefined) {
      const { params: schema, handler } = registration;
      return async (raw, token, context) =>
        await handler(schema.parse(raw), token, context);
    }
    const { handler } = registration;
    return async (raw, token, context) => await handler(raw, token, context);
  }

  if (registration.params !== undefined) {
    const { params: schema, handler } = registration;
    return async (raw, token, context) => {
      await handler(schema.parse(raw), token, context);
    };
  }
  const { handler } = registration;
  return async (raw, token, context) => {
    await handler(raw, token, context);
  };
}
