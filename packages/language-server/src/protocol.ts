/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  ResponseError,
  RpcErrorCodes,
  type JsonRpcConnection,
  type NotificationHandler,
  type ParamsSchema,
  type RequestHandler,
} from '@keywright/core';
import type {
  InitializeResult,
  ServerCapabilities,
} from 'vscode-languageserver-protocol';

import {
  defaultSettings,
  parseSettings,
  type LanguageServerSettings,
} from './config.js';
import { CompletionPart } from './parts/completion.js';
import { DebuggingUtilsPart } from './parts/debugging-utils.js';
import { DiagnosticsPart } from './parts/diagnostics.js';
import { DocumentsPart } from './parts/documents.js';
import { HoverPart } from './parts/hover.js';
import type { LanguageServerProtocolPart } from './parts/protocol-part.js';
import { ReferencesPart } from './parts/references.js';
import { SignatureHelpPart } from './parts/signature-help.js';
import { initializeParamsSchema } from './schemas.js';

const logger = DebugLogger.getLogger('keywright:language-server');

export const SERVER_NAME = 'keywright-language-server';

export interface LanguageServerOptions {
  version?: string;
}

/**
 * The language server side of one connection. Lifecycle methods live here;
 * everything else is contributed by the parts.
 */
export class LanguageServerProtocol {
  readonly documents: DocumentsPart;
  readonly diagnostics: DiagnosticsPart;
  readonly references: ReferencesPart;
  readonly completion: CompletionPart;
  readonly signatureHelp: SignatureHelpPart;
  readonly hover: HoverPart;
  readonly debuggingUtils: DebuggingUtilsPart;

  private readonly parts: LanguageServerProtocolPart[];
  private readonly version: string;
  private _settings: LanguageServerSettings = defaultSettings;
  private _initialized = false;
  private _shutdownRequested = false;

  constructor(
    readonly connection: JsonRpcConnection,
    options: LanguageServerOptions = {},
  ) {
    this.version = options.version ?? '0.1.0';

    this.documents = new DocumentsPart(this);
    this.diagnostics = new DiagnosticsPart(this);
    this.references = new ReferencesPart(this);
    this.completion = new CompletionPart(this);
    this.signatureHelp = new SignatureHelpPart(this);
    this.hover = new HoverPart(this);
    this.debuggingUtils = new DebuggingUtilsPart(this);
    this.parts = [
      this.documents,
      this.diagnostics,
      this.references,
      this.completion,
      this.signatureHelp,
      this.hover,
      this.debuggingUtils,
    ];

    this.registerLifecycle();
    for (const part of this.parts) {
      part.register();
    }
  }

  get settings(): LanguageServerSettings {
    return this._settings;
  }

  get initialized(): boolean {
    return this._initialized;
  }

  get shutdownRequested(): boolean {
    return this._shutdownRequested;
  }

  /**
   * Registers a request that is only served between `initialize` and
   * `shutdown`. Params are validated after that check.
   */
  onRequest<P, R>(
    method: string,
    schema: ParamsSchema<P>,
    handler: RequestHandler<P, R>,
  ): void {
    this.connection.onRequest(method, (raw, token, context) => {
      this.ensureServing(method);
      return handler(schema.parse(raw), token, context);
    });
  }

  /** Notifications that arrive before `initialize` are dropped. */
  onNotification<P>(
    method: string,
    schema: ParamsSchema<P>,
    handler: NotificationHandler<P>,
  ): void {
    this.connection.onNotification(method, (raw, token, context) => {
      if (!this._initialized) {
        logger.warn(`Dropping ${method}: server not initialized`);
        return;
      }
      return handler(schema.parse(raw), token, context);
    });
  }

  capabilities(): ServerCapabilities {
    const capabilities: ServerCapabilities = {};
    for (const part of this.parts) {
      part.extendCapabilities(capabilities);
    }
    return capabilities;
  }

  private ensureServing(method: string): void {
    if (!this._initialized) {
      throw new ResponseError(
        RpcErrorCodes.ServerNotInitialized,
        `Server not initialized, cannot handle ${method}`,
      );
    }
    if (this._shutdownRequested) {
      throw new ResponseError(
        RpcErrorCodes.InvalidRequest,
        `Server is shutting down, cannot handle ${method}`,
      );
    }
  }

  private registerLifecycle(): void {
    this.connection.onRequest(
      'initialize',
      initializeParamsSchema,
      (params): InitializeResult => {
        if (this._initialized) {
          throw new ResponseError(
            RpcErrorCodes.InvalidRequest,
            'Server already initialized',
          );
        }
        this._settings = parseSettings(params.initializationOptions);
        this._initialized = true;
        logger.info(
          () =>
            `Initialized for ${this._settings.languageId} (client pid ${params.processId ?? 'unknown'})`,
        );
        return {
          capabilities: this.capabilities(),
          serverInfo: { name: SERVER_NAME, version: this.version },
        };
      },
    );

    this.connection.onNotification('initialized', () => {
      logger.debug('Client reported initialized');
    });

    this.connection.onRequest('shutdown', () => {
      this._shutdownRequested = true;
      logger.info('Shutdown requested');
      return null;
    });

    // Not awaited: shutdown drains in-flight handlers, this one included.
    this.connection.onNotification('exit', () => {
      logger.info('Exit received');
      void this.connection.shutdown();
    });
  }
}
