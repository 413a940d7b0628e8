/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger, type JsonRpcConnection } from '@keywright/core';
import type { ServerCapabilities } from 'vscode-languageserver-protocol';

import type { LanguageServerProtocol } from '../protocol.js';

/**
 * One slice of the language server: it registers its methods on the
 * protocol's connection and contributes to the advertised capabilities.
 */
export abstract class LanguageServerProtocolPart {
  protected readonly logger = DebugLogger.getLogger(
    'keywright:language-server:parts',
  );

  constructor(protected readonly protocol: LanguageServerProtocol) {}

  protected get connection(): JsonRpcConnection {
    return this.protocol.connection;
  }

  abstract register(): void;

  extendCapabilities(_capabilities: ServerCapabilities): void {}
}
