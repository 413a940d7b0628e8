/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  Position,
  ServerCapabilities,
  SignatureHelp,
} from 'vscode-languageserver-protocol';
import { AsyncCollector, collectFirst } from '@keywright/core';

import { textDocumentPositionSchema } from '../schemas.js';
import type { TextDocument } from './documents.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export interface SignatureHelpParams {
  document: TextDocument;
  position: Position;
}

export class SignatureHelpPart extends LanguageServerProtocolPart {
  readonly collect = new AsyncCollector<
    SignatureHelpParams,
    SignatureHelp | null
  >('signatureHelp', { logger: this.logger });

  register(): void {
    this.protocol.onRequest(
      'textDocument/signatureHelp',
      textDocumentPositionSchema.passthrough(),
      async ({ textDocument, position }, token) => {
        const document = this.protocol.documents.get(textDocument.uri);
        if (!document) {
          return null;
        }
        const help = await collectFirst(
          this.collect,
          { document, position },
          (value) => value !== null,
          token,
        );
        return help ?? null;
      },
    );
  }

  override extendCapabilities(capabilities: ServerCapabilities): void {
    if (this.collect.size > 0) {
      capabilities.signatureHelpProvider = {
        triggerCharacters: [' ', '\t'],
      };
    }
  }
}
