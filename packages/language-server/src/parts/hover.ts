/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  Hover,
  Position,
  ServerCapabilities,
} from 'vscode-languageserver-protocol';
import { AsyncCollector, collectFirst } from '@keywright/core';

import { textDocumentPositionSchema } from '../schemas.js';
import type { TextDocument } from './documents.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export interface HoverParams {
  document: TextDocument;
  position: Position;
}

export class HoverPart extends LanguageServerProtocolPart {
  readonly collect = new AsyncCollector<HoverParams, Hover | null>('hover', {
    logger: this.logger,
  });

  register(): void {
    this.protocol.onRequest(
      'textDocument/hover',
      textDocumentPositionSchema.passthrough(),
      async ({ textDocument, position }, token) => {
        const document = this.protocol.documents.get(textDocument.uri);
        if (!document) {
          return null;
        }
        const hover = await collectFirst(
          this.collect,
          { document, position },
          (value) => value !== null,
          token,
        );
        return hover ?? null;
      },
    );
  }

  override extendCapabilities(capabilities: ServerCapabilities): void {
    if (this.collect.size > 0) {
      capabilities.hoverProvider = true;
    }
  }
}
