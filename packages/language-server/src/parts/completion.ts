/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CompletionItem,
  Position,
  ServerCapabilities,
} from 'vscode-languageserver-protocol';
import { AsyncCollector } from '@keywright/core';

import { completionParamsSchema } from '../schemas.js';
import type { TextDocument } from './documents.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export interface CompletionParams {
  document: TextDocument;
  position: Position;
}

export const COMPLETION_TRIGGER_CHARACTERS = ['$', '@', '&', '%', '{'];

export class CompletionPart extends LanguageServerProtocolPart {
  readonly collect = new AsyncCollector<
    CompletionParams,
    CompletionItem[] | null
  >('completion', { logger: this.logger });

  register(): void {
    this.protocol.onRequest(
      'textDocument/completion',
      completionParamsSchema,
      async ({ textDocument, position }, token) => {
        const document = this.protocol.documents.get(textDocument.uri);
        if (!document) {
          return [];
        }
        const outcomes = await this.collect.collect(
          { document, position },
          token,
        );
        return outcomes.flatMap((outcome) =>
          outcome.status === 'fulfilled' ? (outcome.value ?? []) : [],
        );
      },
    );
  }

  override extendCapabilities(capabilities: ServerCapabilities): void {
    if (this.collect.size > 0) {
      capabilities.completionProvider = {
        triggerCharacters: COMPLETION_TRIGGER_CHARACTERS,
      };
    }
  }
}
