/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  Location,
  Position,
  ReferenceContext,
  ServerCapabilities,
} from 'vscode-languageserver-protocol';
import { AsyncCollector } from '@keywright/core';

import { referenceParamsSchema } from '../schemas.js';
import type { TextDocument } from './documents.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export interface ReferencesParams {
  document: TextDocument;
  position: Position;
  context: ReferenceContext;
}

export class ReferencesPart extends LanguageServerProtocolPart {
  readonly collect = new AsyncCollector<ReferencesParams, Location[] | null>(
    'references',
    { logger: this.logger },
  );

  register(): void {
    this.protocol.onRequest(
      'textDocument/references',
      referenceParamsSchema,
      async ({ textDocument, position, context }, token) => {
        const document = this.protocol.documents.get(textDocument.uri);
        if (!document) {
          return null;
        }
        const outcomes = await this.collect.collect(
          { document, position, context },
          token,
        );
        const locations = outcomes.flatMap((outcome) =>
          outcome.status === 'fulfilled' ? (outcome.value ?? []) : [],
        );
        return locations.length > 0 ? locations : null;
      },
    );
  }

  override extendCapabilities(capabilities: ServerCapabilities): void {
    if (this.collect.size > 0) {
      capabilities.referencesProvider = true;
    }
  }
}
