/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';
import {
  TextDocumentSyncKind,
  type ServerCapabilities,
} from 'vscode-languageserver-protocol';
import { TextDocument } from 'vscode-languageserver-textdocument';

import {
  didChangeParamsSchema,
  didCloseParamsSchema,
  didOpenParamsSchema,
  didSaveParamsSchema,
} from '../schemas.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export { TextDocument };

export enum DocumentEvent {
  Opened = 'opened',
  Changed = 'changed',
  Saved = 'saved',
  Closed = 'closed',
}

export type DocumentListener = (document: TextDocument) => void;

export function getLines(document: TextDocument): string[] {
  return document.getText().split(/\r?\n/);
}

/**
 * Open documents keyed by uri. Clients sync full contents, so a change
 * replaces the text with the last entry of `contentChanges`.
 */
export class DocumentsPart extends LanguageServerProtocolPart {
  private readonly documents = new Map<string, TextDocument>();
  private readonly events = new EventEmitter();

  register(): void {
    this.protocol.onNotification(
      'textDocument/didOpen',
      didOpenParamsSchema,
      ({ textDocument }) => {
        const document = TextDocument.create(
          textDocument.uri,
          textDocument.languageId,
          textDocument.version,
          textDocument.text,
        );
        this.documents.set(document.uri, document);
        this.emit(DocumentEvent.Opened, document);
      },
    );

    this.protocol.onNotification(
      'textDocument/didChange',
      didChangeParamsSchema,
      ({ textDocument, contentChanges }) => {
        const current = this.documents.get(textDocument.uri);
        const last = contentChanges.at(-1);
        if (!current) {
          this.logger.warn(`Change for unknown document ${textDocument.uri}`);
          return;
        }
        if (!last) {
          return;
        }
        const document = TextDocument.update(
          current,
          [{ text: last.text }],
          textDocument.version,
        );
        this.documents.set(document.uri, document);
        this.emit(DocumentEvent.Changed, document);
      },
    );

    this.protocol.onNotification(
      'textDocument/didSave',
      didSaveParamsSchema,
      ({ textDocument, text }) => {
        let document = this.documents.get(textDocument.uri);
        if (!document) {
          return;
        }
        if (text !== undefined && text !== document.getText()) {
          document = TextDocument.update(
            document,
            [{ text }],
            document.version,
          );
          this.documents.set(document.uri, document);
        }
        this.emit(DocumentEvent.Saved, document);
      },
    );

    this.protocol.onNotification(
      'textDocument/didClose',
      didCloseParamsSchema,
      ({ textDocument }) => {
        const document = this.documents.get(textDocument.uri);
        if (!document) {
          return;
        }
        this.documents.delete(textDocument.uri);
        this.emit(DocumentEvent.Closed, document);
      },
    );
  }

  override extendCapabilities(capabilities: ServerCapabilities): void {
    capabilities.textDocumentSync = {
      openClose: true,
      change: TextDocumentSyncKind.Full,
      save: { includeText: false },
    };
  }

  get(uri: string): TextDocument | undefined {
    return this.documents.get(uri);
  }

  all(): TextDocument[] {
    return [...this.documents.values()];
  }

  on(event: DocumentEvent, listener: DocumentListener): this {
    this.events.on(event, listener);
    return this;
  }

  off(event: DocumentEvent, listener: DocumentListener): this {
    this.events.off(event, listener);
    return this;
  }

  private emit(event: DocumentEvent, document: TextDocument): void {
    this.logger.debug(
      () => `${event} ${document.uri} (version ${document.version})`,
    );
    this.events.emit(event, document);
  }
}
