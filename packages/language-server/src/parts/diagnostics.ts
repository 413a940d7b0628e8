/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CancellationTokenSource } from 'vscode-jsonrpc';
import type { Diagnostic } from 'vscode-languageserver-protocol';
import { AsyncCollector } from '@keywright/core';

import { DocumentEvent, type TextDocument } from './documents.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export interface DiagnosticsResult {
  source: string;
  diagnostics: Diagnostic[];
}

/**
 * Publishes the merged findings of every diagnostics provider whenever a
 * document opens, changes or is saved. A newer run for the same document
 * cancels the older one, and only the run that is still current publishes.
 */
export class DiagnosticsPart extends LanguageServerProtocolPart {
  readonly collect = new AsyncCollector<TextDocument, DiagnosticsResult>(
    'diagnostics',
    { logger: this.logger },
  );
  private readonly running = new Map<string, CancellationTokenSource>();
  private readonly inflight = new Set<Promise<void>>();

  register(): void {
    const refresh = (document: TextDocument) => this.schedule(document);
    this.protocol.documents
      .on(DocumentEvent.Opened, refresh)
      .on(DocumentEvent.Changed, refresh)
      .on(DocumentEvent.Saved, refresh)
      .on(DocumentEvent.Closed, (document) => {
        this.running.get(document.uri)?.cancel();
        this.track(this.publish(document.uri, document.version, []));
      });
  }

  /** Resolves once every scheduled run has published or given up. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  async refresh(document: TextDocument): Promise<void> {
    this.running.get(document.uri)?.cancel();
    const source = new CancellationTokenSource();
    this.running.set(document.uri, source);
    try {
      const outcomes = await this.collect.collect(document, source.token);
      if (source.token.isCancellationRequested) {
        return;
      }
      const diagnostics = outcomes.flatMap((outcome) =>
        outcome.status === 'fulfilled' ? outcome.value.diagnostics : [],
      );
      await this.publish(document.uri, document.version, diagnostics);
    } finally {
      if (this.running.get(document.uri) === source) {
        this.running.delete(document.uri);
      }
      source.dispose();
    }
  }

  private schedule(document: TextDocument): void {
    this.track(this.refresh(document));
  }

  private track(work: Promise<void>): void {
    const settled = work.catch((error: unknown) => {
      this.logger.warn('Publishing diagnostics failed', error);
    });
    this.inflight.add(settled);
    void settled.finally(() => this.inflight.delete(settled));
  }

  private async publish(
    uri: string,
    version: number,
    diagnostics: Diagnostic[],
  ): Promise<void> {
    this.logger.debug(() => `Publishing ${diagnostics.length} diagnostics for ${uri}`);
    await this.connection.sendNotification('textDocument/publishDiagnostics', {
      uri,
      version,
      diagnostics,
    });
  }
}
