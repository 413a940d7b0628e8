/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  CompletionItemKind,
  Disposable,
  type CompletionItem,
  type Location,
} from 'vscode-languageserver-protocol';

import type { LanguageServerProtocol } from '../protocol.js';
import type { TextDocument } from '../parts/documents.js';
import { lintDocument } from './lint.js';
import {
  findVariables,
  normalizeVariableName,
  variableAt,
} from './variables.js';

export function variableReferences(
  documents: TextDocument[],
  target: string,
): Location[] {
  const key = normalizeVariableName(target);
  return documents.flatMap((document) =>
    findVariables(document)
      .filter((variable) => normalizeVariableName(variable.name) === key)
      .map((variable) => ({ uri: document.uri, range: variable.range })),
  );
}

/** One item per distinct spelling, in order of first appearance. */
export function variableCompletions(document: TextDocument): CompletionItem[] {
  const seen = new Set<string>();
  const items: CompletionItem[] = [];
  for (const { name } of findVariables(document)) {
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    items.push({ label: name, kind: CompletionItemKind.Variable });
  }
  return items;
}

/**
 * Subscribes the lint, variable references and variable completion
 * providers. Each only answers for documents of the configured language.
 */
export function registerBuiltinProviders(
  protocol: LanguageServerProtocol,
): Disposable {
  const ofLanguage = ({ document }: { document: TextDocument }) =>
    document.languageId === protocol.settings.languageId;

  const subscriptions = [
    protocol.diagnostics.collect.subscribe(
      (document, token) =>
        lintDocument(document, protocol.settings.lint, token),
      (document) => document.languageId === protocol.settings.languageId,
    ),
    protocol.references.collect.subscribe(({ document, position }) => {
      const variable = variableAt(document, position);
      if (!variable) {
        return null;
      }
      const candidates = protocol.documents
        .all()
        .filter((candidate) => candidate.languageId === document.languageId);
      return variableReferences(candidates, variable.name);
    }, ofLanguage),
    protocol.completion.collect.subscribe(
      ({ document }) => variableCompletions(document),
      ofLanguage,
    ),
  ];

  return Disposable.create(() => {
    for (const subscription of subscriptions) {
      subscription.dispose();
    }
  });
}
