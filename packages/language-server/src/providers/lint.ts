/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DiagnosticSeverity,
  type Diagnostic,
} from 'vscode-languageserver-protocol';
import { checkpoint, type CancellationToken } from '@keywright/core';

import type { LintSettings } from '../config.js';
import { getLines, type TextDocument } from '../parts/documents.js';
import type { DiagnosticsResult } from '../parts/diagnostics.js';

export const LINT_SOURCE = 'keywright-lint';

export interface LintRule {
  id: string;
  check(line: string, lineNumber: number, settings: LintSettings): Diagnostic[];
}

function finding(
  rule: string,
  line: number,
  start: number,
  end: number,
  severity: DiagnosticSeverity,
  message: string,
): Diagnostic {
  return {
    range: {
      start: { line, character: start },
      end: { line, character: end },
    },
    severity,
    code: rule,
    source: LINT_SOURCE,
    message,
  };
}

export const lineTooLong: LintRule = {
  id: 'line-too-long',
  check(line, lineNumber, { maxLineLength }) {
    if (line.length <= maxLineLength) {
      return [];
    }
    return [
      finding(
        this.id,
        lineNumber,
        maxLineLength,
        line.length,
        DiagnosticSeverity.Warning,
        `Line is too long (${line.length}/${maxLineLength})`,
      ),
    ];
  },
};

export const trailingWhitespace: LintRule = {
  id: 'trailing-whitespace',
  check(line, lineNumber) {
    const match = /[ \t]+$/.exec(line);
    if (!match) {
      return [];
    }
    return [
      finding(
        this.id,
        lineNumber,
        match.index,
        line.length,
        DiagnosticSeverity.Information,
        'Trailing whitespace',
      ),
    ];
  },
};

export const tabCharacter: LintRule = {
  id: 'tab-character',
  check(line, lineNumber) {
    const column = line.indexOf('\t');
    if (column < 0) {
      return [];
    }
    return [
      finding(
        this.id,
        lineNumber,
        column,
        column + 1,
        DiagnosticSeverity.Information,
        'Tab character used as separator',
      ),
    ];
  },
};

export const LINT_RULES: readonly LintRule[] = [
  lineTooLong,
  trailingWhitespace,
  tabCharacter,
];

/**
 * Runs every enabled rule over the document. The token is polled between
 * rules; a cancelled run throws `CancelledError`.
 */
export async function lintDocument(
  document: TextDocument,
  settings: LintSettings,
  token: CancellationToken,
  rules: readonly LintRule[] = LINT_RULES,
): Promise<DiagnosticsResult> {
  if (!settings.enabled) {
    return { source: LINT_SOURCE, diagnostics: [] };
  }
  const lines = getLines(document);
  const diagnostics: Diagnostic[] = [];
  for (const rule of rules) {
    await checkpoint(token);
    if (settings.disabledRules.includes(rule.id)) {
      continue;
    }
    lines.forEach((line, lineNumber) => {
      diagnostics.push(...rule.check(line, lineNumber, settings));
    });
  }
  return { source: LINT_SOURCE, diagnostics };
}
