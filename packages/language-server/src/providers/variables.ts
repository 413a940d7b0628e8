/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Position, Range } from 'vscode-languageserver-protocol';
import type { TextDocument } from 'vscode-languageserver-textdocument';

import { getLines } from '../parts/documents.js';

export interface VariableToken {
  /** The token as written, e.g. `${user name}`. */
  name: string;
  range: Range;
}

const VARIABLE_PATTERN = /[$@&%]\{[^{}\r\n]+\}/g;

/**
 * Variables match regardless of case, spaces and underscores, and the
 * scalar, list and dictionary forms of a name refer to the same variable.
 */
export function normalizeVariableName(name: string): string {
  return name
    .slice(2, -1)
    .toLowerCase()
    .replace(/[\s_]/g, '');
}

export function isBuiltinDirectoryVariable(name: string): boolean {
  return name.startsWith('$') && normalizeVariableName(name) === 'curdir';
}

export function findVariablesInLine(
  text: string,
  line: number,
): VariableToken[] {
  const tokens: VariableToken[] = [];
  for (const match of text.matchAll(VARIABLE_PATTERN)) {
    const start = match.index ?? 0;
    if (start > 0 && text[start - 1] === '\\') {
      continue;
    }
    tokens.push({
      name: match[0],
      range: {
        start: { line, character: start },
        end: { line, character: start + match[0].length },
      },
    });
  }
  return tokens;
}

export function findVariables(document: TextDocument): VariableToken[] {
  return getLines(document).flatMap((text, line) =>
    findVariablesInLine(text, line),
  );
}

/** The token whose range contains `position`, either end included. */
export function variableAt(
  document: TextDocument,
  position: Position,
): VariableToken | undefined {
  const text = getLines(document)[position.line];
  if (text === undefined) {
    return undefined;
  }
  return findVariablesInLine(text, position.line).find(
    ({ range }) =>
      range.start.character <= position.character &&
      position.character <= range.end.character,
  );
}
