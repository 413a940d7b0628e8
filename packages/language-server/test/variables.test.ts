/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { TextDocument } from 'vscode-languageserver-textdocument';

import {
  findVariables,
  findVariablesInLine,
  isBuiltinDirectoryVariable,
  normalizeVariableName,
  variableAt,
} from '../src/providers/variables.js';

describe('findVariablesInLine', () => {
  it('finds scalar and list variables with their ranges', () => {
    expect(findVariablesInLine('    Log    ${user name} and @{items}', 3)).toEqual([
      {
        name: '${user name}',
        range: { start: { line: 3, character: 11 }, end: { line: 3, character: 23 } },
      },
      {
        name: '@{items}',
        range: { start: { line: 3, character: 28 }, end: { line: 3, character: 36 } },
      },
    ]);
  });

  it('skips escaped variables', () => {
    expect(findVariablesInLine('Log    \\${not a variable}', 0)).toEqual([]);
  });

  it('finds dictionary and environment variables', () => {
    expect(
      findVariablesInLine('&{config}    %{HOME}', 0).map((v) => v.name),
    ).toEqual(['&{config}', '%{HOME}']);
  });
});

describe('findVariables', () => {
  it('numbers lines from zero across line endings', () => {
    const document = TextDocument.create(
      'file:///suite.robot',
      'robotframework',
      1,
      '*** Variables ***\r\n${A}    1\n${B}    2',
    );

    expect(
      findVariables(document).map((v) => [v.name, v.range.start.line]),
    ).toEqual([
      ['${A}', 1],
      ['${B}', 2],
    ]);
  });
});

describe('normalizeVariableName', () => {
  it('ignores case, spaces, underscores and the variable type', () => {
    expect(normalizeVariableName('${User_Name}')).toBe('username');
    expect(normalizeVariableName('@{user name}')).toBe('username');
  });
});

describe('variableAt', () => {
  const document = TextDocument.create(
    'file:///suite.robot',
    'robotframework',
    1,
    'Log    ${message}',
  );

  it('includes both ends of the token', () => {
    expect(variableAt(document, { line: 0, character: 7 })?.name).toBe(
      '${message}',
    );
    expect(variableAt(document, { line: 0, character: 17 })?.name).toBe(
      '${message}',
    );
  });

  it('returns undefined outside a token or past the last line', () => {
    expect(variableAt(document, { line: 0, character: 2 })).toBeUndefined();
    expect(variableAt(document, { line: 5, character: 0 })).toBeUndefined();
  });
});

describe('isBuiltinDirectoryVariable', () => {
  it('matches only the scalar form', () => {
    expect(isBuiltinDirectoryVariable('${CURDIR}')).toBe(true);
    expect(isBuiltinDirectoryVariable('${cur dir}')).toBe(true);
    expect(isBuiltinDirectoryVariable('@{CURDIR}')).toBe(false);
  });
});
