/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import type { Position, Range } from 'vscode-languageserver-protocol';
import { throwIfCancelled } from '@keywright/core';

import {
  findVariablesInLine,
  isBuiltinDirectoryVariable,
  variableAt,
} from '../providers/variables.js';
import { rangeSchema, textDocumentPositionSchema } from '../schemas.js';
import { getLines } from './documents.js';
import { LanguageServerProtocolPart } from './protocol-part.js';

export const GET_EVALUATABLE_EXPRESSION_METHOD =
  'keywright/debugging/getEvaluatableExpression';
export const GET_INLINE_VALUES_METHOD = 'keywright/debugging/getInlineValues';

export interface EvaluatableExpression {
  range: Range;
  expression?: string;
}

export interface InlineValueEvaluatableExpression {
  type: 'expression';
  range: Range;
  expression?: string;
}

const inlineValuesParamsSchema = z.object({
  textDocument: z.object({ uri: z.string() }),
  viewPort: rangeSchema,
  context: z.object({
    frameId: z.number().int(),
    stoppedLocation: rangeSchema,
  }),
});

function minPosition(a: Position, b: Position): Position {
  if (a.line !== b.line) {
    return a.line < b.line ? a : b;
  }
  return a.character <= b.character ? a : b;
}

/**
 * Requests a debugger front end makes while the test run is paused: which
 * expression sits under the mouse, and which variables of the visible lines
 * to show values for.
 */
export class DebuggingUtilsPart extends LanguageServerProtocolPart {
  register(): void {
    this.protocol.onRequest(
      GET_EVALUATABLE_EXPRESSION_METHOD,
      textDocumentPositionSchema,
      ({ textDocument, position }): EvaluatableExpression | null => {
        const document = this.protocol.documents.get(textDocument.uri);
        if (!document) {
          return null;
        }
        const token = variableAt(document, position);
        if (!token || isBuiltinDirectoryVariable(token.name)) {
          return null;
        }
        return { range: token.range, expression: token.name };
      },
    );

    this.protocol.onRequest(
      GET_INLINE_VALUES_METHOD,
      inlineValuesParamsSchema,
      ({ textDocument, viewPort, context }, token) => {
        const document = this.protocol.documents.get(textDocument.uri);
        if (!document) {
          return [];
        }
        const lines = getLines(document);
        const end = minPosition(viewPort.end, context.stoppedLocation.end);
        const last = Math.min(end.line, lines.length - 1);
        const values: InlineValueEvaluatableExpression[] = [];
        for (let line = viewPort.start.line; line <= last; line++) {
          throwIfCancelled(token);
          for (const variable of findVariablesInLine(lines[line] ?? '', line)) {
            if (
              line === viewPort.start.line &&
              variable.range.start.character < viewPort.start.character
            ) {
              continue;
            }
            if (isBuiltinDirectoryVariable(variable.name)) {
              continue;
            }
            values.push({
              type: 'expression',
              range: variable.range,
              expression: variable.name,
            });
          }
        }
        return values;
      },
    );
  }
}
