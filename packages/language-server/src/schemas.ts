/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const positionSchema = z.object({
  line: z.number().int().nonnegative(),
  character: z.number().int().nonnegative(),
});

export const rangeSchema = z.object({
  start: positionSchema,
  end: positionSchema,
});

export const textDocumentIdentifierSchema = z.object({ uri: z.string() });

export const textDocumentPositionSchema = z.object({
  textDocument: textDocumentIdentifierSchema,
  position: positionSchema,
});

export const initializeParamsSchema = z
  .object({
    processId: z.number().int().nullable().optional(),
    rootUri: z.string().nullable().optional(),
    initializationOptions: z.unknown().optional(),
    capabilities: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const didOpenParamsSchema = z.object({
  textDocument: z.object({
    uri: z.string(),
    languageId: z.string(),
    version: z.number().int(),
    text: z.string(),
  }),
});

export const didChangeParamsSchema = z.object({
  textDocument: z.object({ uri: z.string(), version: z.number().int() }),
  contentChanges: z.array(z.object({ text: z.string() }).passthrough()),
});

export const didCloseParamsSchema = z.object({
  textDocument: textDocumentIdentifierSchema,
});

export const didSaveParamsSchema = z.object({
  textDocument: textDocumentIdentifierSchema,
  text: z.string().optional(),
});

export const referenceParamsSchema = textDocumentPositionSchema.extend({
  context: z.object({ includeDeclaration: z.boolean() }),
});

export const completionParamsSchema = textDocumentPositionSchema.extend({
  context: z.unknown().optional(),
});
