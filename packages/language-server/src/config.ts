/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const DEFAULT_LANGUAGE_ID = 'robotframework';

export const lintSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  maxLineLength: z.number().int().positive().default(120),
  disabledRules: z.array(z.string()).default([]),
});

/**
 * Settings the client passes as `initializationOptions`. Absent fields take
 * their defaults; present fields must be well-formed.
 */
export const settingsSchema = z
  .object({
    languageId: z.string().min(1).default(DEFAULT_LANGUAGE_ID),
    lint: lintSettingsSchema.default({}),
  })
  .default({});

export type LintSettings = z.output<typeof lintSettingsSchema>;
export type LanguageServerSettings = z.output<typeof settingsSchema>;

export const defaultSettings: LanguageServerSettings = settingsSchema.parse(
  undefined,
);

export function parseSettings(options: unknown): LanguageServerSettings {
  return settingsSchema.parse(options ?? undefined);
}
