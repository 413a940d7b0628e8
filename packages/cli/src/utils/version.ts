/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const CLI_PACKAGE_NAME = '@keywright/cli';

const packageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});

/** Version of the nearest enclosing CLI package.json. */
export function getCliVersion(from: string = import.meta.url): string {
  let dir = dirname(fileURLToPath(from));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed = packageJsonSchema.safeParse(
        JSON.parse(readFileSync(candidate, 'utf8')),
      );
      if (parsed.success && parsed.data.name === CLI_PACKAGE_NAME) {
        return parsed.data.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return 'unknown';
    }
    dir = parent;
  }
}
