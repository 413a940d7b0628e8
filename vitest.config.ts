/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages export their build output by default.
      '@keywright/core': source('./packages/core/index.ts'),
      '@keywright/language-server': source(
        './packages/language-server/src/index.ts',
      ),
      '@keywright/debug-adapter': source(
        './packages/debug-adapter/src/index.ts',
      ),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/test/**/*.test.ts',
    ],
    testTimeout: 30000,
    teardownTimeout: 10000,
  },
});
