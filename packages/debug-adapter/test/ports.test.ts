/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createServer } from 'node:net';
import { describe, expect, it } from 'vitest';

import { findFreePort } from '../src/ports.js';

describe('findFreePort', () => {
  it('returns a port that can be bound again', async () => {
    const port = await findFreePort();

    expect(port).toBeGreaterThan(0);
    const server = createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', resolve);
    });
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });
});
