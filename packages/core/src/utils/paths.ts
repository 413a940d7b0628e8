/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const KEYWRIGHT_DIR = '.keywright';

export function getUserSettingsPath(): string | undefined {
  const home = homedir();
  return home ? join(home, KEYWRIGHT_DIR, 'settings.json') : undefined;
}

export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, KEYWRIGHT_DIR, 'config.json');
}

export function getDefaultLogDirectory(): string {
  const home = homedir();
  return home
    ? join(home, KEYWRIGHT_DIR, 'logs')
    : join(process.cwd(), KEYWRIGHT_DIR, 'logs');
}
