/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { hideBin } from 'yargs/helpers';
import { ConfigurationManager } from '@keywright/core';

import { parseArguments } from './config/args.js';
import { buildDebugSettings } from './config/debug-settings.js';
import { run } from './server.js';

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  const args = await parseArguments(argv);
  ConfigurationManager.getInstance().setCliConfig(buildDebugSettings(args));

  const controller = new AbortController();
  const stop = () => controller.abort();
  for (const signal of STOP_SIGNALS) {
    process.once(signal, stop);
  }
  try {
    await run(args, controller.signal);
  } finally {
    for (const signal of STOP_SIGNALS) {
      process.off(signal, stop);
    }
  }
}
