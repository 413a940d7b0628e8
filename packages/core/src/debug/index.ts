/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { ConfigurationManager } from './ConfigurationManager.js';
export { DebugLogger } from './DebugLogger.js';
export { FileOutput } from './FileOutput.js';
export * from './types.js';
