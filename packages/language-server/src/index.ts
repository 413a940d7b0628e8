/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config.js';
export * from './protocol.js';
export * from './parts/protocol-part.js';
export * from './parts/documents.js';
export * from './parts/diagnostics.js';
export * from './parts/references.js';
export * from './parts/completion.js';
export * from './parts/signature-help.js';
export * from './parts/hover.js';
export * from './parts/debugging-utils.js';
export * from './providers/index.js';
export * from './providers/lint.js';
export * from './providers/variables.js';
