/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './dap-codec.js';
export * from './dap-connection.js';
export * from './launch-arguments.js';
export * from './ports.js';
export * from './protocol.js';
