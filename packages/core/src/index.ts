/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Message model and codecs
export * from './jsonrpc/messages.js';
export * from './jsonrpc/codec.js';
export * from './jsonrpc/errors.js';

// Transports
export * from './jsonrpc/framing.js';
export * from './jsonrpc/transport.js';
export * from './jsonrpc/stream-transport.js';
export * from './jsonrpc/socket-transport.js';

// Dispatch
export * from './jsonrpc/cancellation.js';
export * from './jsonrpc/scheduler.js';
export * from './jsonrpc/connection.js';
export * from './jsonrpc/server.js';

// Events
export * from './events/async-collector.js';

// Logging
export * from './debug/index.js';
export * from './utils/paths.js';
