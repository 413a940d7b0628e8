/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';

import {
  CancelledError,
  isFatalError,
  ProtocolDecodeError,
  ResponseError,
  TransportError,
} from './errors.js';

describe('isFatalError', () => {
  it('is true for failures of the stream itself', () => {
    expect(isFatalError(new TransportError('reset'))).toBe(true);
    expect(isFatalError(new ProtocolDecodeError('bad header'))).toBe(true);
  });

  it('is false for errors the connection survives', () => {
    expect(isFatalError(new ResponseError(-32601, 'nope'))).toBe(false);
    expect(isFatalError(new CancelledError())).toBe(false);
    expect(isFatalError('reset')).toBe(false);
  });
});
