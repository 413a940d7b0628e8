/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A duplex channel of JSON payloads. Implementations own framing and
 * serialization; callers see parsed values only.
 */
export interface MessageTransport {
  /** Serializes one payload and writes it as a single frame. */
  send(payload: unknown): Promise<void>;

  /**
   * Inbound payloads in arrival order. The sequence ends when the
   * underlying stream ends or the transport is closed, and fails with a
   * TransportError or ProtocolDecodeError when the stream breaks.
   */
  receive(): AsyncIterable<unknown>;

  close(): Promise<void>;

  readonly isClosed: boolean;
}
