/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, expect, it } from 'vitest';

import { createLanguageServerPair, type LanguageServerPair } from './helpers.js';

const position = { line: 0, character: 0 };
const textDocument = { uri: 'file:///suite.robot' };

describe('LanguageServerProtocol lifecycle', () => {
  let pair: LanguageServerPair;

  afterEach(async () => {
    await pair.dispose();
  });

  it('rejects requests that arrive before initialize', async () => {
    pair = createLanguageServerPair();

    await expect(
      pair.client.sendRequest('textDocument/hover', { textDocument, position }),
    ).rejects.toMatchObject({ code: -32002 });
  });

  it('advertises the capabilities of the registered providers', async () => {
    pair = createLanguageServerPair();

    await expect(pair.initialize()).resolves.toEqual({
      capabilities: {
        textDocumentSync: {
          openClose: true,
          change: 1,
          save: { includeText: false },
        },
        referencesProvider: true,
        completionProvider: { triggerCharacters: ['$', '@', '&', '%', '{'] },
      },
      serverInfo: { name: 'keywright-language-server', version: '0.1.0' },
    });
  });

  it('advertises only document sync without providers', async () => {
    pair = createLanguageServerPair({ builtins: false });

    await expect(pair.initialize()).resolves.toMatchObject({
      capabilities: {
        textDocumentSync: {
          openClose: true,
          change: 1,
          save: { includeText: false },
        },
      },
    });
    expect(Object.keys(pair.protocol.capabilities())).toEqual([
      'textDocumentSync',
    ]);
  });

  it('reads settings from initializationOptions', async () => {
    pair = createLanguageServerPair();

    await pair.initialize({ lint: { maxLineLength: 80 } });

    expect(pair.protocol.settings).toEqual({
      languageId: 'robotframework',
      lint: { enabled: true, maxLineLength: 80, disabledRules: [] },
    });
  });

  it('rejects malformed settings as invalid params', async () => {
    pair = createLanguageServerPair();

    await expect(
      pair.initialize({ lint: { maxLineLength: -1 } }),
    ).rejects.toMatchObject({ code: -32602 });
    expect(pair.protocol.initialized).toBe(false);
  });

  it('refuses a second initialize', async () => {
    pair = createLanguageServerPair();
    await pair.initialize();

    await expect(pair.initialize()).rejects.toMatchObject({
      code: -32600,
      message: 'Server already initialized',
    });
  });

  it('answers shutdown with null and then refuses work', async () => {
    pair = createLanguageServerPair();
    await pair.initialize();

    await expect(pair.client.sendRequest('shutdown')).resolves.toBeNull();
    expect(pair.protocol.shutdownRequested).toBe(true);
    await expect(
      pair.client.sendRequest('textDocument/hover', { textDocument, position }),
    ).rejects.toMatchObject({ code: -32600 });
  });

  it('closes the connection on exit', async () => {
    pair = createLanguageServerPair();
    await pair.initialize();
    await pair.client.sendRequest('shutdown');

    await pair.client.sendNotification('exit');
    await pair.connection.closed;

    expect(pair.connection.state).toBe('closed');
  });

  it('drops document notifications before initialize', async () => {
    pair = createLanguageServerPair();

    await pair.open('file:///early.robot', 'Log    hi');
    await pair.initialize();

    expect(pair.protocol.documents.get('file:///early.robot')).toBeUndefined();
  });
});
