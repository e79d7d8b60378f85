import { describe, expect, it, vi } from 'vitest';

import { UNSUPPORTED_DOCUMENT, createContentAnalyzer } from '../analysis/contentAnalyzer.js';
import { InMemoryBotStore } from '../storage/memoryBotStore.js';
import { makeFakeGeneration, makeFakeLogger } from '../testing/fakes.js';
import { createSessionHandlers, settle, type SessionHandlerDeps } from './handlers.js';
import { PendingSteps } from './pendingSteps.js';
import { CONTACT_SAVED, STATS_NOT_FOUND, WELCOME_TEXT } from './replies.js';

const NOW = new Date('2024-05-01T10:00:00Z');

function makeDeps(overrides: Partial<SessionHandlerDeps> = {}) {
  const store = new InMemoryBotStore();
  const generation = makeFakeGeneration('model answer');
  const logger = makeFakeLogger();
  const downloadFile = vi.fn().mockResolvedValue({ bytes: new Uint8Array([0xff, 0xd8, 0xff]), filePath: 'photos/file_1.jpg' });
  const searchAndSummarize = vi.fn().mockResolvedValue({ summary: 'Sunny.', links: ['https://weather.example/'] });
  const extractPdfText = vi.fn().mockResolvedValue('quarterly numbers');
  const writeEvent = vi.fn().mockResolvedValue(undefined);
  const deps: SessionHandlerDeps = {
    store,
    generation,
    logger,
    downloadFile,
    analyzer: createContentAnalyzer({ generation, logger, analysis: { maxDocumentChars: 2000 }, extractPdfText }),
    webSearch: { searchAndSummarize },
    pendingSteps: new PendingSteps(),
    descriptionChars: 100,
    now: () => NOW,
    writeEvent,
    ...overrides,
  };
  return { deps, store, generation, logger, downloadFile, searchAndSummarize, extractPdfText, writeEvent };
}

describe('settle', () => {
  it('captures thrown errors', async () => {
    const error = new Error('boom');
    await expect(settle(async () => Promise.reject(error))).resolves.toEqual({ ok: false, error });
  });
});

describe('session handlers', () => {
  it('registers users and asks for their contact', async () => {
    const { deps, store } = makeDeps();
    const handlers = createSessionHandlers(deps);

    const result = await handlers.register({
      kind: 'command',
      chatId: 5,
      from: { username: 'ana', firstName: 'Ana' },
      command: 'start',
      args: '',
      text: '/start',
    });

    expect(result).toEqual({ ok: true, reply: { text: WELCOME_TEXT, keyboard: 'request_contact' } });
    expect(store.users.get(5)).toEqual({
      chat_id: 5,
      username: 'ana',
      first_name: 'Ana',
      joined_at: NOW,
      phone_number: null,
      total_messages: 0,
      last_active: NOW,
    });
  });

  it('confirms the contact and warns when no user matched', async () => {
    const { deps, store, logger } = makeDeps();
    const handlers = createSessionHandlers(deps);

    const result = await handlers.savePhone(9, '+15550100');

    expect(result).toEqual({ ok: true, reply: { text: CONTACT_SAVED, keyboard: 'remove' } });
    expect(store.users.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('phone number not saved: no registered user', { chatId: 9 });
  });

  it('reports missing statistics', async () => {
    const { deps } = makeDeps();
    const result = await createSessionHandlers(deps).showStats(3);
    expect(result).toEqual({ ok: true, reply: { text: STATS_NOT_FOUND } });
  });

  it('stores photo descriptions under the telegram file path', async () => {
    const longAnswer = 'x'.repeat(150);
    const { deps, store, writeEvent } = makeDeps({ generation: makeFakeGeneration(longAnswer) });
    deps.analyzer = createContentAnalyzer({
      generation: deps.generation,
      logger: deps.logger,
      analysis: { maxDocumentChars: 2000 },
    });
    const handlers = createSessionHandlers(deps);

    const result = await handlers.analyzePhoto({ kind: 'photo', chatId: 4, from: {}, fileId: 'file-1' });

    expect(result).toEqual({ ok: true, reply: { text: `Image Analysis:\n\n${longAnswer}` } });
    expect(store.files).toEqual([
      { chat_id: 4, filename: 'photos/file_1.jpg', description: 'x'.repeat(100), timestamp: NOW },
    ]);
    expect(writeEvent).toHaveBeenCalledWith({
      ts: NOW.toISOString(),
      type: 'file.analyzed',
      data: { chatId: 4, filename: 'photos/file_1.jpg' },
    });
  });

  it('analyzes pdf documents', async () => {
    const { deps, store, generation, extractPdfText } = makeDeps();
    const handlers = createSessionHandlers(deps);

    const result = await handlers.analyzeDocument({
      kind: 'document',
      chatId: 4,
      from: {},
      fileId: 'doc-1',
      filename: 'q1.pdf',
    });

    expect(result).toEqual({ ok: true, reply: { text: 'Document Analysis:\n\nmodel answer' } });
    expect(extractPdfText).toHaveBeenCalledWith(new Uint8Array([0xff, 0xd8, 0xff]));
    expect(generation.generateText).toHaveBeenCalledWith('Analyze this PDF content: quarterly numbers');
    expect(store.files[0]?.filename).toBe('q1.pdf');
  });

  it('answers non-pdf documents without downloading or calling the model', async () => {
    const { deps, store, generation, downloadFile } = makeDeps();
    const handlers = createSessionHandlers(deps);

    const result = await handlers.analyzeDocument({
      kind: 'document',
      chatId: 4,
      from: {},
      fileId: 'doc-2',
      filename: 'notes.txt',
      mimeType: 'text/plain',
    });

    expect(result).toEqual({ ok: true, reply: { text: `Document Analysis:\n\n${UNSUPPORTED_DOCUMENT}` } });
    expect(downloadFile).not.toHaveBeenCalled();
    expect(generation.generateText).not.toHaveBeenCalled();
    expect(generation.generateFromImage).not.toHaveBeenCalled();
    expect(store.files).toEqual([
      { chat_id: 4, filename: 'notes.txt', description: UNSUPPORTED_DOCUMENT.slice(0, 100), timestamp: NOW },
    ]);
  });

  it('keeps the reply when the event log write fails', async () => {
    const { deps, logger } = makeDeps({ writeEvent: vi.fn().mockRejectedValue(new Error('disk full')) });
    const handlers = createSessionHandlers(deps);

    const result = await handlers.analyzePhoto({ kind: 'photo', chatId: 4, from: {}, fileId: 'file-1' });

    expect(result.ok).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('fails the chat handler when the model fails', async () => {
    const { deps, generation, store } = makeDeps();
    const error = new Error('quota exceeded');
    generation.generateText.mockRejectedValueOnce(error);

    const result = await createSessionHandlers(deps).chat(1, 'hello');

    expect(result).toEqual({ ok: false, error });
    expect(store.chatHistory).toEqual([]);
  });

  it('formats search results', async () => {
    const { deps, searchAndSummarize } = makeDeps();

    const result = await createSessionHandlers(deps).runSearchQuery(1, 'weather');

    expect(searchAndSummarize).toHaveBeenCalledWith('weather');
    expect(result).toEqual({
      ok: true,
      reply: { text: "Here's what I found:\n\nSunny.\n\nSources:\n• https://weather.example/" },
    });
  });
});
