import { resolveDocumentKind, type ContentAnalyzer } from '../analysis/contentAnalyzer.js';
import type { GenerationClient } from '../analysis/generation.js';
import type { WebSearchClient } from '../search/webSearch.js';
import type { BotStore } from '../storage/botStore.js';
import type { EventLogRecord } from '../utils/logging.js';
import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';
import type { CommandEvent, DocumentEvent, BotReply, FileDownloader, PhotoEvent } from './events.js';
import type { PendingSteps } from './pendingSteps.js';
import {
  CONTACT_SAVED,
  DOCUMENT_REPLY_PREFIX,
  HELP_TEXT,
  IMAGE_REPLY_PREFIX,
  SEARCH_PROMPT,
  STATS_NOT_FOUND,
  WELCOME_TEXT,
  formatSearchReply,
  formatStats,
} from './replies.js';

export type HandlerResult = { ok: true; reply: BotReply } | { ok: false; error: unknown };

export type EventWriter = (record: EventLogRecord) => Promise<void>;

export type SessionHandlerDeps = {
  store: BotStore;
  analyzer: ContentAnalyzer;
  webSearch: WebSearchClient;
  generation: GenerationClient;
  downloadFile: FileDownloader;
  pendingSteps: PendingSteps;
  logger: RuntimeLogger;
  descriptionChars: number;
  now?: () => Date;
  writeEvent?: EventWriter;
};

export type SessionHandlers = {
  register(event: CommandEvent): Promise<HandlerResult>;
  help(): Promise<HandlerResult>;
  startWebSearch(chatId: number): Promise<HandlerResult>;
  runSearchQuery(chatId: number, query: string): Promise<HandlerResult>;
  showStats(chatId: number): Promise<HandlerResult>;
  savePhone(chatId: number, phoneNumber: string): Promise<HandlerResult>;
  analyzePhoto(event: PhotoEvent): Promise<HandlerResult>;
  analyzeDocument(event: DocumentEvent): Promise<HandlerResult>;
  chat(chatId: number, text: string): Promise<HandlerResult>;
};

/** Runs handler logic and captures whatever it throws as a failed result. */
export async function settle(work: () => Promise<BotReply>): Promise<HandlerResult> {
  try {
    return { ok: true, reply: await work() };
  } catch (error) {
    return { ok: false, error };
  }
}

export function createSessionHandlers(deps: SessionHandlerDeps): SessionHandlers {
  const { store, analyzer, webSearch, generation, downloadFile, pendingSteps, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const writeEvent = deps.writeEvent ?? (async () => {});

  const storeFileDescription = async (chatId: number, filename: string, analysis: string) => {
    const timestamp = now();
    await store.recordFile({
      chat_id: chatId,
      filename,
      description: analysis.slice(0, deps.descriptionChars),
      timestamp,
    });
    await writeEvent({ ts: timestamp.toISOString(), type: 'file.analyzed', data: { chatId, filename } }).catch(
      (err: unknown) => logger.warn('event log write failed', { type: 'file.analyzed', error: serializeError(err) }),
    );
  };

  return {
    register: (event) =>
      settle(async () => {
        const inserted = await store.registerUser(
          { chatId: event.chatId, username: event.from.username, firstName: event.from.firstName },
          now(),
        );
        logger.info('user registered', { chatId: event.chatId, inserted });
        return { text: WELCOME_TEXT, keyboard: 'request_contact' };
      }),

    help: () => settle(async () => ({ text: HELP_TEXT })),

    startWebSearch: (chatId) =>
      settle(async () => {
        pendingSteps.set(chatId, 'await_search_query');
        return { text: SEARCH_PROMPT };
      }),

    runSearchQuery: (chatId, query) =>
      settle(async () => {
        const { summary, links } = await webSearch.searchAndSummarize(query);
        logger.info('web search completed', { chatId, links: links.length });
        return { text: formatSearchReply(summary, links) };
      }),

    showStats: (chatId) =>
      settle(async () => {
        const user = await store.findUser(chatId);
        if (!user) {
          return { text: STATS_NOT_FOUND };
        }
        return { text: formatStats(user) };
      }),

    savePhone: (chatId, phoneNumber) =>
      settle(async () => {
        const matched = await store.savePhoneNumber(chatId, phoneNumber);
        if (!matched) {
          logger.warn('phone number not saved: no registered user', { chatId });
        }
        return { text: CONTACT_SAVED, keyboard: 'remove' };
      }),

    analyzePhoto: (event) =>
      settle(async () => {
        const file = await downloadFile(event.fileId);
        const analysis = await analyzer.analyzeImage(file.bytes);
        await storeFileDescription(event.chatId, file.filePath ?? event.fileId, analysis);
        return { text: `${IMAGE_REPLY_PREFIX}${analysis}` };
      }),

    analyzeDocument: (event) =>
      settle(async () => {
        const kind = resolveDocumentKind({ filename: event.filename, mimeType: event.mimeType });
        // Unsupported files are answered without fetching their bytes.
        const file = kind === 'pdf' ? await downloadFile(event.fileId) : { bytes: new Uint8Array() };
        const analysis = await analyzer.analyzeDocument(file.bytes, kind);
        await storeFileDescription(event.chatId, event.filename ?? event.fileId, analysis);
        return { text: `${DOCUMENT_REPLY_PREFIX}${analysis}` };
      }),

    chat: (chatId, text) =>
      settle(async () => {
        const response = await generation.generateText(text);
        await store.recordChat({ chat_id: chatId, user_message: text, bot_response: response, timestamp: now() });
        return { text: response };
      }),
  };
}
