import { Bot, Keyboard } from 'grammy';

import {
  classifyText,
  type BotEvent,
  type BotReply,
  type DownloadedFile,
  type FileDownloader,
  type ReplyKeyboard,
} from '../../session/events.js';
import type { SessionRouter } from '../../session/router.js';
import { APOLOGIES, SHARE_CONTACT_LABEL } from '../../session/replies.js';
import type { EventLogRecord } from '../../utils/logging.js';
import { serializeError, type RuntimeLogger } from '../../utils/runtimeLogger.js';

type TelegramDocument = {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
};

type TelegramPhotoSize = {
  file_id: string;
  file_unique_id: string;
  width: number;
  height: number;
  file_size?: number;
};

type TelegramContact = {
  phone_number: string;
  first_name?: string;
};

export type TelegramReplyMarkup = Keyboard | { remove_keyboard: true };

export type TelegramContext = {
  chat: { id: number; type: string };
  message: {
    text?: string;
    caption?: string;
    document?: TelegramDocument;
    photo?: TelegramPhotoSize[];
    contact?: TelegramContact;
    message_id: number;
  };
  from?: { id?: number; username?: string; first_name?: string };
  reply: (text: string, other?: { reply_markup?: TelegramReplyMarkup }) => Promise<unknown>;
};

type TelegramMessageEvent = 'message:text' | 'message:contact' | 'message:document' | 'message:photo';

export type TelegramApiLike = {
  getFile: (fileId: string) => Promise<{ file_path?: string }>;
  getMe: () => Promise<{ username: string }>;
};

export type TelegramBotLike = {
  on: (event: TelegramMessageEvent, handler: (ctx: TelegramContext) => Promise<void> | void) => void;
  catch: (handler: (err: unknown) => Promise<void> | void) => void;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  api: TelegramApiLike;
};

export type TelegramAdapterOptions = {
  bot: TelegramBotLike;
  router: SessionRouter;
  logger: RuntimeLogger;
  writeEvent: (record: EventLogRecord) => Promise<void>;
  botUsername?: string;
  now?: () => Date;
};

export type TelegramAdapter = {
  bot: TelegramBotLike;
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export function createTelegramBot(token: string): TelegramBotLike {
  if (!token) {
    throw new Error('Missing TELEGRAM_BOT_TOKEN in environment');
  }
  return new Bot(token) as unknown as TelegramBotLike;
}

export function getLargestPhotoSize(photoSizes: TelegramPhotoSize[]): TelegramPhotoSize {
  if (photoSizes.length === 1) return photoSizes[0];

  return photoSizes.reduce((best, current) => {
    const bestPixels = best.width * best.height;
    const currentPixels = current.width * current.height;

    if (currentPixels > bestPixels) return current;

    if (currentPixels === bestPixels) {
      const bestSize = best.file_size ?? 0;
      const currentSize = current.file_size ?? 0;
      if (currentSize > bestSize) return current;
    }

    return best;
  });
}

export function buildReplyMarkup(keyboard: ReplyKeyboard | undefined): TelegramReplyMarkup | undefined {
  if (keyboard === 'request_contact') {
    return new Keyboard().requestContact(SHARE_CONTACT_LABEL).oneTime().resized();
  }
  if (keyboard === 'remove') {
    return { remove_keyboard: true };
  }
  return undefined;
}

export function createTelegramFileDownloader(input: {
  api: Pick<TelegramApiLike, 'getFile'>;
  token: string;
  fetchImpl?: typeof fetch;
}): FileDownloader {
  const { api, token, fetchImpl = fetch } = input;

  return async (fileId): Promise<DownloadedFile> => {
    const file = await api.getFile(fileId);
    const filePath = file.file_path;
    if (!filePath) {
      throw new Error('Telegram file path is missing from getFile response.');
    }

    const response = await fetchImpl(`https://api.telegram.org/file/bot${token}/${filePath}`);
    if (!response.ok) {
      throw new Error(`Failed to download Telegram file (${response.status}).`);
    }

    return {
      bytes: new Uint8Array(await response.arrayBuffer()),
      filePath,
    };
  };
}

/** Maps a Telegram update to a session event. Returns null for updates the bot ignores. */
export function toBotEvent(ctx: TelegramContext, botUsername?: string): BotEvent | null {
  const chatId = ctx.chat.id;
  const from = { username: ctx.from?.username, firstName: ctx.from?.first_name };
  const { message } = ctx;

  if (message.contact) {
    return { kind: 'contact', chatId, from, phoneNumber: message.contact.phone_number };
  }

  if (message.photo && message.photo.length > 0) {
    return { kind: 'photo', chatId, from, fileId: getLargestPhotoSize(message.photo).file_id };
  }

  if (message.document) {
    return {
      kind: 'document',
      chatId,
      from,
      fileId: message.document.file_id,
      filename: message.document.file_name,
      mimeType: message.document.mime_type,
    };
  }

  const text = message.text;
  if (text === undefined || !text.trim()) return null;

  return classifyText({ chatId, from, text }, botUsername);
}

export function createTelegramAdapter(options: TelegramAdapterOptions): TelegramAdapter {
  const { bot, router, logger, writeEvent, botUsername, now = () => new Date() } = options;

  const writeLog = async (record: EventLogRecord) => {
    try {
      await writeEvent(record);
    } catch (err) {
      logger.warn('event log write failed', { type: record.type, error: serializeError(err) });
    }
  };

  const sendReply = async (ctx: TelegramContext, reply: BotReply) => {
    const replyMarkup = buildReplyMarkup(reply.keyboard);
    await ctx.reply(reply.text, replyMarkup ? { reply_markup: replyMarkup } : undefined);
  };

  const handleUpdate = async (ctx: TelegramContext) => {
    const event = toBotEvent(ctx, botUsername);
    if (!event) return;

    await writeLog({
      ts: now().toISOString(),
      type: 'telegram.update',
      data: { chatId: event.chatId, kind: event.kind, messageId: ctx.message.message_id },
    });

    const { handler, reply } = await router.dispatch(event);
    try {
      await sendReply(ctx, reply);
    } catch (err) {
      const error = serializeError(err);
      logger.error('reply delivery failed', { chatId: event.chatId, handler, error });
      await writeLog({
        ts: now().toISOString(),
        type: 'handler.error',
        data: { chatId: event.chatId, handler, stage: 'delivery', error },
      });
      // A failure here escapes to bot.catch.
      await ctx.reply(APOLOGIES[handler]);
    }
  };

  bot.on('message:text', handleUpdate);
  bot.on('message:contact', handleUpdate);
  bot.on('message:photo', handleUpdate);
  bot.on('message:document', handleUpdate);

  bot.catch(async (err) => {
    const error = serializeError(readBotErrorCause(err));
    logger.error('unhandled telegram error', { error });
    await writeLog({ ts: now().toISOString(), type: 'bot.error', data: { error } });
  });

  return {
    bot,
    start: () => bot.start(),
    stop: () => bot.stop(),
  };
}

// grammy wraps handler failures in a BotError whose `error` field holds the cause.
function readBotErrorCause(err: unknown): unknown {
  if (typeof err === 'object' && err !== null && 'error' in err) {
    return err.error;
  }
  return err;
}
