import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';
import type { BotEvent, BotReply, CommandEvent } from './events.js';
import type { EventWriter, HandlerResult, SessionHandlers } from './handlers.js';
import type { PendingStepKind, PendingSteps } from './pendingSteps.js';
import { APOLOGIES, type HandlerName } from './replies.js';

export type CommandName = 'start' | 'help' | 'websearch' | 'stats';

type Route = {
  name: HandlerName;
  run: () => Promise<HandlerResult>;
};

export type SessionRouterOptions = {
  handlers: SessionHandlers;
  pendingSteps: PendingSteps;
  logger: RuntimeLogger;
  writeEvent?: EventWriter;
  now?: () => Date;
};

export type DispatchOutcome = {
  /** Handler that produced the reply; its apology covers a failed delivery. */
  handler: HandlerName;
  reply: BotReply;
};

export interface SessionRouter {
  /** Resolves an event to exactly one reply. Never rejects. */
  dispatch(event: BotEvent): Promise<DispatchOutcome>;
}

const isCommandName = (value: string): value is CommandName =>
  value === 'start' || value === 'help' || value === 'websearch' || value === 'stats';

export function createSessionRouter(options: SessionRouterOptions): SessionRouter {
  const { handlers, pendingSteps, logger } = options;
  const now = options.now ?? (() => new Date());
  const writeEvent = options.writeEvent ?? (async () => {});

  const commands: Record<CommandName, (event: CommandEvent) => Route> = {
    start: (event) => ({ name: 'start', run: () => handlers.register(event) }),
    help: () => ({ name: 'help', run: () => handlers.help() }),
    websearch: (event) => ({ name: 'websearch', run: () => handlers.startWebSearch(event.chatId) }),
    stats: (event) => ({ name: 'stats', run: () => handlers.showStats(event.chatId) }),
  };

  const continuations: Record<PendingStepKind, (chatId: number, text: string) => Route> = {
    await_search_query: (chatId, text) => ({
      name: 'searchQuery',
      run: () => handlers.runSearchQuery(chatId, text),
    }),
  };

  const routeText = (chatId: number, text: string): Route => {
    const step = pendingSteps.take(chatId);
    if (step !== undefined) {
      return continuations[step](chatId, text);
    }
    return { name: 'chat', run: () => handlers.chat(chatId, text) };
  };

  const resolve = (event: BotEvent): Route => {
    switch (event.kind) {
      case 'command':
        return isCommandName(event.command) ? commands[event.command](event) : routeText(event.chatId, event.text);
      case 'contact':
        return { name: 'contact', run: () => handlers.savePhone(event.chatId, event.phoneNumber) };
      case 'photo':
        return { name: 'photo', run: () => handlers.analyzePhoto(event) };
      case 'document':
        return { name: 'document', run: () => handlers.analyzeDocument(event) };
      case 'text':
        return routeText(event.chatId, event.text);
    }
  };

  const record = async (type: 'handler.success' | 'handler.error', data: Record<string, unknown>) => {
    try {
      await writeEvent({ ts: now().toISOString(), type, data });
    } catch (err) {
      logger.warn('event log write failed', { type, error: serializeError(err) });
    }
  };

  return {
    async dispatch(event) {
      const route = resolve(event);
      let result: HandlerResult;
      try {
        result = await route.run();
      } catch (error) {
        result = { ok: false, error };
      }

      if (result.ok) {
        logger.debug('handler completed', { chatId: event.chatId, handler: route.name });
        await record('handler.success', { chatId: event.chatId, handler: route.name });
        return { handler: route.name, reply: result.reply };
      }

      const error = serializeError(result.error);
      logger.error('handler failed', { chatId: event.chatId, handler: route.name, error });
      await record('handler.error', { chatId: event.chatId, handler: route.name, error });
      return { handler: route.name, reply: { text: APOLOGIES[route.name] } };
    },
  };
}
