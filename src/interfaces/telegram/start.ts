import 'dotenv/config';

import process from 'node:process';
import { setDefaultOpenAIKey } from '@openai/agents';

import { createContentAnalyzer } from '../../analysis/contentAnalyzer.js';
import { createAgentsGenerationClient } from '../../analysis/generation.js';
import { loadBotConfig, loadBotSecrets } from '../../runtime/botConfig.js';
import { getBotHome, getLogDir } from '../../runtime/botHome.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createAgentsSearchProvider } from '../../search/searchProvider.js';
import { createWebSearchClient } from '../../search/webSearch.js';
import { createSessionHandlers } from '../../session/handlers.js';
import { PendingSteps } from '../../session/pendingSteps.js';
import { createSessionRouter } from '../../session/router.js';
import { connectMongoBotStore } from '../../storage/mongoBotStore.js';
import { createEventLogWriter } from '../../utils/logging.js';
import { createRuntimeLogger } from '../../utils/runtimeLogger.js';
import { createTelegramAdapter, createTelegramBot, createTelegramFileDownloader } from './bot.js';

const botHome = getBotHome(process.env);
const logDir = getLogDir(process.env);

const start = async () => {
  const secrets = loadBotSecrets(process.env);
  const config = await loadBotConfig(process.env);
  const logger = createRuntimeLogger({ logDir, component: 'relaybot' });
  const writeEvent = createEventLogWriter(logDir);

  setDefaultOpenAIKey(secrets.openaiApiKey);

  const store = await connectMongoBotStore({
    uri: secrets.mongoUri,
    dbName: config.mongo.dbName,
    serverSelectionTimeoutMs: config.mongo.serverSelectionTimeoutMs,
  });

  const bot = createTelegramBot(secrets.telegramToken);
  const me = await bot.api.getMe().catch((err: unknown) => {
    throw new Error(`Telegram getMe failed: ${err instanceof Error ? err.message : String(err)}`);
  });

  const generation = createAgentsGenerationClient(config.models);
  const pendingSteps = new PendingSteps();
  const handlers = createSessionHandlers({
    store,
    generation,
    pendingSteps,
    logger: logger.child('handlers'),
    analyzer: createContentAnalyzer({ generation, logger: logger.child('analysis'), analysis: config.analysis }),
    webSearch: createWebSearchClient({
      provider: createAgentsSearchProvider(config.models.search),
      generation,
      logger: logger.child('search'),
      search: config.search,
    }),
    downloadFile: createTelegramFileDownloader({ api: bot.api, token: secrets.telegramToken }),
    descriptionChars: config.analysis.descriptionChars,
    writeEvent,
  });
  const router = createSessionRouter({ handlers, pendingSteps, logger: logger.child('router'), writeEvent });

  const adapter = createTelegramAdapter({
    bot,
    router,
    logger: logger.child('telegram'),
    writeEvent,
    botUsername: me.username,
  });

  const shutdown = (signal: string) => {
    logger.info('shutting down', { signal });
    // start() resolves once polling stops; the store is closed there.
    adapter.stop().catch((err: unknown) => {
      console.error('relaybot shutdown failed', err);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('bot starting', { username: me.username, botHome, models: config.models });
  console.log(`relaybot (telegram) starting as @${me.username}…`);
  try {
    await adapter.start();
  } finally {
    await store.close();
  }
};

start().catch((err) => {
  reportStartupError(err, { botHome, logDir });
  process.exit(1);
});
