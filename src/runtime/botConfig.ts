import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { getBotHome } from './botHome.js';

const BOT_CONFIG_SCHEMA_VERSION = 1;

const BOT_CONFIG_SCHEMA = z.object({
  schemaVersion: z.literal(BOT_CONFIG_SCHEMA_VERSION),

  models: z
    .object({
      text: z.string().min(1).default('gpt-4.1-mini'),
      vision: z.string().min(1).default('gpt-4.1-mini'),
      search: z.string().min(1).default('gpt-4.1-mini'),
    })
    .default({ text: 'gpt-4.1-mini', vision: 'gpt-4.1-mini', search: 'gpt-4.1-mini' }),

  search: z
    .object({
      maxResults: z.number().int().positive().default(5),
      fetchCount: z.number().int().positive().default(3),
      fetchTimeoutMs: z.number().int().positive().default(5000),
      maxPageChars: z.number().int().positive().default(1000),
    })
    .default({ maxResults: 5, fetchCount: 3, fetchTimeoutMs: 5000, maxPageChars: 1000 }),

  analysis: z
    .object({
      maxDocumentChars: z.number().int().positive().default(2000),
      descriptionChars: z.number().int().positive().default(100),
    })
    .default({ maxDocumentChars: 2000, descriptionChars: 100 }),

  mongo: z
    .object({
      dbName: z.string().min(1).default('telegram_bot'),
      serverSelectionTimeoutMs: z.number().int().positive().default(5000),
    })
    .default({ dbName: 'telegram_bot', serverSelectionTimeoutMs: 5000 }),
});

// Credentials stay env-only; they never go into config.json.
const BOT_ENV_SCHEMA = z.object({
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'Missing TELEGRAM_BOT_TOKEN in environment'),
  OPENAI_API_KEY: z.string().trim().min(1, 'Missing OPENAI_API_KEY in environment'),
  MONGO_URI: z.string().trim().min(1, 'Missing MONGO_URI in environment'),
});

export type BotConfig = z.infer<typeof BOT_CONFIG_SCHEMA>;
export type ModelsConfig = BotConfig['models'];
export type SearchConfig = BotConfig['search'];
export type AnalysisConfig = BotConfig['analysis'];

export type BotSecrets = {
  telegramToken: string;
  openaiApiKey: string;
  mongoUri: string;
};

export const DEFAULT_BOT_CONFIG: BotConfig = BOT_CONFIG_SCHEMA.parse({
  schemaVersion: BOT_CONFIG_SCHEMA_VERSION,
});

export function getBotConfigPath(env: NodeJS.ProcessEnv): string {
  return path.join(getBotHome(env), 'config.json');
}

export function loadBotSecrets(env: NodeJS.ProcessEnv): BotSecrets {
  const res = BOT_ENV_SCHEMA.safeParse({
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN ?? '',
    OPENAI_API_KEY: env.OPENAI_API_KEY ?? '',
    MONGO_URI: env.MONGO_URI ?? '',
  });

  if (!res.success) {
    throw new Error(res.error.issues.map((issue) => issue.message).join('; '));
  }

  return {
    telegramToken: res.data.TELEGRAM_BOT_TOKEN,
    openaiApiKey: res.data.OPENAI_API_KEY,
    mongoUri: res.data.MONGO_URI,
  };
}

const pickEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export async function loadBotConfig(env: NodeJS.ProcessEnv): Promise<BotConfig> {
  const configPath = getBotConfigPath(env);

  let config = DEFAULT_BOT_CONFIG;
  if (existsSync(configPath)) {
    const raw = await readFile(configPath, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const res = BOT_CONFIG_SCHEMA.safeParse(parsed);
    if (!res.success) {
      throw new Error(`Invalid bot config at ${configPath}: ${res.error.message}`);
    }
    config = res.data;
  }

  return {
    ...config,
    models: {
      text: pickEnv(env.TEXT_MODEL) ?? config.models.text,
      vision: pickEnv(env.VISION_MODEL) ?? config.models.vision,
      search: pickEnv(env.SEARCH_MODEL) ?? config.models.search,
    },
    mongo: {
      ...config.mongo,
      dbName: pickEnv(env.MONGO_DB_NAME) ?? config.mongo.dbName,
    },
  };
}
