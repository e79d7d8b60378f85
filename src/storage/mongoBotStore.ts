import { MongoClient, type UpdateFilter } from 'mongodb';

import {
  buildNewUserRecord,
  type BotStore,
  type ChatHistoryRecord,
  type FileRecord,
  type RegisterUserInput,
  type UserRecord,
} from './botStore.js';

type ChatFilter = { chat_id: number };

export type UsersCollectionLike = {
  updateOne(
    filter: ChatFilter,
    update: UpdateFilter<UserRecord>,
    options?: { upsert?: boolean },
  ): Promise<{ matchedCount: number; upsertedCount: number }>;
  findOne(filter: ChatFilter): Promise<UserRecord | null>;
  createIndex(keys: { chat_id: 1 }, options: { unique: boolean }): Promise<string>;
};

export type AppendCollectionLike<T> = {
  insertOne(doc: T): Promise<unknown>;
};

export type MongoBotStoreCollections = {
  users: UsersCollectionLike;
  chatHistory: AppendCollectionLike<ChatHistoryRecord>;
  files: AppendCollectionLike<FileRecord>;
};

export type ConnectMongoOptions = {
  uri: string;
  dbName: string;
  serverSelectionTimeoutMs: number;
};

export const COLLECTION_NAMES = {
  users: 'users',
  chatHistory: 'chat_history',
  files: 'files',
} as const;

export class MongoBotStore implements BotStore {
  readonly #collections: MongoBotStoreCollections;
  readonly #closeClient: () => Promise<void>;

  constructor(collections: MongoBotStoreCollections, closeClient: () => Promise<void> = async () => {}) {
    this.#collections = collections;
    this.#closeClient = closeClient;
  }

  async ensureIndexes(): Promise<void> {
    await this.#collections.users.createIndex({ chat_id: 1 }, { unique: true });
  }

  async registerUser(input: RegisterUserInput, now: Date): Promise<boolean> {
    const result = await this.#collections.users.updateOne(
      { chat_id: input.chatId },
      { $setOnInsert: buildNewUserRecord(input, now) },
      { upsert: true },
    );
    return result.upsertedCount > 0;
  }

  async savePhoneNumber(chatId: number, phoneNumber: string): Promise<boolean> {
    const result = await this.#collections.users.updateOne(
      { chat_id: chatId },
      { $set: { phone_number: phoneNumber } },
    );
    return result.matchedCount > 0;
  }

  async recordChat(record: ChatHistoryRecord): Promise<void> {
    await this.#collections.chatHistory.insertOne({ ...record });
    await this.#collections.users.updateOne(
      { chat_id: record.chat_id },
      {
        $inc: { total_messages: 1 },
        $set: { last_active: record.timestamp },
      },
    );
  }

  async recordFile(record: FileRecord): Promise<void> {
    await this.#collections.files.insertOne({ ...record });
  }

  async findUser(chatId: number): Promise<UserRecord | null> {
    return this.#collections.users.findOne({ chat_id: chatId });
  }

  async close(): Promise<void> {
    await this.#closeClient();
  }
}

/**
 * Connects, pings and prepares indexes. Any failure here is a startup failure.
 */
export async function connectMongoBotStore(options: ConnectMongoOptions): Promise<MongoBotStore> {
  const client = new MongoClient(options.uri, {
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMs,
  });

  try {
    await client.connect();
    const db = client.db(options.dbName);
    await db.command({ ping: 1 });

    const store = new MongoBotStore(
      {
        users: db.collection<UserRecord>(COLLECTION_NAMES.users),
        chatHistory: db.collection<ChatHistoryRecord>(COLLECTION_NAMES.chatHistory),
        files: db.collection<FileRecord>(COLLECTION_NAMES.files),
      },
      () => client.close(),
    );
    await store.ensureIndexes();
    return store;
  } catch (err) {
    await client.close().catch(() => undefined);
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`MongoDB unreachable: ${message}`);
  }
}
