import { describe, expect, it, vi } from 'vitest';

import { MongoBotStore, type MongoBotStoreCollections } from './mongoBotStore.js';

const makeCollections = () => {
  const users = {
    updateOne: vi.fn().mockResolvedValue({ matchedCount: 1, upsertedCount: 0 }),
    findOne: vi.fn().mockResolvedValue(null),
    createIndex: vi.fn().mockResolvedValue('chat_id_1'),
  };
  const chatHistory = { insertOne: vi.fn().mockResolvedValue({ acknowledged: true }) };
  const files = { insertOne: vi.fn().mockResolvedValue({ acknowledged: true }) };
  const collections: MongoBotStoreCollections = { users, chatHistory, files };
  return { users, chatHistory, files, collections };
};

describe('MongoBotStore', () => {
  const now = new Date('2026-03-01T10:00:00.000Z');

  it('registers users with an insert-only upsert', async () => {
    const { users, collections } = makeCollections();
    users.updateOne.mockResolvedValueOnce({ matchedCount: 0, upsertedCount: 1 });
    const store = new MongoBotStore(collections);

    const inserted = await store.registerUser({ chatId: 42, username: 'ada', firstName: 'Ada' }, now);

    expect(inserted).toBe(true);
    expect(users.updateOne).toHaveBeenCalledWith(
      { chat_id: 42 },
      {
        $setOnInsert: {
          chat_id: 42,
          username: 'ada',
          first_name: 'Ada',
          joined_at: now,
          phone_number: null,
          total_messages: 0,
          last_active: now,
        },
      },
      { upsert: true },
    );
  });

  it('reports an existing user as not inserted', async () => {
    const { collections } = makeCollections();
    const store = new MongoBotStore(collections);

    await expect(store.registerUser({ chatId: 42 }, now)).resolves.toBe(false);
  });

  it('sets the phone number without upserting', async () => {
    const { users, collections } = makeCollections();
    users.updateOne.mockResolvedValueOnce({ matchedCount: 0, upsertedCount: 0 });
    const store = new MongoBotStore(collections);

    const matched = await store.savePhoneNumber(7, '+15550100');

    expect(matched).toBe(false);
    expect(users.updateOne).toHaveBeenCalledWith({ chat_id: 7 }, { $set: { phone_number: '+15550100' } });
  });

  it('records a chat exchange and bumps counters in one update', async () => {
    const { users, chatHistory, collections } = makeCollections();
    const store = new MongoBotStore(collections);

    await store.recordChat({ chat_id: 42, user_message: 'hi', bot_response: 'hello', timestamp: now });

    expect(chatHistory.insertOne).toHaveBeenCalledWith({
      chat_id: 42,
      user_message: 'hi',
      bot_response: 'hello',
      timestamp: now,
    });
    expect(users.updateOne).toHaveBeenCalledTimes(1);
    expect(users.updateOne).toHaveBeenCalledWith(
      { chat_id: 42 },
      { $inc: { total_messages: 1 }, $set: { last_active: now } },
    );
  });

  it('appends file records', async () => {
    const { files, collections } = makeCollections();
    const store = new MongoBotStore(collections);

    await store.recordFile({ chat_id: 42, filename: 'report.pdf', description: 'summary', timestamp: now });

    expect(files.insertOne).toHaveBeenCalledWith({
      chat_id: 42,
      filename: 'report.pdf',
      description: 'summary',
      timestamp: now,
    });
  });

  it('ensures a unique chat_id index and closes the client', async () => {
    const { users, collections } = makeCollections();
    const closeClient = vi.fn().mockResolvedValue(undefined);
    const store = new MongoBotStore(collections, closeClient);

    await store.ensureIndexes();
    await store.close();

    expect(users.createIndex).toHaveBeenCalledWith({ chat_id: 1 }, { unique: true });
    expect(closeClient).toHaveBeenCalledTimes(1);
  });
});
