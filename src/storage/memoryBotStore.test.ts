import { describe, expect, it } from 'vitest';

import { InMemoryBotStore } from './memoryBotStore.js';

describe('InMemoryBotStore', () => {
  it('keeps the first registration untouched', async () => {
    const store = new InMemoryBotStore();
    const first = new Date('2026-03-01T10:00:00.000Z');
    const second = new Date('2026-03-02T10:00:00.000Z');

    await expect(store.registerUser({ chatId: 1, username: 'ada' }, first)).resolves.toBe(true);
    await store.savePhoneNumber(1, '+15550100');
    await store.recordChat({ chat_id: 1, user_message: 'a', bot_response: 'b', timestamp: second });
    await expect(store.registerUser({ chatId: 1, username: 'other' }, second)).resolves.toBe(false);

    const user = await store.findUser(1);
    expect(user).toEqual({
      chat_id: 1,
      username: 'ada',
      first_name: null,
      joined_at: first,
      phone_number: '+15550100',
      total_messages: 1,
      last_active: second,
    });
  });

  it('does not create users when saving a phone number', async () => {
    const store = new InMemoryBotStore();

    await expect(store.savePhoneNumber(5, '+15550100')).resolves.toBe(false);
    await expect(store.findUser(5)).resolves.toBeNull();
  });
});
