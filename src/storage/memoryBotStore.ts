import {
  buildNewUserRecord,
  type BotStore,
  type ChatHistoryRecord,
  type FileRecord,
  type RegisterUserInput,
  type UserRecord,
} from './botStore.js';

/**
 * In-process BotStore with the same upsert/increment semantics as the MongoDB
 * store. Used by tests in place of a live database.
 */
export class InMemoryBotStore implements BotStore {
  readonly users = new Map<number, UserRecord>();
  readonly chatHistory: ChatHistoryRecord[] = [];
  readonly files: FileRecord[] = [];
  closed = false;

  async registerUser(input: RegisterUserInput, now: Date): Promise<boolean> {
    if (this.users.has(input.chatId)) return false;
    this.users.set(input.chatId, buildNewUserRecord(input, now));
    return true;
  }

  async savePhoneNumber(chatId: number, phoneNumber: string): Promise<boolean> {
    const user = this.users.get(chatId);
    if (!user) return false;
    this.users.set(chatId, { ...user, phone_number: phoneNumber });
    return true;
  }

  async recordChat(record: ChatHistoryRecord): Promise<void> {
    this.chatHistory.push({ ...record });
    const user = this.users.get(record.chat_id);
    if (!user) return;
    this.users.set(record.chat_id, {
      ...user,
      total_messages: user.total_messages + 1,
      last_active: record.timestamp,
    });
  }

  async recordFile(record: FileRecord): Promise<void> {
    this.files.push({ ...record });
  }

  async findUser(chatId: number): Promise<UserRecord | null> {
    const user = this.users.get(chatId);
    return user ? { ...user } : null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
