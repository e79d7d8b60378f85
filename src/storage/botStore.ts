/**
 * Persisted shapes. Field names are the stored document keys.
 */
export type UserRecord = {
  chat_id: number;
  username: string | null;
  first_name: string | null;
  joined_at: Date;
  phone_number: string | null;
  total_messages: number;
  last_active: Date;
};

export type ChatHistoryRecord = {
  chat_id: number;
  user_message: string;
  bot_response: string;
  timestamp: Date;
};

export type FileRecord = {
  chat_id: number;
  filename: string;
  description: string;
  timestamp: Date;
};

export type RegisterUserInput = {
  chatId: number;
  username?: string;
  firstName?: string;
};

/**
 * Persistence gateway used by the session handlers.
 *
 * Every write is a single backend operation; callers never read-modify-write.
 */
export interface BotStore {
  /** Creates the user with defaults when absent. Returns true when a record was inserted. */
  registerUser(input: RegisterUserInput, now: Date): Promise<boolean>;
  /** Sets phone_number on an existing user. Returns false when no user matched. */
  savePhoneNumber(chatId: number, phoneNumber: string): Promise<boolean>;
  /** Appends a chat exchange and bumps total_messages/last_active in one update. */
  recordChat(record: ChatHistoryRecord): Promise<void>;
  recordFile(record: FileRecord): Promise<void>;
  findUser(chatId: number): Promise<UserRecord | null>;
  close(): Promise<void>;
}

export function buildNewUserRecord(input: RegisterUserInput, now: Date): UserRecord {
  return {
    chat_id: input.chatId,
    username: input.username ?? null,
    first_name: input.firstName ?? null,
    joined_at: now,
    phone_number: null,
    total_messages: 0,
    last_active: now,
  };
}
