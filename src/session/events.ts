export type BotSender = {
  username?: string;
  firstName?: string;
};

type EventBase = {
  chatId: number;
  from: BotSender;
};

export type CommandEvent = EventBase & {
  kind: 'command';
  command: string;
  args: string;
  /** Original message text, used when the command is not ours. */
  text: string;
};

export type ContactEvent = EventBase & {
  kind: 'contact';
  phoneNumber: string;
};

export type PhotoEvent = EventBase & {
  kind: 'photo';
  fileId: string;
};

export type DocumentEvent = EventBase & {
  kind: 'document';
  fileId: string;
  filename?: string;
  mimeType?: string;
};

export type TextEvent = EventBase & {
  kind: 'text';
  text: string;
};

/** One inbound unit of platform activity, already classified. */
export type BotEvent = CommandEvent | ContactEvent | PhotoEvent | DocumentEvent | TextEvent;

export type ReplyKeyboard = 'request_contact' | 'remove';

export type BotReply = {
  text: string;
  keyboard?: ReplyKeyboard;
};

export type DownloadedFile = {
  bytes: Uint8Array;
  filePath?: string;
};

export type FileDownloader = (fileId: string) => Promise<DownloadedFile>;

type SlashCommand = {
  command: string;
  addressedBotUsername?: string;
  args: string;
};

export function parseSlashCommand(text: string): SlashCommand | null {
  const match = text.match(/^\/([a-zA-Z0-9_]+)(?:@([a-zA-Z0-9_]+))?(?:\s+([\s\S]+))?$/);
  if (!match) return null;

  return {
    command: match[1].toLowerCase(),
    addressedBotUsername: match[2],
    args: match[3]?.trim() ?? '',
  };
}

/**
 * Classifies a text message as a command or plain text. Commands addressed to
 * a different bot are plain text. The text itself is carried unchanged.
 */
export function classifyText(
  input: EventBase & { text: string },
  botUsername?: string,
): CommandEvent | TextEvent {
  const { chatId, from, text } = input;
  const slash = parseSlashCommand(text.trim());

  const addressedElsewhere =
    slash?.addressedBotUsername !== undefined &&
    botUsername !== undefined &&
    slash.addressedBotUsername.toLowerCase() !== botUsername.toLowerCase();

  if (!slash || addressedElsewhere) {
    return { kind: 'text', chatId, from, text };
  }

  return { kind: 'command', chatId, from, command: slash.command, args: slash.args, text };
}
