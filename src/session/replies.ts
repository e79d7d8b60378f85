import type { UserRecord } from '../storage/botStore.js';

export const WELCOME_TEXT = [
  "Welcome! 👋 I'm your AI assistant. I can help you with:",
  '• General questions and chat',
  '• Image and file analysis',
  '• Web searches',
  '',
  'Please share your contact to get started!',
].join('\n');

export const HELP_TEXT = [
  "Here's what I can do:",
  '',
  '/websearch - Search the web',
  '/stats - View your usage statistics',
  '/help - Show this message',
  '',
  'Send me any message to chat, or send an image or a PDF file for analysis!',
].join('\n');

export const CONTACT_SAVED = "Thanks! You're all set. Try asking me something or use /help to see all commands.";
export const SEARCH_PROMPT = 'What would you like to search for?';
export const STATS_NOT_FOUND = "Sorry, I couldn't find your statistics. Try using /start first.";
export const SHARE_CONTACT_LABEL = 'Share Contact';

export const IMAGE_REPLY_PREFIX = 'Image Analysis:\n\n';
export const DOCUMENT_REPLY_PREFIX = 'Document Analysis:\n\n';

export const MAX_SOURCE_LINKS = 5;

export type HandlerName =
  | 'start'
  | 'help'
  | 'websearch'
  | 'searchQuery'
  | 'stats'
  | 'contact'
  | 'photo'
  | 'document'
  | 'chat';

export const APOLOGIES: Record<HandlerName, string> = {
  start: 'Sorry, something went wrong. Please try again later.',
  help: "Sorry, I couldn't process the help command. Please try again.",
  websearch: "Sorry, I couldn't process the web search command. Please try again.",
  searchQuery: "Sorry, I couldn't complete the web search. Please try again.",
  stats: "Sorry, I couldn't retrieve your statistics. Please try again.",
  contact: "Sorry, I couldn't save your contact information. Please try again.",
  photo: "Sorry, I couldn't process this image. Please try again.",
  document: "Sorry, I couldn't process this document. Please try again.",
  chat: "Sorry, I couldn't process your message. Please try again.",
};

const pad = (value: number) => String(value).padStart(2, '0');

export function formatUtcDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function formatUtcDateTime(date: Date): string {
  return `${formatUtcDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

export function formatStats(user: Pick<UserRecord, 'joined_at' | 'total_messages' | 'last_active'>): string {
  return [
    'Your Statistics:',
    '',
    `• Joined: ${formatUtcDate(user.joined_at)}`,
    `• Total messages: ${user.total_messages}`,
    `• Last active: ${formatUtcDateTime(user.last_active)}`,
  ].join('\n');
}

export function formatSearchReply(summary: string, links: string[]): string {
  const sources = links
    .slice(0, MAX_SOURCE_LINKS)
    .map((link) => `• ${link}`)
    .join('\n');
  return `Here's what I found:\n\n${summary}\n\nSources:\n${sources}`;
}
