import { describe, expect, it } from 'vitest';

import { classifyText, parseSlashCommand } from './events.js';

describe('parseSlashCommand', () => {
  it('parses commands with optional bot suffix and arguments', () => {
    expect(parseSlashCommand('/Stats')).toEqual({ command: 'stats', addressedBotUsername: undefined, args: '' });
    expect(parseSlashCommand('/websearch@relay_bot  tides ')).toEqual({
      command: 'websearch',
      addressedBotUsername: 'relay_bot',
      args: 'tides',
    });
  });

  it('rejects plain text', () => {
    expect(parseSlashCommand('hello /start')).toBeNull();
    expect(parseSlashCommand('/')).toBeNull();
  });
});

describe('classifyText', () => {
  const base = { chatId: 7, from: { username: 'ana' } };

  it('classifies our commands', () => {
    expect(classifyText({ ...base, text: '/start@Relay_Bot' }, 'relay_bot')).toEqual({
      kind: 'command',
      chatId: 7,
      from: { username: 'ana' },
      command: 'start',
      args: '',
      text: '/start@Relay_Bot',
    });
  });

  it('treats commands for another bot as text', () => {
    expect(classifyText({ ...base, text: '/stats@other_bot' }, 'relay_bot')).toEqual({
      kind: 'text',
      chatId: 7,
      from: { username: 'ana' },
      text: '/stats@other_bot',
    });
  });

  it('parses commands around surrounding whitespace but keeps the text as sent', () => {
    expect(classifyText({ ...base, text: ' /stats \n' }, 'relay_bot')).toEqual({
      kind: 'command',
      chatId: 7,
      from: { username: 'ana' },
      command: 'stats',
      args: '',
      text: ' /stats \n',
    });
    expect(classifyText({ ...base, text: '  hi there  ' })).toEqual({
      kind: 'text',
      chatId: 7,
      from: { username: 'ana' },
      text: '  hi there  ',
    });
  });

  it('classifies plain messages as text', () => {
    expect(classifyText({ ...base, text: 'hi there' }).kind).toBe('text');
  });
});
