import { describe, expect, it } from 'vitest';
import { getBotHome, getLogDir } from './botHome.js';
import path from 'node:path';
import { homedir } from 'node:os';

describe('getBotHome', () => {
  it('uses BOT_HOME when set', () => {
    expect(getBotHome({ BOT_HOME: '/tmp/relaybot' })).toBe('/tmp/relaybot');
  });

  it('defaults to ~/.relaybot', () => {
    expect(getBotHome({})).toBe(path.join(homedir(), '.relaybot'));
  });

  it('treats a blank BOT_HOME as unset', () => {
    expect(getBotHome({ BOT_HOME: '   ' })).toBe(path.join(homedir(), '.relaybot'));
  });
});

describe('getLogDir', () => {
  it('defaults to BOT_HOME/logs', () => {
    expect(getLogDir({ BOT_HOME: '/tmp/relaybot' })).toBe(path.join('/tmp/relaybot', 'logs'));
  });

  it('prefers LOG_DIR', () => {
    expect(getLogDir({ BOT_HOME: '/tmp/relaybot', LOG_DIR: '/var/log/relaybot' })).toBe(
      '/var/log/relaybot',
    );
  });
});
