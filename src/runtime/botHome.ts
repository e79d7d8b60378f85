import { homedir } from 'node:os';
import path from 'node:path';

/**
 * Root directory for bot runtime state (logs, optional config.json).
 *
 * User records live in MongoDB; this directory only holds local files.
 */
export function getBotHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.BOT_HOME?.trim();
  if (override) return override;
  return path.join(homedir(), '.relaybot');
}

export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LOG_DIR?.trim();
  if (override) return override;
  return path.join(getBotHome(env), 'logs');
}
