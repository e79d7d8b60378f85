import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';

export type EventLogRecord = {
  ts: string;
  type:
    | 'telegram.update'
    | 'handler.success'
    | 'handler.error'
    | 'file.analyzed'
    | 'bot.error';
  data: Record<string, unknown>;
};

export async function appendJsonl(path: string, record: EventLogRecord) {
  await mkdir(dirname(path), { recursive: true });
  await appendFile(path, JSON.stringify(record) + '\n', 'utf8');
}

export function createEventLogWriter(logDir: string, append: typeof appendJsonl = appendJsonl) {
  const logPath = join(logDir, 'events.jsonl');
  return (record: EventLogRecord) => append(logPath, record);
}
