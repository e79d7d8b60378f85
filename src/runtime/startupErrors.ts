import path from 'node:path';

type StartupErrorContext = {
  botHome: string;
  logDir: string;
};

const normalizeMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};

const uniqueSteps = (steps: string[]): string[] => {
  return Array.from(new Set(steps));
};

export const buildNextSteps = (message: string, configPath: string): string[] => {
  const steps: string[] = [];
  const lower = message.toLowerCase();

  if (lower.includes('telegram_bot_token')) {
    steps.push('Set TELEGRAM_BOT_TOKEN in your environment or .env file.');
  }
  if (lower.includes('openai_api_key')) {
    steps.push('Set OPENAI_API_KEY in your environment or .env file.');
  }
  if (lower.includes('mongo_uri')) {
    steps.push('Set MONGO_URI in your environment or .env file.');
  }
  if (lower.includes('mongodb')) {
    steps.push('Check that MONGO_URI points at a reachable MongoDB server.');
  }
  if (lower.includes('config.json')) {
    steps.push(`Fix or remove ${configPath}; every field in it is optional.`);
  }
  if (lower.includes('telegram')) {
    steps.push('Check that TELEGRAM_BOT_TOKEN is valid and api.telegram.org is reachable.');
  }

  return uniqueSteps(steps);
};

export function reportStartupError(err: unknown, context: StartupErrorContext): void {
  const message = normalizeMessage(err);
  const configPath = path.join(context.botHome, 'config.json');

  console.error('relaybot failed to start.');
  console.error(`Reason: ${message}`);
  console.error('Relevant paths:');
  console.error(`- BOT_HOME: ${context.botHome}`);
  console.error(`- Config: ${configPath}`);
  console.error(`- Logs (runtime): ${path.join(context.logDir, 'runtime.jsonl')}`);
  console.error(`- Logs (events): ${path.join(context.logDir, 'events.jsonl')}`);

  const steps = buildNextSteps(message, configPath);
  if (steps.length === 0) return;

  console.error('Next steps:');
  for (const step of steps) {
    console.error(`- ${step}`);
  }
}
