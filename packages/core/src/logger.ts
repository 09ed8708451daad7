import pino, { type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'page-cache',
    level: options.level ?? 'info',
  });
}
