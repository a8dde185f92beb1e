import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function levelFromEnv(): LevelWithSilent | undefined {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS.find(level => level === value);
}

/**
 * Creates the pino logger used when the caller does not inject one.
 * LOG_LEVEL overrides the default level of "info".
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'release-update-checker',
    level: options.level ?? levelFromEnv() ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
