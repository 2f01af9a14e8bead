import type { Logger, LogLevel } from './types';

export const logLevels: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const logLevelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (logLevels as readonly string[]).includes(value);
}

export function logWithLevel(
  logger: Logger,
  level: LogLevel,
  threshold: LogLevel,
  message: string,
  fields?: Record<string, unknown>,
): void {
  if (logLevelOrder[level] < logLevelOrder[threshold]) {
    return;
  }

  try {
    logger[level].call(logger, message, fields);
  } catch {
    // Logging should never disrupt encoding or decoding.
  }
}
