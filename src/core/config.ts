import { isLogLevel, logLevels } from './logger';
import { defaultRandomSource } from './random';
import type { Logger, LogLevel, RandomSource } from './types';

export interface G60Config {
  logger?: Logger;
  /**
   * Minimum level written to `logger`. Falls back to the `G60_LOG_LEVEL`
   * environment variable, then `warn`.
   */
  logLevel?: LogLevel;
  /**
   * Source of random bytes for `randomBytes` and `randomString`.
   */
  random?: RandomSource;
}

export interface ResolvedG60Config {
  logger: Logger;
  logLevel: LogLevel;
  random: RandomSource;
}

const defaultLogLevel: LogLevel = 'warn';

export class G60ConfigError extends Error {
  code: 'INVALID_CONFIG';

  constructor(code: G60ConfigError['code'], message: string) {
    super(message);
    this.code = code;
  }
}

export function normalizeConfig(config: G60Config = {}): ResolvedG60Config {
  const logger = config.logger ?? console;
  const logLevel = normalizeLogLevel(config.logLevel);
  const random = config.random ?? defaultRandomSource;

  if (typeof random !== 'function') {
    throw new G60ConfigError('INVALID_CONFIG', 'random must be a function');
  }

  return { logger, logLevel, random };
}

function normalizeLogLevel(logLevel: LogLevel | undefined): LogLevel {
  const envLevel =
    typeof process !== 'undefined' ? process.env?.['G60_LOG_LEVEL']?.trim().toLowerCase() : undefined;
  const resolved = logLevel ?? (envLevel || undefined) ?? defaultLogLevel;
  if (!isLogLevel(resolved)) {
    throw new G60ConfigError('INVALID_CONFIG', `logLevel must be one of ${logLevels.join(', ')}`);
  }
  return resolved;
}
