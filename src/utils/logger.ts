/**
 * Logging
 *
 * One pino root logger; each module gets a child bound to its name.
 * The level comes from LOG_LEVEL and can be changed at run time.
 */

import pino, { type LevelWithSilent, type Logger } from 'pino';

const rootLogger = pino({
  name: 'swiss-grid',
  level: process.env.LOG_LEVEL ?? 'info',
});

// Children copy the level at creation, so keep them to re-level later
const moduleLoggers = new Map<string, Logger>();

/**
 * Get the logger for a module
 */
export function createLogger(module: string): Logger {
  const existing = moduleLoggers.get(module);
  if (existing) {
    return existing;
  }

  const logger = rootLogger.child({ module });
  moduleLoggers.set(module, logger);
  return logger;
}

/**
 * Change the level of the root logger and every module logger
 */
export function setLogLevel(level: LevelWithSilent): void {
  rootLogger.level = level;
  for (const logger of moduleLoggers.values()) {
    logger.level = level;
  }
}
