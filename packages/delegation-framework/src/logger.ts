import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

// create default logger; tests can replace it through setLogger
let logger: Logger = pino({
  name: 'caveatkit',
  level: process.env.CAVEATKIT_LOG_LEVEL ?? 'info',
});

export function setLogger(next: Logger): void {
  logger = next;
}

/**
 * Returns the framework logger, scoped to a component when one is given.
 *
 * @param component - The name of the component logging.
 * @returns The logger.
 */
export function getLogger(component?: string): Logger {
  return component ? logger.child({ component }) : logger;
}
