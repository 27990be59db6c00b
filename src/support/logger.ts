import pino, { Logger } from 'pino';
import { config } from '../config';

/**
 * Root logger, level from `logging.level`
 */
export const logger = pino({
  name: 'modal-interactions',
  level: config.logging.level,
  redact: ['token', '*.token'],
});

/**
 * Get a child logger tagged with a component name
 */
export function getLogger(component: string): Logger {
  return logger.child({ component });
}
