/**
 * Logger utility
 */

import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(service: string = 'MessengerGateway', level?: string): Logger {
  return pino({
    level: level || process.env.LOG_LEVEL || 'info',
    base: { service }
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
