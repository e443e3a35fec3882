import pino from 'pino';

import { config } from '@config/env.config.js';

export type LogContext = Record<string, unknown>;

const base = pino({
  level: config.LOG_LEVEL,
  base: { service: 'room-booking' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.token', '*.apiKey', '*.privateKey', 'password', 'token', 'apiKey'],
    censor: '[REDACTED]',
  },
});

type Level = 'debug' | 'info' | 'warn' | 'error';

function write(level: Level, message: string, context?: LogContext): void {
  if (context) {
    base[level](context, message);
  } else {
    base[level](message);
  }
}

export const logger = {
  debug: (message: string, context?: LogContext) => write('debug', message, context),
  info: (message: string, context?: LogContext) => write('info', message, context),
  warn: (message: string, context?: LogContext) => write('warn', message, context),
  error: (message: string, context?: LogContext) => write('error', message, context),
};
