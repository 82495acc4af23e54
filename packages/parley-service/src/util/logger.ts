/**
 * Structured logging via pino.
 */

import pino from 'pino';

let _logger: pino.Logger | null = null;

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export function initLogger(level: string): pino.Logger {
  _logger = pino({
    level,
    transport:
      process.env.NODE_ENV !== 'production'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
  return _logger;
}

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = pino({ level: defaultLevel() });
  }
  return _logger;
}

export type Logger = pino.Logger;
