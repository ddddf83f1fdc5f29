import { pino, type BaseLogger, type Logger } from 'pino';

export type { BaseLogger };

export function createLogger(level = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    level,
    base: { service: 'risk-api' },
  });
}

export const silentLogger: BaseLogger = pino({ level: 'silent' });
