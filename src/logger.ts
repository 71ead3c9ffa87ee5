import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'alarm-session-core',
    level,
    redact: ['secret', 'token', '*.secret', '*.token']
  });
}
