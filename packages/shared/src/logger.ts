import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (
    envLevel === 'silent' ||
    envLevel === 'fatal' ||
    envLevel === 'error' ||
    envLevel === 'warn' ||
    envLevel === 'info' ||
    envLevel === 'debug' ||
    envLevel === 'trace'
  ) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'quarry',
  level: getLogLevel(),
  redact: ['apiKey', '*.apiKey', 'headers.authorization'],
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
