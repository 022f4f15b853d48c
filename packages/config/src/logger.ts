import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

function usePrettyTransport(): boolean {
  if (process.env.LOG_PRETTY === 'false') return false;
  return process.env.NODE_ENV !== 'test' && process.env.NODE_ENV !== 'production';
}

/**
 * Create a named pino logger.
 * Pretty output for interactive runs, JSON lines otherwise.
 */
export function createLogger(name: string): Logger {
  const level = process.env.LOG_LEVEL || 'info';

  if (!usePrettyTransport()) {
    return pino({ name, level });
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  });
}
