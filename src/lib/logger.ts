import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  ...(isProduction
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a single vacancy.
 */
export function createVacancyLogger(
  vacancyId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ vacancyId, ...extra });
}

export type { Logger };

export default logger;
