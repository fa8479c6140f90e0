import pino from 'pino';

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function loggerOptions(): pino.LoggerOptions {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV === 'development') {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level };
}

const rootLogger = pino(loggerOptions());

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return context ? rootLogger.child(context) : rootLogger;
}

/**
 * Child logger for one unit of work (an HTTP request, a scheduled sweep).
 */
export function createRequestLogger(
  base: pino.Logger,
  correlationId: string = generateCorrelationId()
): pino.Logger {
  return base.child({ correlationId });
}
