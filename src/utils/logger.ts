import pino from 'pino';

/**
 * Root logger for the campaign runner. LOG_LEVEL sets the level; with
 * NODE_ENV=development output goes through pino-pretty.
 */
function createLoggerOptions(): pino.LoggerOptions {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const logLevel = process.env.LOG_LEVEL || 'info';

  const baseOptions: pino.LoggerOptions = {
    level: logLevel,
    // Serialize Error objects under both 'err' (Pino standard) and 'error'
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (isDevelopment) {
    return {
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    };
  }

  return baseOptions;
}

export const logger = pino(createLoggerOptions());

/**
 * Logger for one module of the runner. Every line it writes carries
 * `module`.
 */
export function createModuleLogger(module: string): pino.Logger {
  return logger.child({ module });
}

export type Logger = pino.Logger;
