import pino from 'pino';

export type Logger = pino.Logger;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level?: LogLevel;
  json?: boolean;
  file?: string;
}

/**
 * Pretty logs go to stderr so they never interleave with a frame the CLI is
 * drawing on stdout.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? 'info';
  const isJson = config?.json ?? process.env['NODE_ENV'] === 'production';

  if (config?.file) {
    return pino({ level }, pino.destination({ dest: config.file, mkdir: true, sync: false }));
  }

  const transport = isJson
    ? undefined
    : {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss', destination: 2 },
      };

  const options: pino.LoggerOptions = {
    level,
    ...(transport ? { transport } : {}),
  };

  return isJson ? pino(options, pino.destination(2)) : pino(options);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
