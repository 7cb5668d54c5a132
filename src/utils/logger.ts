import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LOG_LEVELS: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error']);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

const lineFormat = winston.format.printf(({ level, message }) => `[hdlpkg] ${level}: ${String(message)}`);

/** Diagnostic logger. Writes every level to stderr so stdout stays reserved for reports. */
export function createLogger(level: LogLevel = 'warn'): Logger {
  return winston.createLogger({
    level,
    format: lineFormat,
    transports: [
      new winston.transports.Console({
        stderrLevels: ['debug', 'info', 'warn', 'error'],
      }),
    ],
  });
}
