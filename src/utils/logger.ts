import { createLogger, format, transports, type Logger } from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === value);
  return level ?? 'info';
}

const consoleFormat = format.printf(({ level, message, timestamp, module, ...meta }) => {
  const tag = typeof module === 'string' ? ` [${module}]` : '';
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)}${tag} ${level}: ${String(message)}${rest}`;
});

// Level comes straight from the environment so that importing the logger
// never forces configuration validation.
export const logger: Logger = createLogger({
  level: resolveLevel(process.env.LOG_LEVEL),
  format: format.combine(
    format.errors({ stack: true }),
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  ),
  transports: [
    new transports.Console({
      format: format.combine(format.colorize(), consoleFormat),
    }),
  ],
});

/**
 * Replace the environment-derived level once configuration is validated.
 * Module loggers follow the change.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a logger whose lines are tagged with the given module name.
 *
 * @example
 * const logger = createModuleLogger('retriever');
 * logger.info('Retrieved 4 examples', { k: 4 });
 */
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
