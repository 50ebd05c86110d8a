import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

/** `key=value` pairs for every metadata field, in insertion order. */
export function formatLogFields(meta: Record<string, unknown>): string {
  return Object.entries(meta)
    .filter(([key]) => key !== 'level' && key !== 'timestamp' && key !== 'message')
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const fields = formatLogFields(meta);
    const head = `${String(timestamp)} ${level.toUpperCase().padEnd(5)} ${String(message)}`;
    return fields ? `${head} ${fields}` : head;
  }),
);

/**
 * Diagnostics go to stderr at every level; stdout carries rendered answers.
 *
 * @example
 * ```typescript
 * logger.debug('Rendered fragment', { index: 3, lines: 12 });
 * logger.error('Failed to delete conversation', { id, error });
 * ```
 */
export const logger = winston.createLogger({
  level: 'info',
  format: lineFormat,
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
  exitOnError: false,
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
