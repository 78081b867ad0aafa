import { inspect } from 'util';
import { createLogger as createWinstonLogger, format, transports } from 'winston';

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

const level = process.env.LOG_LEVEL || 'info';

// stdout is the MCP stdio channel, so every level goes to stderr
const baseLogger = createWinstonLogger({
  level: level === 'silent' ? 'error' : level,
  silent: level === 'silent',
  format: format.combine(
    format.timestamp(),
    format.printf(({ timestamp, level: entryLevel, message, component }) =>
      `${String(timestamp)} [${String(component)}] ${entryLevel}: ${String(message)}`
    )
  ),
  transports: [
    new transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

function formatMeta(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  return inspect(value, { depth: 4, breakLength: Infinity });
}

export function createLogger(component: string): Logger {
  const child = baseLogger.child({ component });
  const emit = (entryLevel: string) => (message: string, ...meta: unknown[]): void => {
    child.log(entryLevel, [message, ...meta.map(formatMeta)].join(' '));
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
