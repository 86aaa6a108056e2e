import winston from 'winston';

export type Logger = winston.Logger;

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function createConsoleFormat() {
  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => {
      const { timestamp, level, message, stack, ...meta } = info;
      const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
      const stackStr = typeof stack === 'string' ? `\n${stack}` : '';
      return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
    })
  );
}

export function createLogger(level: LogLevel = 'info', silent = false): Logger {
  return winston.createLogger({
    level,
    silent,
    format: createConsoleFormat(),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}
