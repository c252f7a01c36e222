import winston from 'winston';
import { env } from './environment';

const isProduction = env.NODE_ENV === 'production';

// Structured records; timestamps in UTC to line up with ledger partitions
const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const prettyConsole = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'tool-custody-api' },
  silent: env.NODE_ENV === 'test',
  transports: [
    // JSON lines in production for the log shipper, colourised one-liners otherwise
    new winston.transports.Console({
      format: isProduction ? logFormat : prettyConsole,
    }),
  ],
});

if (isProduction) {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );

  // Ledger write failures are warnings; keep them next to errors for reconciliation
  logger.add(
    new winston.transports.File({
      filename: 'logs/custody.log',
      level: 'warn',
      maxsize: 5242880,
      maxFiles: 10,
    })
  );
}

/**
 * Message of a caught value, for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
