/**
 * Logger
 *
 * winston logger shared by every module. JSON records with timestamps,
 * rendered through a readable console format for container logs.
 */

import winston from 'winston';

const SERVICE_NAME = process.env.SERVICE_NAME || 'otp-service';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
  })
);

export function createLogger(serviceName: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    format: logFormat,
    defaultMeta: { service: serviceName },
    silent: process.env.NODE_ENV === 'test',
    transports: [new winston.transports.Console({ format: consoleFormat })],
  });
}

export const logger = createLogger(SERVICE_NAME);

/**
 * Apply the configured level once config has been loaded
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Mask a phone number for log output
 */
export function maskPhone(phone: string): string {
  return phone.slice(0, 5) + '***';
}
