import winston from 'winston';

const isProduction = process.env.NODE_ENV === 'production';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'notification-delivery' },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console(
      isProduction
        ? {}
        : { format: winston.format.combine(winston.format.colorize(), winston.format.simple()) }
    ),
  ],
});

export function maskAddress(address?: string): string {
  if (!address) {
    return '';
  }

  const at = address.indexOf('@');
  if (at > 0) {
    return `${address.substring(0, Math.min(2, at))}***${address.substring(at)}`;
  }

  if (address.length <= 4) {
    return '****';
  }

  return `${address.substring(0, 3)}***${address.substring(address.length - 2)}`;
}

export default logger;
