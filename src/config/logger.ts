/**
 * Application logger. JSON lines in production, colorized text in development.
 */
import winston from 'winston';

const isProduction = process.env.NODE_ENV === 'production';
const debugMode = String(process.env.DEBUG_MODE || '').toLowerCase() === 'true';

const devFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
});

export const logger = winston.createLogger({
  level: debugMode ? 'debug' : process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), devFormat)
  ),
  transports: [new winston.transports.Console()],
});
