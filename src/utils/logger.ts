import { createLogger, format, transports } from 'winston';
import { config } from '../config';

const consoleFormat = format.printf(({ level, message, timestamp, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}] ${message}${extra}`;
});

export const logger = createLogger({
  level: config.logging.level,
  format: format.combine(
    format.errors({ stack: true }),
    format.splat(),
    format.timestamp()
  ),
  transports: [
    new transports.Console({
      format: format.combine(format.colorize(), consoleFormat)
    }),
    ...(config.logging.file
      ? [new transports.File({ filename: config.logging.file, format: format.json() })]
      : [])
  ]
});
