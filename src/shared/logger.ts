// Shared logger
// One winston instance for every component; messages carry a [Component] prefix

import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';

const lineFormat = winston.format.printf(({ timestamp, level, message, stack }) => {
  const base = `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}`;
  return stack ? `${base}\n${stack}` : base;
});

const logger = winston.createLogger({
  level,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    lineFormat
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
