import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * Errors passed as metadata serialize to {}; keep their message instead.
 */
const flattenErrors = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (value instanceof Error) {
      info[key] = value.message;
    }
  }
  return info;
});

const devFormat = winston.format.printf(({ level, message, timestamp, service, ...meta }) => {
  const details = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}] ${service}: ${message}${details}`;
});

export const logger = winston.createLogger({
  level: logLevel,
  silent: nodeEnv === 'test',
  defaultMeta: { service: 'creature-tournaments' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    flattenErrors(),
    nodeEnv === 'production' ? winston.format.json() : devFormat
  ),
  transports: [new winston.transports.Console()],
});
