import winston from 'winston';

const { combine, timestamp, errors, json } = winston.format;

/**
 * Process-wide winston instance. `LoggerService` forwards Nest's logging here;
 * `main.ts` uses it directly for failures outside the Nest context.
 */
const logger: winston.Logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  defaultMeta: { service: 'demand-letter-service' },
  format: combine(errors({ stack: true }), timestamp(), json()),
  transports: [new winston.transports.Console()],
});

export default logger;
